/**
 * StdinBuffer splits raw stdin chunks into single key sequences.
 *
 * A terminal may deliver several keys in one chunk ("ab\x1b[A") or one escape
 * sequence across several chunks ("\x1b", "[A"). The buffer holds on to an
 * unfinished escape sequence until the rest arrives or the timeout expires, and
 * collects bracketed paste content into a single `paste` event.
 *
 * Based on code from OpenTUI (https://github.com/anomalyco/opentui)
 * MIT License - Copyright (c) 2025 opentui
 */

import { EventEmitter } from "node:events";

const ESC = "\x1b";
const BRACKETED_PASTE_START = "\x1b[200~";
const BRACKETED_PASTE_END = "\x1b[201~";

type SequenceStatus = "complete" | "incomplete";

/**
 * Whether `data`, which starts with ESC, is a whole escape sequence yet.
 */
function escapeStatus(data: string): SequenceStatus {
	if (data.length === 1) {
		return "incomplete";
	}

	switch (data[1]) {
		case "[":
			// CSI ends with a final byte in 0x40-0x7E
			if (data.length < 3) return "incomplete";
			// Linux console function keys: ESC [ [ A..E, ESC [ [ 5 ~
			if (data[2] === "[" && data.length < 4) return "incomplete";
			return isFinalByte(data.charCodeAt(data.length - 1)) ? "complete" : "incomplete";
		case "O":
			// SS3: one character after ESC O
			return data.length >= 3 ? "complete" : "incomplete";
		case "]":
			// OSC ends with ST or BEL
			return data.endsWith(`${ESC}\\`) || data.endsWith("\x07") ? "complete" : "incomplete";
		default:
			// Meta key: ESC plus one character
			return "complete";
	}
}

function isFinalByte(code: number): boolean {
	return code >= 0x40 && code <= 0x7e;
}

/**
 * Split `buffer` into complete sequences. An unfinished escape sequence at the
 * end is returned as the remainder.
 */
export function splitSequences(buffer: string): { sequences: string[]; remainder: string } {
	const sequences: string[] = [];
	let pos = 0;

	while (pos < buffer.length) {
		if (buffer.startsWith(ESC, pos)) {
			let end = pos + 1;
			while (end <= buffer.length && escapeStatus(buffer.slice(pos, end)) === "incomplete") {
				end++;
			}
			if (end > buffer.length) {
				return { sequences, remainder: buffer.slice(pos) };
			}
			sequences.push(buffer.slice(pos, end));
			pos = end;
			continue;
		}

		// One character, keeping surrogate pairs together
		const code = buffer.codePointAt(pos) ?? 0;
		const char = String.fromCodePoint(code);
		sequences.push(char);
		pos += char.length;
	}

	return { sequences, remainder: "" };
}

export type StdinBufferOptions = {
	/**
	 * How long to wait for the rest of an escape sequence before emitting what
	 * has arrived (default: 10ms)
	 */
	timeout?: number;
};

export type StdinBufferEventMap = {
	data: [string];
	paste: [string];
};

export class StdinBuffer extends EventEmitter<StdinBufferEventMap> {
	private buffer = "";
	private timeout: ReturnType<typeof setTimeout> | null = null;
	private readonly timeoutMs: number;
	private pasteBuffer: string | null = null;

	constructor(options: StdinBufferOptions = {}) {
		super();
		this.timeoutMs = options.timeout ?? 10;
	}

	process(data: string | Buffer): void {
		this.cancelTimeout();

		let text = typeof data === "string" ? data : data.toString("utf8");
		if (Buffer.isBuffer(data) && data.length === 1 && data[0] > 127) {
			// Some terminals send Alt+key as a single byte with the high bit set
			text = `${ESC}${String.fromCharCode(data[0] - 128)}`;
		}

		if (this.pasteBuffer !== null) {
			this.continuePaste(text);
			return;
		}

		this.buffer += text;

		const startIndex = this.buffer.indexOf(BRACKETED_PASTE_START);
		if (startIndex !== -1) {
			this.emitSequences(splitSequences(this.buffer.slice(0, startIndex)).sequences);
			const rest = this.buffer.slice(startIndex + BRACKETED_PASTE_START.length);
			this.buffer = "";
			this.pasteBuffer = "";
			this.continuePaste(rest);
			return;
		}

		const result = splitSequences(this.buffer);
		this.buffer = result.remainder;
		this.emitSequences(result.sequences);

		if (this.buffer.length > 0) {
			this.timeout = setTimeout(() => {
				this.emitSequences(this.flush());
			}, this.timeoutMs);
		}
	}

	/** Give up on the pending partial sequence and return it as is */
	flush(): string[] {
		this.cancelTimeout();
		if (this.buffer.length === 0) {
			return [];
		}
		const sequences = [this.buffer];
		this.buffer = "";
		return sequences;
	}

	clear(): void {
		this.cancelTimeout();
		this.buffer = "";
		this.pasteBuffer = null;
	}

	getBuffer(): string {
		return this.buffer;
	}

	destroy(): void {
		this.clear();
		this.removeAllListeners();
	}

	private continuePaste(text: string): void {
		const pasted = `${this.pasteBuffer ?? ""}${text}`;
		const endIndex = pasted.indexOf(BRACKETED_PASTE_END);
		if (endIndex === -1) {
			this.pasteBuffer = pasted;
			return;
		}

		this.pasteBuffer = null;
		this.emit("paste", pasted.slice(0, endIndex));

		const remaining = pasted.slice(endIndex + BRACKETED_PASTE_END.length);
		if (remaining.length > 0) {
			this.process(remaining);
		}
	}

	private emitSequences(sequences: string[]): void {
		for (const sequence of sequences) {
			this.emit("data", sequence);
		}
	}

	private cancelTimeout(): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
	}
}
