import type { SearchKey } from "@linepad/core";
import { decodePrintable, type EditorKeybindingsManager } from "@linepad/tui";

export type PromptResult = { type: "pending" } | { type: "submitted"; value: string } | { type: "cancelled" };

export interface LinePromptOptions {
	/** Builds the message bar text from the current input */
	format: (input: string) => string;
	keybindings: EditorKeybindingsManager;
	/** Called after every keystroke with the input and how the key steers a search */
	onKey?: (input: string, key: SearchKey) => void;
}

/**
 * Single-line input shown in the message bar.
 *
 * Enter submits (and is ignored while the input is empty), Escape cancels,
 * Backspace or Delete removes the last character, Tab and printable characters append.
 */
export class LinePrompt {
	private input = "";
	private readonly format: (input: string) => string;
	private readonly keybindings: EditorKeybindingsManager;
	private readonly onKey?: (input: string, key: SearchKey) => void;

	constructor(options: LinePromptOptions) {
		this.format = options.format;
		this.keybindings = options.keybindings;
		this.onKey = options.onKey;
	}

	get value(): string {
		return this.input;
	}

	get message(): string {
		return this.format(this.input);
	}

	handleInput(data: string): PromptResult {
		const kb = this.keybindings;

		if (kb.matches(data, "cancel")) {
			this.onKey?.(this.input, "escape");
			return { type: "cancelled" };
		}

		if (kb.matches(data, "submit")) {
			if (this.input.length === 0) {
				return { type: "pending" };
			}
			this.onKey?.(this.input, "enter");
			return { type: "submitted", value: this.input };
		}

		this.onKey?.(this.input, this.edit(data));
		return { type: "pending" };
	}

	/** Append pasted text, dropping line breaks and control characters */
	paste(text: string): void {
		for (const char of text) {
			if (char === "\t" || decodePrintable(char) !== undefined) {
				this.input += char;
			}
		}
		this.onKey?.(this.input, "other");
	}

	private edit(data: string): SearchKey {
		const kb = this.keybindings;
		if (kb.matches(data, "cursorUp")) return "up";
		if (kb.matches(data, "cursorDown")) return "down";
		if (kb.matches(data, "cursorLeft")) return "left";
		if (kb.matches(data, "cursorRight")) return "right";

		if (kb.matches(data, "deleteCharBackward") || kb.matches(data, "deleteCharForward")) {
			this.input = Array.from(this.input).slice(0, -1).join("");
		} else if (kb.matches(data, "tab")) {
			this.input += "\t";
		} else {
			const char = decodePrintable(data);
			if (char !== undefined) {
				this.input += char;
			}
		}
		return "other";
	}
}
