import * as fs from "node:fs";
import { StdinBuffer } from "./stdin-buffer.js";

/**
 * Minimal full-screen terminal interface
 */
export interface Terminal {
	// Start the terminal with input and resize handlers
	start(onInput: (data: string) => void, onResize: () => void): void;

	// Stop the terminal and restore state
	stop(): void;

	// Write output to terminal
	write(data: string): void;

	// Get terminal dimensions
	get columns(): number;
	get rows(): number;

	// Absolute cursor positioning, 0-based
	moveTo(row: number, column: number): void;

	// Cursor visibility
	hideCursor(): void;
	showCursor(): void;

	// Clear entire screen and move cursor to (0,0)
	clearScreen(): void;

	setTitle(title: string): void;
}

/**
 * Real terminal using process.stdin/stdout.
 *
 * start() switches to raw mode, the alternate screen and bracketed paste;
 * stop() undoes all three. Output is mirrored to the file named by
 * LINEPAD_TUI_WRITE_LOG when it is set.
 */
export class ProcessTerminal implements Terminal {
	private wasRaw = false;
	private started = false;
	private inputHandler?: (data: string) => void;
	private resizeHandler?: () => void;
	private stdinBuffer?: StdinBuffer;
	private stdinDataHandler?: (data: string) => void;
	private writeLogPath = process.env.LINEPAD_TUI_WRITE_LOG || "";

	start(onInput: (data: string) => void, onResize: () => void): void {
		this.inputHandler = onInput;
		this.resizeHandler = onResize;

		// Save previous state and enable raw mode
		this.wasRaw = process.stdin.isRaw || false;
		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(true);
		}
		process.stdin.setEncoding("utf8");
		process.stdin.resume();

		// Alternate screen, then bracketed paste - pastes arrive wrapped in \x1b[200~ ... \x1b[201~
		this.write("\x1b[?1049h\x1b[?2004h");

		process.stdout.on("resize", this.resizeHandler);

		this.setupStdinBuffer();
		this.started = true;
	}

	/**
	 * Route stdin through a StdinBuffer so handlers see one key sequence at a time.
	 */
	private setupStdinBuffer(): void {
		const stdinBuffer = new StdinBuffer({ timeout: 10 });

		stdinBuffer.on("data", (sequence) => {
			this.inputHandler?.(sequence);
		});

		// Re-wrap paste content so the handler can tell it apart from typing
		stdinBuffer.on("paste", (content) => {
			this.inputHandler?.(`\x1b[200~${content}\x1b[201~`);
		});

		this.stdinDataHandler = (data: string) => {
			stdinBuffer.process(data);
		};
		this.stdinBuffer = stdinBuffer;
		process.stdin.on("data", this.stdinDataHandler);
	}

	stop(): void {
		if (!this.started) return;
		this.started = false;

		// Disable bracketed paste, show the cursor and leave the alternate screen
		this.write("\x1b[?2004l\x1b[?25h\x1b[?1049l");

		if (this.stdinBuffer) {
			this.stdinBuffer.destroy();
			this.stdinBuffer = undefined;
		}

		if (this.stdinDataHandler) {
			process.stdin.removeListener("data", this.stdinDataHandler);
			this.stdinDataHandler = undefined;
		}
		this.inputHandler = undefined;
		if (this.resizeHandler) {
			process.stdout.removeListener("resize", this.resizeHandler);
			this.resizeHandler = undefined;
		}

		// Pause stdin so buffered input is not re-read by the shell once raw mode is off
		process.stdin.pause();

		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(this.wasRaw);
		}
	}

	write(data: string): void {
		process.stdout.write(data);
		if (this.writeLogPath) {
			try {
				fs.appendFileSync(this.writeLogPath, data, { encoding: "utf8" });
			} catch (error) {
				// Stop mirroring; the screen itself is unaffected
				this.writeLogPath = "";
				const message = error instanceof Error ? error.message : String(error);
				process.stderr.write(`Write log disabled: ${message}\n`);
			}
		}
	}

	get columns(): number {
		return process.stdout.columns || 80;
	}

	get rows(): number {
		return process.stdout.rows || 24;
	}

	moveTo(row: number, column: number): void {
		this.write(`\x1b[${row + 1};${column + 1}H`);
	}

	hideCursor(): void {
		this.write("\x1b[?25l");
	}

	showCursor(): void {
		this.write("\x1b[?25h");
	}

	clearScreen(): void {
		this.write("\x1b[2J\x1b[H");
	}

	setTitle(title: string): void {
		// OSC 0;title BEL - set terminal window title
		this.write(`\x1b]0;${title}\x07`);
	}
}
