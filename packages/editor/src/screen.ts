import { basename } from "node:path";
import type { EditorFrame } from "@linepad/core";
import type { Terminal } from "@linepad/tui";
import chalk from "chalk";

/** Rows below the text area: the status bar and the message bar */
export const RESERVED_ROWS = 2;

export interface EditorTheme {
	statusBar: (text: string) => string;
	digit: (text: string) => string;
}

export const defaultEditorTheme: EditorTheme = {
	statusBar: (text: string) => chalk.inverse(text),
	digit: (text: string) => chalk.cyan(text),
};

export interface ScreenOptions {
	theme: EditorTheme;
	highlightDigits: boolean;
	showWelcome: boolean;
	/** Shown in the welcome line, e.g. "linepad editor -- version 1.0.0" */
	welcome: string;
}

/** Number of text rows for a terminal of `terminalRows` rows */
export function textRows(terminalRows: number): number {
	return Math.max(1, terminalRows - RESERVED_ROWS);
}

function truncate(text: string, width: number): string {
	const chars = Array.from(text);
	return chars.length > width ? chars.slice(0, width).join("") : text;
}

function width(text: string): number {
	return Array.from(text).length;
}

/**
 * Plain status bar text, exactly `columns` cells wide: base file name, modified flag and
 * line count on the left, cursor line on the right when it fits.
 */
export function formatStatusBar(frame: EditorFrame, columns: number): string {
	const name = frame.fileName !== undefined ? basename(frame.fileName) : "[No Name]";
	const modified = frame.dirty > 0 ? " (modified)" : "";
	const left = truncate(`${name}${modified} -- ${frame.lineCount} lines`, columns);
	const right = `${frame.cursorRow + 1}/${frame.lineCount}`;

	const gap = columns - width(left) - width(right);
	if (gap >= 0) {
		return left + " ".repeat(gap) + right;
	}
	return left + " ".repeat(columns - width(left));
}

/**
 * Welcome line centred in `columns`, with the usual `~` in the first cell when
 * there is room for it.
 */
export function formatWelcome(welcome: string, columns: number): string {
	const text = truncate(welcome, columns);
	const padding = Math.floor((columns - width(text)) / 2);
	if (padding === 0) {
		return text;
	}
	return `~${" ".repeat(padding - 1)}${text}`;
}

export function highlightDigits(text: string, style: (digits: string) => string): string {
	return text.replace(/[0-9]+/g, (digits) => style(digits));
}

/**
 * Paints editor frames to a terminal: text rows, status bar, message bar, then
 * the cursor. Every render repaints the whole screen in a single write.
 */
export class EditorScreen {
	private terminal: Terminal;
	private options: ScreenOptions;

	constructor(terminal: Terminal, options: ScreenOptions) {
		this.terminal = terminal;
		this.options = options;
	}

	render(frame: EditorFrame, message: string | undefined): void {
		const columns = this.terminal.columns;
		const lines: string[] = [];

		for (let i = 0; i < frame.rows.length; i++) {
			lines.push(this.renderRow(frame, i, columns));
		}
		lines.push(this.options.theme.statusBar(formatStatusBar(frame, columns)));
		lines.push(truncate(message ?? "", columns));

		this.terminal.hideCursor();
		// Clear each line before drawing it: a full-width line leaves the cursor in the last column
		this.terminal.write(`\x1b[H${lines.map((line) => `\x1b[K${line}`).join("\r\n")}`);
		this.terminal.moveTo(frame.cursor.row, frame.cursor.column);
		this.terminal.showCursor();
	}

	private renderRow(frame: EditorFrame, index: number, columns: number): string {
		const row = frame.rows[index];
		if (row !== undefined) {
			return this.options.highlightDigits ? highlightDigits(row, this.options.theme.digit) : row;
		}
		if (frame.lineCount === 0 && this.options.showWelcome && index === Math.floor(frame.rows.length / 3)) {
			return formatWelcome(this.options.welcome, columns);
		}
		return "~";
	}
}
