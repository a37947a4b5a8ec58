import { IoError, NoFileNameError } from "./errors.js";
import { LineBuffer } from "./line-buffer.js";
import { type SearchKey, SearchEngine } from "./search.js";
import { type CursorDirection, type PageDirection, type ScreenPosition, Viewport } from "./viewport.js";

/** Closed set of commands the shell can send to the core */
export type EditorCommand =
	| { type: "moveCursor"; direction: CursorDirection }
	| { type: "pageMove"; direction: PageDirection }
	| { type: "insertChar"; char: string }
	| { type: "insertNewline" }
	| { type: "deleteBackward" }
	| { type: "deleteForward" }
	| { type: "startSearch" }
	| { type: "searchKeystroke"; query: string; key: SearchKey }
	| { type: "save"; fileName?: string }
	| { type: "load"; path: string };

export type CommandOutcome =
	| { type: "applied" }
	| { type: "saved"; path: string; bytes: number }
	| { type: "loaded"; path: string; lineCount: number }
	| { type: "failed"; error: IoError | NoFileNameError };

/** Everything the shell needs to paint one frame */
export interface EditorFrame {
	/** Visible rendered text per screen row; undefined past the end of the buffer */
	rows: (string | undefined)[];
	cursor: ScreenPosition;
	/** Logical cursor row in the buffer */
	cursorRow: number;
	lineCount: number;
	dirty: number;
	fileName?: string;
}

export interface EditorSessionOptions {
	screenColumns: number;
	screenRows: number;
	buffer?: LineBuffer;
}

function isReportable(error: unknown): error is IoError | NoFileNameError {
	return error instanceof IoError || error instanceof NoFileNameError;
}

/**
 * One open buffer with its viewport and search session.
 *
 * Each command is applied completely before execute() returns; frame() then scrolls
 * the viewport and reports what is visible.
 */
export class EditorSession {
	readonly viewport: Viewport;
	readonly search = new SearchEngine();
	private buffer: LineBuffer;

	constructor(options: EditorSessionOptions) {
		this.viewport = new Viewport(options.screenColumns, options.screenRows);
		this.buffer = options.buffer ?? new LineBuffer();
	}

	getBuffer(): LineBuffer {
		return this.buffer;
	}

	resize(screenColumns: number, screenRows: number): void {
		this.viewport.resize(screenColumns, screenRows);
	}

	execute(command: EditorCommand): CommandOutcome {
		switch (command.type) {
			case "moveCursor":
				this.viewport.moveCursor(command.direction, this.buffer);
				break;
			case "pageMove":
				this.viewport.pageMove(command.direction, this.buffer);
				break;
			case "insertChar": {
				const { column, row } = this.viewport.cursor;
				this.buffer.insertChar(row, column, command.char);
				this.viewport.setCursor({ column: column + 1, row });
				break;
			}
			case "insertNewline":
				this.insertNewline();
				break;
			case "deleteBackward":
				this.deleteBackward();
				break;
			case "deleteForward":
				this.viewport.moveCursor("right", this.buffer);
				this.deleteBackward();
				break;
			case "startSearch":
				this.search.start(this.viewport);
				break;
			case "searchKeystroke":
				this.search.keystroke(command.query, command.key, this.buffer, this.viewport);
				break;
			case "save":
				return this.save(command.fileName);
			case "load":
				return this.load(command.path);
		}
		return { type: "applied" };
	}

	frame(): EditorFrame {
		this.viewport.scroll(this.buffer);
		return {
			rows: this.viewport.visibleRows(this.buffer),
			cursor: this.viewport.screenCursor(),
			cursorRow: this.viewport.cursor.row,
			lineCount: this.buffer.lineCount,
			dirty: this.buffer.dirty,
			fileName: this.buffer.fileName,
		};
	}

	private insertNewline(): void {
		const { column, row } = this.viewport.cursor;
		if (column === 0) {
			this.buffer.insertLine(row);
		} else {
			this.buffer.splitLine(row, column);
		}
		this.viewport.setCursor({ column: 0, row: row + 1 });
	}

	private deleteBackward(): void {
		const { column, row } = this.viewport.cursor;
		const position = this.buffer.deleteChar(row, column);
		if (position) {
			this.viewport.setCursor(position);
		}
	}

	private save(fileName: string | undefined): CommandOutcome {
		if (fileName !== undefined) {
			this.buffer.setFileName(fileName);
		}
		try {
			const bytes = this.buffer.save();
			return { type: "saved", path: this.buffer.fileName ?? "", bytes };
		} catch (error) {
			if (isReportable(error)) {
				return { type: "failed", error };
			}
			throw error;
		}
	}

	private load(path: string): CommandOutcome {
		let loaded: LineBuffer;
		try {
			loaded = LineBuffer.load(path);
		} catch (error) {
			if (isReportable(error)) {
				return { type: "failed", error };
			}
			throw error;
		}
		if (this.search.active) {
			this.search.accept();
		}
		this.buffer = loaded;
		this.viewport.reset();
		return { type: "loaded", path, lineCount: loaded.lineCount };
	}
}
