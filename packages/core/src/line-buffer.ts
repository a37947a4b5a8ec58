import { readFileSync, writeFileSync } from "node:fs";
import { assertInvariant, IoError, NoFileNameError } from "./errors.js";
import { Line } from "./line.js";

export interface CursorPosition {
	/** Logical column, in characters */
	column: number;
	/** Logical row; equal to the line count on the virtual row past the last line */
	row: number;
}

/**
 * Split file contents on line boundaries. A trailing terminator does not
 * produce an extra empty line, and a `\r` before `\n` is dropped.
 */
export function splitLines(text: string): string[] {
	if (text.length === 0) {
		return [];
	}
	const lines = text.split("\n");
	if (lines[lines.length - 1] === "") {
		lines.pop();
	}
	return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Ordered lines of one file plus its path and modification counter.
 *
 * An empty buffer has zero lines, which is not the same as one empty line.
 */
export class LineBuffer {
	private lines: Line[];
	private filePath?: string;
	private dirtyCount = 0;

	constructor(lines: readonly string[] = [], fileName?: string) {
		this.lines = lines.map((content) => new Line(content));
		this.filePath = fileName;
	}

	static fromText(text: string, fileName?: string): LineBuffer {
		return new LineBuffer(splitLines(text), fileName);
	}

	/**
	 * Read a file into a new buffer associated with `path`.
	 * @throws IoError when the file cannot be read
	 */
	static load(path: string): LineBuffer {
		let text: string;
		try {
			text = readFileSync(path, "utf-8");
		} catch (error) {
			throw IoError.from(path, error);
		}
		return LineBuffer.fromText(text, path);
	}

	get lineCount(): number {
		return this.lines.length;
	}

	/** Edits since the last load or save */
	get dirty(): number {
		return this.dirtyCount;
	}

	get fileName(): string | undefined {
		return this.filePath;
	}

	setFileName(path: string): void {
		this.filePath = path;
	}

	getRow(row: number): string {
		return this.line(row).content;
	}

	getRenderedRow(row: number): string {
		return this.line(row).rendered;
	}

	/** Length of `row` in characters; the virtual row past the end has length 0 */
	lineLength(row: number): number {
		if (row === this.lines.length) {
			return 0;
		}
		return this.line(row).length;
	}

	insertLine(index: number, content = ""): void {
		assertInvariant(index >= 0 && index <= this.lines.length, `insert line at ${index} of ${this.lines.length}`);
		this.lines.splice(index, 0, new Line(content));
		this.dirtyCount++;
	}

	/** Insert `char` at `column`; on the virtual row a new line is appended first */
	insertChar(row: number, column: number, char: string): void {
		assertInvariant(Array.from(char).length === 1, `insertChar expects one character, got ${JSON.stringify(char)}`);
		if (row === this.lines.length) {
			this.insertLine(row);
		}
		this.line(row).insert(column, char);
		this.dirtyCount++;
	}

	/** Move everything from `column` onwards to a new line below `row` */
	splitLine(row: number, column: number): void {
		const rest = this.line(row).truncate(column);
		this.lines.splice(row + 1, 0, new Line(rest));
		this.dirtyCount++;
	}

	/**
	 * Backspace at (`row`, `column`).
	 *
	 * Removes the character left of the column, or at column 0 merges the row into
	 * the previous one. Returns where the cursor belongs afterwards, or undefined
	 * when there was nothing to delete (start of buffer, or the virtual row).
	 */
	deleteChar(row: number, column: number): CursorPosition | undefined {
		if (row === this.lines.length || (row === 0 && column === 0)) {
			return undefined;
		}
		const line = this.line(row);
		if (column > 0) {
			line.remove(column - 1);
			this.dirtyCount++;
			return { column: column - 1, row };
		}

		const previous = this.line(row - 1);
		const joinColumn = previous.length;
		previous.append(line.content);
		this.lines.splice(row, 1);
		this.dirtyCount++;
		return { column: joinColumn, row: row - 1 };
	}

	/** Lines joined with `\n`, without a final newline */
	toText(): string {
		return this.lines.map((line) => line.content).join("\n");
	}

	/**
	 * Overwrite the associated file with the buffer contents.
	 * @returns number of bytes written
	 * @throws NoFileNameError when no file is associated
	 * @throws IoError when the write fails
	 */
	save(): number {
		if (this.filePath === undefined) {
			throw new NoFileNameError();
		}
		const contents = this.toText();
		try {
			writeFileSync(this.filePath, contents, "utf-8");
		} catch (error) {
			throw IoError.from(this.filePath, error);
		}
		this.dirtyCount = 0;
		return Buffer.byteLength(contents, "utf-8");
	}

	private line(row: number): Line {
		assertInvariant(Number.isInteger(row) && row >= 0 && row < this.lines.length, `row ${row} of ${this.lines.length}`);
		return this.lines[row];
	}
}
