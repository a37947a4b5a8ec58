import type { CursorPosition, LineBuffer } from "./line-buffer.js";
import { logicalToRendered } from "./tab-renderer.js";

export type CursorDirection = "up" | "down" | "left" | "right" | "home" | "end";

export type PageDirection = "up" | "down";

/** Position relative to the top-left cell of the text area */
export interface ScreenPosition {
	column: number;
	row: number;
}

export interface ViewportSnapshot {
	cursor: CursorPosition;
	rowOffset: number;
	columnOffset: number;
	renderedColumn: number;
}

/**
 * Cursor and visible window over a LineBuffer.
 *
 * After scroll() the cursor row lies in [rowOffset, rowOffset + screenRows) and its
 * rendered column in [columnOffset, columnOffset + screenColumns).
 */
export class Viewport {
	private cursorColumn = 0;
	private cursorRow = 0;
	private rowOffsetValue = 0;
	private columnOffsetValue = 0;
	private renderedColumnValue = 0;
	private columns: number;
	private rows: number;

	constructor(screenColumns: number, screenRows: number) {
		this.columns = Viewport.clampSize(screenColumns);
		this.rows = Viewport.clampSize(screenRows);
	}

	private static clampSize(size: number): number {
		return Number.isFinite(size) ? Math.max(1, Math.floor(size)) : 1;
	}

	get cursor(): CursorPosition {
		return { column: this.cursorColumn, row: this.cursorRow };
	}

	get rowOffset(): number {
		return this.rowOffsetValue;
	}

	get columnOffset(): number {
		return this.columnOffsetValue;
	}

	/** Cursor column after tab expansion, as of the last scroll() */
	get renderedColumn(): number {
		return this.renderedColumnValue;
	}

	get screenColumns(): number {
		return this.columns;
	}

	get screenRows(): number {
		return this.rows;
	}

	resize(screenColumns: number, screenRows: number): void {
		this.columns = Viewport.clampSize(screenColumns);
		this.rows = Viewport.clampSize(screenRows);
	}

	/** Back to the top-left of the buffer */
	reset(): void {
		this.cursorColumn = 0;
		this.cursorRow = 0;
		this.rowOffsetValue = 0;
		this.columnOffsetValue = 0;
		this.renderedColumnValue = 0;
	}

	setCursor(position: CursorPosition): void {
		this.cursorColumn = position.column;
		this.cursorRow = position.row;
	}

	moveCursor(direction: CursorDirection, buffer: LineBuffer): void {
		const lineCount = buffer.lineCount;
		this.clampCursor(buffer);

		switch (direction) {
			case "up":
				this.cursorRow = Math.max(0, this.cursorRow - 1);
				break;
			case "down":
				if (this.cursorRow < lineCount) {
					this.cursorRow++;
				}
				break;
			case "left":
				if (this.cursorColumn > 0) {
					this.cursorColumn--;
				} else if (this.cursorRow > 0) {
					this.cursorRow--;
					this.cursorColumn = buffer.lineLength(this.cursorRow);
				}
				break;
			case "right":
				if (this.cursorRow < lineCount) {
					if (this.cursorColumn < buffer.lineLength(this.cursorRow)) {
						this.cursorColumn++;
					} else {
						this.cursorRow++;
						this.cursorColumn = 0;
					}
				}
				break;
			case "home":
				this.cursorColumn = 0;
				break;
			case "end":
				this.cursorColumn = buffer.lineLength(this.cursorRow);
				break;
		}

		// No sticky column: a shorter target line snaps the column down for good
		this.clampCursor(buffer);
	}

	/** PageUp lands on the first visible row, PageDown on the last (or the virtual row) */
	pageMove(direction: PageDirection, buffer: LineBuffer): void {
		this.scroll(buffer);
		if (direction === "up") {
			this.cursorRow = this.rowOffsetValue;
		} else {
			this.cursorRow = Math.min(this.rowOffsetValue + this.rows - 1, buffer.lineCount);
		}
		this.clampCursor(buffer);
	}

	/** Recompute the rendered column and move the window just enough to show the cursor */
	scroll(buffer: LineBuffer): void {
		this.clampCursor(buffer);
		this.renderedColumnValue =
			this.cursorRow < buffer.lineCount ? logicalToRendered(buffer.getRow(this.cursorRow), this.cursorColumn) : 0;

		this.rowOffsetValue = Math.min(this.rowOffsetValue, this.cursorRow);
		if (this.cursorRow >= this.rowOffsetValue + this.rows) {
			this.rowOffsetValue = this.cursorRow - this.rows + 1;
		}

		this.columnOffsetValue = Math.min(this.columnOffsetValue, this.renderedColumnValue);
		if (this.renderedColumnValue >= this.columnOffsetValue + this.columns) {
			this.columnOffsetValue = this.renderedColumnValue - this.columns + 1;
		}
	}

	/**
	 * Push the row offset past the cursor so the next scroll() puts the cursor row
	 * at the top of the screen.
	 */
	invalidateRowOffset(buffer: LineBuffer): void {
		this.rowOffsetValue = buffer.lineCount;
	}

	/** Cursor relative to the window, valid after scroll() */
	screenCursor(): ScreenPosition {
		return {
			column: this.renderedColumnValue - this.columnOffsetValue,
			row: this.cursorRow - this.rowOffsetValue,
		};
	}

	/**
	 * Rendered text of each screen row, starting at the column offset and at most
	 * screenColumns characters long. Rows past the end of the buffer are undefined.
	 */
	visibleRows(buffer: LineBuffer): (string | undefined)[] {
		const rows: (string | undefined)[] = [];
		for (let i = 0; i < this.rows; i++) {
			const fileRow = this.rowOffsetValue + i;
			if (fileRow >= buffer.lineCount) {
				rows.push(undefined);
				continue;
			}
			const cells = Array.from(buffer.getRenderedRow(fileRow));
			rows.push(cells.slice(this.columnOffsetValue, this.columnOffsetValue + this.columns).join(""));
		}
		return rows;
	}

	snapshot(): ViewportSnapshot {
		return {
			cursor: this.cursor,
			rowOffset: this.rowOffsetValue,
			columnOffset: this.columnOffsetValue,
			renderedColumn: this.renderedColumnValue,
		};
	}

	restore(snapshot: ViewportSnapshot): void {
		this.setCursor(snapshot.cursor);
		this.rowOffsetValue = snapshot.rowOffset;
		this.columnOffsetValue = snapshot.columnOffset;
		this.renderedColumnValue = snapshot.renderedColumn;
	}

	private clampCursor(buffer: LineBuffer): void {
		this.cursorRow = Math.min(Math.max(0, this.cursorRow), buffer.lineCount);
		this.cursorColumn = Math.min(Math.max(0, this.cursorColumn), buffer.lineLength(this.cursorRow));
	}
}
