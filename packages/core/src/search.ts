import { assertInvariant } from "./errors.js";
import type { LineBuffer } from "./line-buffer.js";
import { columnToIndex, indexToColumn, renderedToLogical } from "./tab-renderer.js";
import type { Viewport, ViewportSnapshot } from "./viewport.js";

export type SearchDirection = "none" | "forward" | "backward";

/**
 * Keys that steer a search session. Arrows step between matches, enter accepts,
 * escape cancels, and anything else re-runs the query from the top.
 */
export type SearchKey = "up" | "down" | "left" | "right" | "enter" | "escape" | "other";

export interface SearchState {
	/** Rendered column of the current match */
	xIndex: number;
	/** Row of the current match */
	yIndex: number;
	xDirection: SearchDirection;
	yDirection: SearchDirection;
}

export interface SearchMatch {
	row: number;
	/** Logical column the cursor moved to */
	column: number;
	renderedColumn: number;
}

function neutralState(): SearchState {
	return { xIndex: 0, yIndex: 0, xDirection: "none", yDirection: "none" };
}

/**
 * Incremental search over the rendered lines of a buffer.
 *
 * Idle until start(); each keystroke then either steps from the current match in
 * the requested direction or rescans from the top. The first hit in scan order wins.
 * When nothing matches, the cursor and the match position stay where they were.
 */
export class SearchEngine {
	private searching = false;
	private state: SearchState = neutralState();
	private saved?: ViewportSnapshot;

	get active(): boolean {
		return this.searching;
	}

	getState(): SearchState {
		return { ...this.state };
	}

	/** Begin a session, remembering the viewport for cancel() */
	start(viewport: Viewport): void {
		this.searching = true;
		this.state = neutralState();
		this.saved = viewport.snapshot();
	}

	/** End the session and keep the cursor on the last match */
	accept(): void {
		this.finish();
	}

	/** End the session and put the viewport back where it was at start() */
	cancel(viewport: Viewport): void {
		if (this.saved) {
			viewport.restore(this.saved);
		}
		this.finish();
	}

	/**
	 * Apply one keystroke of the session with the query typed so far.
	 * @returns the match the cursor moved to, if any
	 */
	keystroke(query: string, key: SearchKey, buffer: LineBuffer, viewport: Viewport): SearchMatch | undefined {
		assertInvariant(this.searching, "search keystroke outside a search session");

		switch (key) {
			case "enter":
				this.accept();
				return undefined;
			case "escape":
				this.cancel(viewport);
				return undefined;
		}

		this.state.xDirection = key === "right" ? "forward" : key === "left" ? "backward" : "none";
		this.state.yDirection = key === "down" ? "forward" : key === "up" ? "backward" : "none";

		if (query.length === 0) {
			return undefined;
		}

		const match = this.find(query, buffer);
		if (match) {
			this.state.xIndex = match.renderedColumn;
			this.state.yIndex = match.row;
			viewport.setCursor({ column: match.column, row: match.row });
			viewport.invalidateRowOffset(buffer);
		}
		return match;
	}

	private find(query: string, buffer: LineBuffer): SearchMatch | undefined {
		const { xDirection, yDirection, yIndex } = this.state;
		const lineCount = buffer.lineCount;

		for (let i = 0; i < lineCount; i++) {
			const row = this.scanRow(i, xDirection, yDirection, yIndex);
			if (row < 0 || row >= lineCount) {
				break;
			}

			const rendered = buffer.getRenderedRow(row);
			const renderedColumn = this.findInRow(rendered, query, xDirection);
			if (renderedColumn === undefined) {
				// Column stepping only ever looks at the current row
				if (xDirection !== "none") break;
				continue;
			}

			return {
				row,
				column: renderedToLogical(buffer.getRow(row), renderedColumn),
				renderedColumn,
			};
		}
		return undefined;
	}

	/** Row examined at step `i` of a scan */
	private scanRow(i: number, xDirection: SearchDirection, yDirection: SearchDirection, yIndex: number): number {
		switch (yDirection) {
			case "forward":
				return yIndex + i + 1;
			case "backward":
				return yIndex - i - 1;
			case "none":
				return xDirection === "none" ? i : yIndex;
		}
	}

	private findInRow(rendered: string, query: string, direction: SearchDirection): number | undefined {
		const index = this.indexInRow(rendered, query, direction);
		return index === -1 ? undefined : indexToColumn(rendered, index);
	}

	private indexInRow(rendered: string, query: string, direction: SearchDirection): number {
		switch (direction) {
			case "none":
				return rendered.indexOf(query);
			case "forward":
				return rendered.indexOf(query, columnToIndex(rendered, this.state.xIndex + 1));
			case "backward":
				return rendered.slice(0, columnToIndex(rendered, this.state.xIndex)).lastIndexOf(query);
		}
	}

	private finish(): void {
		this.searching = false;
		this.state = neutralState();
		this.saved = undefined;
	}
}
