/**
 * Tab expansion and the translation between logical and rendered columns.
 *
 * Columns count Unicode scalar values. Every character occupies one cell except
 * the tab, which advances to the next multiple of TAB_STOP.
 */

export const TAB_STOP = 8;

/** Line content as a string or as an array of single characters */
export type LineContent = string | readonly string[];

function toChars(content: LineContent): readonly string[] {
	return typeof content === "string" ? Array.from(content) : content;
}

/** Number of cells a character occupies when it starts at `renderedLength` */
function cellWidth(char: string, renderedLength: number): number {
	return char === "\t" ? TAB_STOP - (renderedLength % TAB_STOP) : 1;
}

export function renderLine(content: LineContent): string {
	let rendered = "";
	let width = 0;
	for (const char of toChars(content)) {
		if (char === "\t") {
			const spaces = cellWidth(char, width);
			rendered += " ".repeat(spaces);
			width += spaces;
		} else {
			rendered += char;
			width++;
		}
	}
	return rendered;
}

/**
 * Rendered column of the character at `column`: the summed width of every
 * character strictly before it.
 */
export function logicalToRendered(content: LineContent, column: number): number {
	const chars = toChars(content);
	const end = Math.min(column, chars.length);
	let width = 0;
	for (let i = 0; i < end; i++) {
		width += cellWidth(chars[i], width);
	}
	return width;
}

/**
 * Logical column of the character whose cells cover `renderedColumn`.
 * A position inside a tab's expansion resolves to the tab. Positions at or past
 * the rendered end of the line resolve to the line length (0 for an empty line).
 */
export function renderedToLogical(content: LineContent, renderedColumn: number): number {
	const chars = toChars(content);
	let width = 0;
	for (let i = 0; i < chars.length; i++) {
		width += cellWidth(chars[i], width);
		if (width > renderedColumn) {
			return i;
		}
	}
	return chars.length;
}

/** Code unit index in `text` of the character at `column` (clamped to the end) */
export function columnToIndex(text: string, column: number): number {
	let index = 0;
	let current = 0;
	for (const char of text) {
		if (current >= column) break;
		index += char.length;
		current++;
	}
	return index;
}

/** Column of the character that starts at code unit `index` */
export function indexToColumn(text: string, index: number): number {
	return Array.from(text.slice(0, index)).length;
}
