export {
	type CommandOutcome,
	type EditorCommand,
	type EditorFrame,
	EditorSession,
	type EditorSessionOptions,
} from "./editor-session.js";
export { assertInvariant, EditorError, InvariantError, IoError, NoFileNameError } from "./errors.js";
export { Line } from "./line.js";
export { type CursorPosition, LineBuffer, splitLines } from "./line-buffer.js";
export { type SearchDirection, SearchEngine, type SearchKey, type SearchMatch, type SearchState } from "./search.js";
export {
	columnToIndex,
	indexToColumn,
	type LineContent,
	logicalToRendered,
	renderedToLogical,
	renderLine,
	TAB_STOP,
} from "./tab-renderer.js";
export {
	type CursorDirection,
	type PageDirection,
	type ScreenPosition,
	Viewport,
	type ViewportSnapshot,
} from "./viewport.js";
