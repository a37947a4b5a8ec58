// Keybindings
export {
	DEFAULT_EDITOR_KEYBINDINGS,
	type EditorAction,
	type EditorKeybindingsConfig,
	EditorKeybindingsManager,
	getEditorKeybindings,
	isEditorAction,
	setEditorKeybindings,
} from "./keybindings.js";
// Keyboard input handling
export { decodePrintable, isKeyId, type KeyId, matchesKey, parseKey } from "./keys.js";
// Input buffering
export { StdinBuffer, type StdinBufferEventMap, type StdinBufferOptions, splitSequences } from "./stdin-buffer.js";
// Terminal interface and implementations
export { ProcessTerminal, type Terminal } from "./terminal.js";
