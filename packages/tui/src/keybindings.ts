import { type KeyId, matchesKey } from "./keys.js";

const EDITOR_ACTIONS = [
	// Cursor movement
	"cursorUp",
	"cursorDown",
	"cursorLeft",
	"cursorRight",
	"cursorLineStart",
	"cursorLineEnd",
	"pageUp",
	"pageDown",
	// Deletion
	"deleteCharBackward",
	"deleteCharForward",
	// Text input
	"newLine",
	"tab",
	// Prompts
	"submit",
	"cancel",
	// Commands
	"save",
	"find",
	"quit",
] as const;

/**
 * Editor actions that can be bound to keys.
 */
export type EditorAction = (typeof EDITOR_ACTIONS)[number];

export type { KeyId };

/**
 * Editor keybindings configuration.
 */
export type EditorKeybindingsConfig = {
	[K in EditorAction]?: KeyId | KeyId[];
};

/**
 * Default editor keybindings.
 */
export const DEFAULT_EDITOR_KEYBINDINGS: Required<EditorKeybindingsConfig> = {
	// Cursor movement
	cursorUp: "up",
	cursorDown: "down",
	cursorLeft: "left",
	cursorRight: "right",
	cursorLineStart: "home",
	cursorLineEnd: "end",
	pageUp: "pageUp",
	pageDown: "pageDown",
	// Deletion
	deleteCharBackward: "backspace",
	deleteCharForward: "delete",
	// Text input
	newLine: "enter",
	tab: "tab",
	// Prompts
	submit: "enter",
	cancel: "escape",
	// Commands
	save: "ctrl+s",
	find: ["ctrl+f", "ctrl+g"],
	quit: "ctrl+q",
};

export function isEditorAction(value: string): value is EditorAction {
	return EDITOR_ACTIONS.some((action) => action === value);
}

function toKeyArray(keys: KeyId | KeyId[]): KeyId[] {
	return Array.isArray(keys) ? [...keys] : [keys];
}

/**
 * Manages keybindings for the editor.
 */
export class EditorKeybindingsManager {
	private actionToKeys: Map<EditorAction, KeyId[]>;

	constructor(config: EditorKeybindingsConfig = {}) {
		this.actionToKeys = new Map();
		this.buildMaps(config);
	}

	private buildMaps(config: EditorKeybindingsConfig): void {
		this.actionToKeys.clear();

		// User config replaces the default keys of an action entirely
		for (const action of EDITOR_ACTIONS) {
			const keys = config[action] ?? DEFAULT_EDITOR_KEYBINDINGS[action];
			this.actionToKeys.set(action, toKeyArray(keys));
		}
	}

	/**
	 * Check if input matches a specific action.
	 */
	matches(data: string, action: EditorAction): boolean {
		const keys = this.actionToKeys.get(action);
		if (!keys) return false;
		for (const key of keys) {
			if (matchesKey(data, key)) return true;
		}
		return false;
	}

	getKeys(action: EditorAction): KeyId[] {
		return this.actionToKeys.get(action) ?? [];
	}

	setConfig(config: EditorKeybindingsConfig): void {
		this.buildMaps(config);
	}
}

// Global instance
let globalEditorKeybindings: EditorKeybindingsManager | null = null;

export function getEditorKeybindings(): EditorKeybindingsManager {
	if (!globalEditorKeybindings) {
		globalEditorKeybindings = new EditorKeybindingsManager();
	}
	return globalEditorKeybindings;
}

export function setEditorKeybindings(manager: EditorKeybindingsManager): void {
	globalEditorKeybindings = manager;
}
