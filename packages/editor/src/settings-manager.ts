import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { type EditorKeybindingsConfig, isEditorAction, isKeyId, type KeyId } from "@linepad/tui";
import { CONFIG_DIR_NAME, getConfigDir } from "./config.js";

export interface Settings {
	quitTimes?: number; // default: 2 (extra Ctrl-Q presses needed to quit with unsaved changes)
	messageTimeoutMs?: number; // default: 5000
	highlightDigits?: boolean; // default: true
	showWelcome?: boolean; // default: true
	keybindings?: EditorKeybindingsConfig;
}

/** Merge settings: overrides take precedence, nested objects merge one level deep */
function mergeSettings(base: Settings, overrides: Settings): Settings {
	const result: Settings = { ...base };
	if (overrides.quitTimes !== undefined) result.quitTimes = overrides.quitTimes;
	if (overrides.messageTimeoutMs !== undefined) result.messageTimeoutMs = overrides.messageTimeoutMs;
	if (overrides.highlightDigits !== undefined) result.highlightDigits = overrides.highlightDigits;
	if (overrides.showWelcome !== undefined) result.showWelcome = overrides.showWelcome;
	if (overrides.keybindings !== undefined) {
		result.keybindings = { ...base.keybindings, ...overrides.keybindings };
	}
	return result;
}

function isNonNegativeInteger(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function parseKeys(value: unknown): KeyId | KeyId[] | undefined {
	if (typeof value === "string") {
		return isKeyId(value) ? value : undefined;
	}
	if (Array.isArray(value)) {
		const keys: KeyId[] = [];
		for (const item of value) {
			if (typeof item !== "string" || !isKeyId(item)) return undefined;
			keys.push(item);
		}
		return keys;
	}
	return undefined;
}

function parseKeybindings(value: unknown, source: string): EditorKeybindingsConfig {
	const config: EditorKeybindingsConfig = {};
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		console.error(`Warning: "keybindings" in ${source} must be an object`);
		return config;
	}
	for (const [action, keys] of Object.entries(value)) {
		const parsed = parseKeys(keys);
		if (!isEditorAction(action) || parsed === undefined) {
			console.error(`Warning: Ignoring keybinding "${action}" in ${source}`);
			continue;
		}
		config[action] = parsed;
	}
	return config;
}

/**
 * Keep the recognized settings of a parsed settings file. Values of the wrong
 * type are dropped with a warning.
 */
export function parseSettings(raw: unknown, source: string): Settings {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		throw new Error("settings must be a JSON object");
	}

	const settings: Settings = {};
	const warn = (key: string) => console.error(`Warning: Ignoring invalid "${key}" in ${source}`);

	for (const [key, value] of Object.entries(raw)) {
		switch (key) {
			case "quitTimes":
			case "messageTimeoutMs":
				if (isNonNegativeInteger(value)) settings[key] = value;
				else warn(key);
				break;
			case "highlightDigits":
			case "showWelcome":
				if (typeof value === "boolean") settings[key] = value;
				else warn(key);
				break;
			case "keybindings":
				settings.keybindings = parseKeybindings(value, source);
				break;
		}
	}
	return settings;
}

export class SettingsManager {
	private projectSettingsPath: string | null;
	private globalSettings: Settings;
	private settings: Settings;
	private globalSettingsLoadError: Error | null = null; // Track if settings file had parse errors

	private constructor(projectSettingsPath: string | null, initialSettings: Settings, loadError: Error | null = null) {
		this.projectSettingsPath = projectSettingsPath;
		this.globalSettings = initialSettings;
		this.globalSettingsLoadError = loadError;
		this.settings = mergeSettings(this.globalSettings, this.loadProjectSettings());
	}

	/** Create a SettingsManager that loads from files */
	static create(cwd: string = process.cwd(), configDir: string = getConfigDir()): SettingsManager {
		const settingsPath = join(configDir, "settings.json");
		const projectSettingsPath = join(cwd, CONFIG_DIR_NAME, "settings.json");

		let globalSettings: Settings = {};
		let loadError: Error | null = null;

		try {
			globalSettings = SettingsManager.loadFromFile(settingsPath);
		} catch (error) {
			loadError = error instanceof Error ? error : new Error(String(error));
			console.error(`Warning: Invalid settings in ${settingsPath}: ${loadError.message}`);
			console.error(`Using default settings.`);
		}

		return new SettingsManager(projectSettingsPath, globalSettings, loadError);
	}

	/** Create an in-memory SettingsManager (no file I/O) */
	static inMemory(settings: Settings = {}): SettingsManager {
		return new SettingsManager(null, settings);
	}

	private static loadFromFile(path: string): Settings {
		if (!existsSync(path)) {
			return {};
		}
		const content = readFileSync(path, "utf-8");
		return parseSettings(JSON.parse(content), path);
	}

	private loadProjectSettings(): Settings {
		if (!this.projectSettingsPath || !existsSync(this.projectSettingsPath)) {
			return {};
		}

		try {
			return SettingsManager.loadFromFile(this.projectSettingsPath);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			console.error(`Warning: Could not read project settings file: ${message}`);
			return {};
		}
	}

	getGlobalSettings(): Settings {
		return structuredClone(this.globalSettings);
	}

	getProjectSettings(): Settings {
		return this.loadProjectSettings();
	}

	getGlobalSettingsLoadError(): Error | null {
		return this.globalSettingsLoadError;
	}

	getQuitTimes(): number {
		return this.settings.quitTimes ?? 2;
	}

	getMessageTimeoutMs(): number {
		return this.settings.messageTimeoutMs ?? 5000;
	}

	getHighlightDigits(): boolean {
		return this.settings.highlightDigits ?? true;
	}

	getShowWelcome(): boolean {
		return this.settings.showWelcome ?? true;
	}

	getKeybindings(): EditorKeybindingsConfig {
		return { ...this.settings.keybindings };
	}
}
