export { EditorApp, type EditorAppOptions, HELP_MESSAGE } from "./app.js";
export { type Args, parseArgs, printHelp } from "./args.js";
export { APP_NAME, CONFIG_DIR_NAME, ENV_CONFIG_DIR, expandHome, getConfigDir, VERSION } from "./config.js";
export { DebugLog } from "./debug-log.js";
export { main, openBuffer } from "./main.js";
export { LinePrompt, type LinePromptOptions, type PromptResult } from "./prompt.js";
export {
	defaultEditorTheme,
	EditorScreen,
	type EditorTheme,
	formatStatusBar,
	formatWelcome,
	highlightDigits,
	type ScreenOptions,
	textRows,
} from "./screen.js";
export { parseSettings, type Settings, SettingsManager } from "./settings-manager.js";
export { StatusMessage } from "./status-message.js";
