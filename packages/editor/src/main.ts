/**
 * Main entry point: parses arguments, loads settings and the file, then runs
 * the editor until the user quits.
 */

import { IoError, LineBuffer } from "@linepad/core";
import { EditorKeybindingsManager, ProcessTerminal, setEditorKeybindings } from "@linepad/tui";
import chalk from "chalk";
import { EditorApp } from "./app.js";
import { parseArgs, printHelp } from "./args.js";
import { VERSION } from "./config.js";
import { DebugLog } from "./debug-log.js";
import { SettingsManager } from "./settings-manager.js";

/**
 * Load `path`, or start an empty buffer bound to it when the file does not exist yet.
 * @throws IoError for any other read failure
 */
export function openBuffer(path: string): LineBuffer {
	try {
		return LineBuffer.load(path);
	} catch (error) {
		if (error instanceof IoError && error.code === "ENOENT") {
			return new LineBuffer([], path);
		}
		throw error;
	}
}

export async function main(args: string[]): Promise<void> {
	const parsed = parseArgs(args);

	if (parsed.version) {
		console.log(VERSION);
		return;
	}

	if (parsed.help) {
		printHelp();
		return;
	}

	let buffer: LineBuffer | undefined;
	if (parsed.file !== undefined) {
		try {
			buffer = openBuffer(parsed.file);
		} catch (error) {
			if (!(error instanceof IoError)) throw error;
			console.error(chalk.red(`Error: Cannot open ${error.path}: ${error.message}`));
			process.exitCode = 1;
			return;
		}
	}

	const settings = SettingsManager.create();
	setEditorKeybindings(new EditorKeybindingsManager(settings.getKeybindings()));

	const log = new DebugLog();
	const app = new EditorApp({ terminal: new ProcessTerminal(), settings, buffer, log });

	const onSignal = () => {
		app.stop();
		process.exit(143);
	};
	process.once("SIGTERM", onSignal);

	try {
		await app.run();
	} finally {
		process.removeListener("SIGTERM", onSignal);
		app.stop();
	}

	if (log.error) {
		console.error(chalk.yellow(`Warning: Debug log disabled: ${log.error.message}`));
	}
}
