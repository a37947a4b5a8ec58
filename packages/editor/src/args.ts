/**
 * CLI argument parsing and help display
 */

import chalk from "chalk";
import { APP_NAME, CONFIG_DIR_NAME, ENV_CONFIG_DIR } from "./config.js";

export interface Args {
	help?: boolean;
	version?: boolean;
	file?: string;
	/** Flags that were not recognized */
	unknownFlags: string[];
}

export function parseArgs(args: string[]): Args {
	const result: Args = {
		unknownFlags: [],
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "--version" || arg === "-v") {
			result.version = true;
		} else if (arg === "--") {
			// Everything after -- is a file name, even if it starts with a dash
			if (i + 1 < args.length && result.file === undefined) {
				result.file = args[i + 1];
			}
			break;
		} else if (arg.startsWith("-") && arg !== "-") {
			result.unknownFlags.push(arg);
			console.error(chalk.yellow(`Warning: Unknown option "${arg}"`));
		} else if (result.file === undefined) {
			result.file = arg;
		} else {
			console.error(chalk.yellow(`Warning: Only one file can be edited, ignoring "${arg}"`));
		}
	}

	return result;
}

export function printHelp(): void {
	console.log(`${chalk.bold(APP_NAME)} - a small terminal text editor

${chalk.bold("Usage:")}
  ${APP_NAME} [options] [file]

${chalk.bold("Options:")}
  --help, -h                     Show this help
  --version, -v                  Show version number

${chalk.bold("Keys:")}
  Ctrl-S                         Save (asks for a file name when there is none)
  Ctrl-F, Ctrl-G                 Find (arrows step between matches, Enter keeps, Esc returns)
  Ctrl-Q                         Quit
  Arrows, Home, End              Move the cursor
  PageUp, PageDown               Move by one screen

${chalk.bold("Settings:")}
  ~/${CONFIG_DIR_NAME}/settings.json             Global settings
  ./${CONFIG_DIR_NAME}/settings.json             Project settings (override global)

${chalk.bold("Environment Variables:")}
  ${ENV_CONFIG_DIR.padEnd(30)} - Settings directory (default: ~/${CONFIG_DIR_NAME})
  LINEPAD_DEBUG_LOG              - Append debug output to this file
  LINEPAD_TUI_WRITE_LOG          - Copy all terminal output to this file
`);
}
