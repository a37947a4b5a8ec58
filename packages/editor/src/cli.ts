#!/usr/bin/env tsx
/**
 * CLI entry point for linepad.
 *
 * Run from a checkout with: npx tsx packages/editor/src/cli.ts [file]
 */
process.title = "linepad";

import chalk from "chalk";
import { main } from "./main.js";

main(process.argv.slice(2)).catch((error: unknown) => {
	console.error(chalk.red(error instanceof Error ? (error.stack ?? error.message) : String(error)));
	process.exit(1);
});
