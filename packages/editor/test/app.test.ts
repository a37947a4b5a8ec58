import assert from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import { LineBuffer } from "@linepad/core";
import { type EditorAction, EditorKeybindingsManager } from "@linepad/tui";
import { EditorApp, HELP_MESSAGE } from "../src/app.js";
import { DebugLog } from "../src/debug-log.js";
import { type Settings, SettingsManager } from "../src/settings-manager.js";
import { testEditorTheme } from "./test-themes.js";
import { VirtualTerminal } from "./virtual-terminal.js";

const CTRL_F = "\x06";
const CTRL_Q = "\x11";
const CTRL_S = "\x13";
const DOWN = "\x1b[B";
const RIGHT = "\x1b[C";

interface AppOptions {
	lines?: string[];
	fileName?: string;
	settings?: Settings;
	now?: () => number;
	keybindings?: EditorKeybindingsManager;
}

function createApp(options: AppOptions = {}): { app: EditorApp; terminal: VirtualTerminal } {
	const terminal = new VirtualTerminal(40, 10);
	const app = new EditorApp({
		terminal,
		settings: SettingsManager.inMemory(options.settings),
		buffer: new LineBuffer(options.lines ?? [], options.fileName),
		theme: testEditorTheme,
		keybindings: options.keybindings ?? new EditorKeybindingsManager(),
		log: new DebugLog(""),
		now: options.now,
	});
	return { app, terminal };
}

function typeText(terminal: VirtualTerminal, text: string): void {
	for (const char of text) {
		terminal.sendInput(char);
	}
}

function paste(text: string): string {
	return `\x1b[200~${text}\x1b[201~`;
}

describe("EditorApp", () => {
	it("shows the welcome screen and help for an empty buffer", async () => {
		const { app, terminal } = createApp();
		app.start();

		const viewport = await terminal.flushAndGetViewport();
		assert.deepStrictEqual(viewport, [
			"~",
			"~",
			"~   linepad editor -- version 0.3.0",
			"~",
			"~",
			"~",
			"~",
			"~",
			`[No Name] -- 0 lines${" ".repeat(17)}1/0`,
			"HELP: Ctrl-S = save | Ctrl-F = find | Ct",
		]);
		assert.strictEqual(app.message, HELP_MESSAGE);
		assert.strictEqual(terminal.title, "linepad");
		assert.strictEqual(terminal.started, true);
	});

	it("inserts typed text and line breaks", async () => {
		const { app, terminal } = createApp();
		app.start();
		typeText(terminal, "hi");
		terminal.sendInput("\r");
		typeText(terminal, "x");

		const viewport = await terminal.flushAndGetViewport();
		assert.strictEqual(app.getSession().getBuffer().toText(), "hi\nx");
		assert.deepStrictEqual(viewport.slice(0, 3), ["hi", "x", "~"]);
		assert.strictEqual(viewport[8], `[No Name] (modified) -- 2 lines${" ".repeat(6)}2/2`);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 1, y: 1 });
	});

	it("expands tabs on screen", async () => {
		const { terminal, app } = createApp();
		app.start();
		terminal.sendInput("\t");
		terminal.sendInput("x");

		const viewport = await terminal.flushAndGetViewport();
		assert.strictEqual(viewport[0], `${" ".repeat(8)}x`);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 9, y: 0 });
	});

	it("inserts pasted text with CRLF as a single line break", async () => {
		const { app, terminal } = createApp();
		app.start();
		terminal.sendInput(paste("ab\r\ncd"));
		await terminal.flush();

		assert.strictEqual(app.getSession().getBuffer().toText(), "ab\ncd");
		assert.deepStrictEqual(app.getSession().viewport.cursor, { column: 2, row: 1 });
	});

	it("highlights digits and inverts the status bar", async () => {
		const { app, terminal } = createApp({ lines: ["line 1"] });
		app.start();
		await terminal.flush();

		assert.strictEqual(terminal.getCellForeground(0, 5), 6);
		assert.strictEqual(terminal.isCellInverse(8, 0), true);
	});

	it("honours the highlightDigits setting", async () => {
		const { app, terminal } = createApp({ lines: ["line 1"], settings: { highlightDigits: false } });
		app.start();
		await terminal.flush();

		assert.strictEqual(terminal.getCellForeground(0, 5), undefined);
	});

	it("scrolls after a resize", async () => {
		const { app, terminal } = createApp({ lines: ["a", "b", "c", "d"] });
		app.start();
		terminal.sendInput(DOWN);
		terminal.sendInput(DOWN);
		terminal.sendInput(DOWN);
		terminal.resize(20, 5);

		const viewport = await terminal.flushAndGetViewport();
		assert.strictEqual(app.getSession().viewport.screenRows, 3);
		assert.strictEqual(app.getSession().viewport.rowOffset, 1);
		assert.deepStrictEqual(viewport.slice(0, 3), ["b", "c", "d"]);
	});

	it("expires the status message", async () => {
		let clock = 0;
		const { app, terminal } = createApp({ settings: { messageTimeoutMs: 1000 }, now: () => clock });
		app.start();

		clock = 999;
		assert.strictEqual(app.message, HELP_MESSAGE);

		clock = 1000;
		assert.strictEqual(app.message, undefined);
		terminal.sendInput(RIGHT);
		const viewport = await terminal.flushAndGetViewport();
		assert.strictEqual(viewport[9], "");
	});

	describe("search", () => {
		it("moves to matches and back on escape", async () => {
			const { app, terminal } = createApp({ lines: ["hello world", "goodbye world"] });
			app.start();
			terminal.sendInput(CTRL_F);
			assert.strictEqual(app.message, "Search:  (Use ESC/Arrows/Enter)");

			typeText(terminal, "world");
			assert.strictEqual(app.message, "Search: world (Use ESC/Arrows/Enter)");
			assert.deepStrictEqual(app.getSession().viewport.cursor, { column: 6, row: 0 });

			terminal.sendInput(DOWN);
			let viewport = await terminal.flushAndGetViewport();
			assert.deepStrictEqual(app.getSession().viewport.cursor, { column: 8, row: 1 });
			assert.strictEqual(viewport[0], "goodbye world");
			assert.deepStrictEqual(terminal.getCursorPosition(), { x: 8, y: 0 });

			terminal.sendInput("\x1b");
			viewport = await terminal.flushAndGetViewport();
			assert.deepStrictEqual(app.getSession().viewport.cursor, { column: 0, row: 0 });
			assert.strictEqual(viewport[0], "hello world");
			assert.strictEqual(app.message, undefined);
			assert.strictEqual(viewport[9], "");
			assert.strictEqual(app.getSession().search.active, false);
		});

		it("keeps the match on enter", async () => {
			const { app, terminal } = createApp({ lines: ["hello world", "goodbye world"] });
			app.start();
			terminal.sendInput(CTRL_F);
			typeText(terminal, "bye");
			terminal.sendInput("\r");
			await terminal.flush();

			assert.deepStrictEqual(app.getSession().viewport.cursor, { column: 4, row: 1 });
			assert.strictEqual(app.getSession().search.active, false);
			assert.strictEqual(app.message, undefined);
			assert.deepStrictEqual(terminal.getCursorPosition(), { x: 4, y: 0 });
		});

		it("takes pasted queries", () => {
			const { app, terminal } = createApp({ lines: ["alpha", "beta"] });
			app.start();
			terminal.sendInput(CTRL_F);
			terminal.sendInput(paste("et"));

			assert.strictEqual(app.message, "Search: et (Use ESC/Arrows/Enter)");
			assert.deepStrictEqual(app.getSession().viewport.cursor, { column: 1, row: 1 });
		});
	});

	describe("save", () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), "linepad-app-"));
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it("writes a named buffer", () => {
			const path = join(dir, "notes.txt");
			const { app, terminal } = createApp({ lines: ["one"], fileName: path });
			app.start();
			terminal.sendInput("1");
			terminal.sendInput(CTRL_S);

			assert.strictEqual(readFileSync(path, "utf-8"), "1one");
			assert.strictEqual(app.message, "4 bytes written to disk");
			assert.strictEqual(app.getSession().getBuffer().dirty, 0);
		});

		it("asks for a file name first", () => {
			const path = join(dir, "new.txt");
			const { app, terminal } = createApp({ lines: ["ab"] });
			app.start();
			terminal.sendInput(CTRL_S);
			assert.strictEqual(app.message, "Save as:  (ESC to cancel)");

			terminal.sendInput(paste(path));
			terminal.sendInput("\r");

			assert.strictEqual(readFileSync(path, "utf-8"), "ab");
			assert.strictEqual(app.message, "2 bytes written to disk");
			assert.strictEqual(app.getSession().getBuffer().fileName, path);
			assert.strictEqual(terminal.title, path);
		});

		it("aborts when the prompt is cancelled", () => {
			const { app, terminal } = createApp({ lines: ["ab"] });
			app.start();
			terminal.sendInput(CTRL_S);
			terminal.sendInput("\x1b");

			assert.strictEqual(app.message, "Save aborted");
			assert.strictEqual(app.getSession().getBuffer().fileName, undefined);
		});

		it("reports write failures", () => {
			const { app, terminal } = createApp({ lines: ["ab"], fileName: join(dir, "missing", "x.txt") });
			app.start();
			terminal.sendInput(CTRL_S);

			assert.match(app.message ?? "", /^Can't save! I\/O error: ENOENT/);
			assert.strictEqual(app.isRunning, true);
		});
	});

	describe("quit", () => {
		it("quits a clean buffer at once", async () => {
			const { app, terminal } = createApp({ lines: ["a"] });
			const done = app.run();
			terminal.sendInput(CTRL_Q);

			await done;
			assert.strictEqual(app.isRunning, false);
			assert.strictEqual(terminal.started, false);
		});

		it("asks for confirmation when there are unsaved changes", async () => {
			const { app, terminal } = createApp();
			const done = app.run();
			terminal.sendInput("a");

			terminal.sendInput(CTRL_Q);
			assert.strictEqual(app.message, "WARNING!!! File has unsaved changes. Press Ctrl-Q 2 more times to quit.");
			terminal.sendInput(CTRL_Q);
			assert.strictEqual(app.message, "WARNING!!! File has unsaved changes. Press Ctrl-Q 1 more times to quit.");
			assert.strictEqual(app.isRunning, true);

			terminal.sendInput(CTRL_Q);
			await done;
			assert.strictEqual(app.isRunning, false);
		});

		it("starts counting again after another key", () => {
			const { app, terminal } = createApp();
			app.start();
			terminal.sendInput("a");
			terminal.sendInput(CTRL_Q);
			terminal.sendInput("b");
			terminal.sendInput(CTRL_Q);

			assert.strictEqual(app.message, "WARNING!!! File has unsaved changes. Press Ctrl-Q 2 more times to quit.");
			assert.strictEqual(app.isRunning, true);
		});

		it("honours the quitTimes setting", async () => {
			const { app, terminal } = createApp({ settings: { quitTimes: 0 } });
			const done = app.run();
			terminal.sendInput("a");
			terminal.sendInput(CTRL_Q);

			await done;
			assert.strictEqual(app.isRunning, false);
		});
	});

	it("restores the terminal and rejects when a key handler throws", async () => {
		class FailingKeybindings extends EditorKeybindingsManager {
			matches(data: string, action: EditorAction): boolean {
				if (data === "!") throw new Error("boom");
				return super.matches(data, action);
			}
		}
		const { app, terminal } = createApp({ keybindings: new FailingKeybindings() });
		const done = app.run();
		terminal.sendInput("!");

		await assert.rejects(done, /boom/);
		assert.strictEqual(app.isRunning, false);
		assert.strictEqual(terminal.started, false);
	});
});
