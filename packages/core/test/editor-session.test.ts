import assert from "node:assert";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import { type EditorCommand, EditorSession } from "../src/editor-session.js";
import { IoError, NoFileNameError } from "../src/errors.js";
import { LineBuffer } from "../src/line-buffer.js";

function run(session: EditorSession, commands: EditorCommand[]): void {
	for (const command of commands) {
		assert.deepStrictEqual(session.execute(command), { type: "applied" });
	}
}

function typeText(session: EditorSession, text: string): void {
	run(session, Array.from(text, (char): EditorCommand => ({ type: "insertChar", char })));
}

describe("EditorSession", () => {
	it("types into an empty buffer", () => {
		const session = new EditorSession({ screenColumns: 80, screenRows: 3 });
		typeText(session, "hi");

		const frame = session.frame();
		assert.deepStrictEqual(frame.rows, ["hi", undefined, undefined]);
		assert.deepStrictEqual(frame.cursor, { column: 2, row: 0 });
		assert.strictEqual(frame.lineCount, 1);
		assert.strictEqual(frame.dirty, 3);
		assert.strictEqual(frame.fileName, undefined);
	});

	it("splits a line on newline and inserts above at column 0", () => {
		const session = new EditorSession({ screenColumns: 80, screenRows: 5 });
		typeText(session, "hi");
		run(session, [{ type: "moveCursor", direction: "left" }, { type: "insertNewline" }]);
		assert.deepStrictEqual(session.frame().rows.slice(0, 2), ["h", "i"]);
		assert.deepStrictEqual(session.viewport.cursor, { column: 0, row: 1 });

		run(session, [{ type: "insertNewline" }]);
		assert.strictEqual(session.getBuffer().toText(), "h\n\ni");
		assert.deepStrictEqual(session.viewport.cursor, { column: 0, row: 2 });
	});

	it("deletes backward and forward", () => {
		const session = new EditorSession({
			screenColumns: 80,
			screenRows: 5,
			buffer: new LineBuffer(["abc", "de"]),
		});
		session.viewport.setCursor({ column: 1, row: 0 });

		run(session, [{ type: "deleteForward" }]);
		assert.strictEqual(session.getBuffer().getRow(0), "ac");
		assert.deepStrictEqual(session.viewport.cursor, { column: 1, row: 0 });

		run(session, [{ type: "moveCursor", direction: "end" }, { type: "deleteForward" }]);
		assert.strictEqual(session.getBuffer().toText(), "acde");
		assert.deepStrictEqual(session.viewport.cursor, { column: 2, row: 0 });

		run(session, [{ type: "deleteBackward" }]);
		assert.strictEqual(session.getBuffer().toText(), "ade");
		assert.deepStrictEqual(session.viewport.cursor, { column: 1, row: 0 });
	});

	it("treats backspace at the start of the buffer as a no-op", () => {
		const session = new EditorSession({ screenColumns: 80, screenRows: 5, buffer: new LineBuffer(["x"]) });
		run(session, [{ type: "deleteBackward" }]);
		assert.strictEqual(session.getBuffer().toText(), "x");
		assert.strictEqual(session.frame().dirty, 0);
	});

	it("pages through the buffer", () => {
		const lines = Array.from({ length: 20 }, (_, i) => `row ${i}`);
		const session = new EditorSession({ screenColumns: 80, screenRows: 5, buffer: new LineBuffer(lines) });

		run(session, [{ type: "pageMove", direction: "down" }]);
		assert.strictEqual(session.frame().cursorRow, 4);
		assert.strictEqual(session.frame().rows[0], "row 0");
	});

	it("drives a search session", () => {
		const session = new EditorSession({
			screenColumns: 80,
			screenRows: 5,
			buffer: new LineBuffer(["hello world", "goodbye world"]),
		});

		run(session, [
			{ type: "startSearch" },
			{ type: "searchKeystroke", query: "world", key: "other" },
			{ type: "searchKeystroke", query: "world", key: "down" },
		]);
		assert.strictEqual(session.search.active, true);
		assert.deepStrictEqual(session.viewport.cursor, { column: 8, row: 1 });

		run(session, [{ type: "searchKeystroke", query: "world", key: "enter" }]);
		assert.strictEqual(session.search.active, false);

		const frame = session.frame();
		assert.deepStrictEqual(frame.rows, ["goodbye world", undefined, undefined, undefined, undefined]);
		assert.deepStrictEqual(frame.cursor, { column: 8, row: 0 });
	});

	it("clips rows to the screen width", () => {
		const session = new EditorSession({ screenColumns: 4, screenRows: 2, buffer: new LineBuffer(["a\tb"]) });
		assert.deepStrictEqual(session.frame().rows, ["a   ", undefined]);

		session.resize(10, 1);
		assert.deepStrictEqual(session.frame().rows, ["a       b"]);
	});

	describe("files", () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), "linepad-session-"));
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it("reports a save without a file name", () => {
			const session = new EditorSession({ screenColumns: 80, screenRows: 5 });
			typeText(session, "x");

			const outcome = session.execute({ type: "save" });
			assert.strictEqual(outcome.type, "failed");
			assert.ok(outcome.type === "failed" && outcome.error instanceof NoFileNameError);
		});

		it("saves under a new name", () => {
			const path = join(dir, "notes.txt");
			const session = new EditorSession({ screenColumns: 80, screenRows: 5 });
			typeText(session, "abc");

			assert.deepStrictEqual(session.execute({ type: "save", fileName: path }), { type: "saved", path, bytes: 3 });
			assert.strictEqual(readFileSync(path, "utf-8"), "abc");
			assert.strictEqual(session.frame().dirty, 0);
			assert.strictEqual(session.frame().fileName, path);
		});

		it("reports a failed write", () => {
			const session = new EditorSession({ screenColumns: 80, screenRows: 5, buffer: new LineBuffer(["a"], dir) });
			const outcome = session.execute({ type: "save" });
			assert.ok(outcome.type === "failed" && outcome.error instanceof IoError);
		});

		it("loads a file and resets the cursor", () => {
			const path = join(dir, "two.txt");
			writeFileSync(path, "one\ntwo\n");
			const session = new EditorSession({ screenColumns: 80, screenRows: 5, buffer: new LineBuffer(["old"]) });
			session.viewport.setCursor({ column: 2, row: 0 });

			assert.deepStrictEqual(session.execute({ type: "load", path }), { type: "loaded", path, lineCount: 2 });
			assert.deepStrictEqual(session.viewport.cursor, { column: 0, row: 0 });
			assert.deepStrictEqual(session.frame().rows.slice(0, 3), ["one", "two", undefined]);
			assert.strictEqual(session.frame().dirty, 0);
		});

		it("keeps the current buffer when a load fails", () => {
			const session = new EditorSession({ screenColumns: 80, screenRows: 5, buffer: new LineBuffer(["kept"]) });
			const outcome = session.execute({ type: "load", path: join(dir, "missing.txt") });

			assert.ok(outcome.type === "failed" && outcome.error instanceof IoError && outcome.error.code === "ENOENT");
			assert.strictEqual(session.getBuffer().toText(), "kept");
		});
	});
});
