import assert from "node:assert";
import { describe, it } from "node:test";
import { StatusMessage } from "../src/status-message.js";

describe("StatusMessage", () => {
	it("is empty until a message is set", () => {
		const status = new StatusMessage(5000, () => 0);
		assert.strictEqual(status.current, undefined);
	});

	it("expires after the timeout", () => {
		let now = 1000;
		const status = new StatusMessage(5000, () => now);
		status.set("saved");

		now = 5999;
		assert.strictEqual(status.current, "saved");
		now = 6000;
		assert.strictEqual(status.current, undefined);
	});

	it("restarts the timeout when replaced", () => {
		let now = 0;
		const status = new StatusMessage(100, () => now);
		status.set("first");
		now = 90;
		status.set("second");
		now = 150;
		assert.strictEqual(status.current, "second");
	});
});
