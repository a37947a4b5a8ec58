import * as fs from "node:fs";

/**
 * Append-only debug log, enabled by pointing LINEPAD_DEBUG_LOG at a file.
 *
 * Each line is an ISO timestamp followed by the message. Logging never
 * interrupts editing: the first failed write turns the log off and keeps the
 * error for inspection.
 */
export class DebugLog {
	private path: string;
	private writeError?: Error;

	constructor(path: string = process.env.LINEPAD_DEBUG_LOG || "") {
		this.path = path;
	}

	get enabled(): boolean {
		return this.path !== "";
	}

	/** The write failure that disabled the log, if one happened */
	get error(): Error | undefined {
		return this.writeError;
	}

	log(message: string): void {
		if (!this.path) return;
		try {
			fs.appendFileSync(this.path, `${new Date().toISOString()} ${message}\n`, { encoding: "utf8" });
		} catch (error) {
			this.path = "";
			this.writeError = error instanceof Error ? error : new Error(String(error));
		}
	}
}
