/**
 * Message shown in the bottom bar until it expires.
 */
export class StatusMessage {
	private text = "";
	private setAt = 0;
	private readonly timeoutMs: number;
	private readonly now: () => number;

	constructor(timeoutMs: number, now: () => number = Date.now) {
		this.timeoutMs = timeoutMs;
		this.now = now;
	}

	set(text: string): void {
		this.text = text;
		this.setAt = this.now();
	}

	/** The message, or undefined once it is older than the timeout */
	get current(): string | undefined {
		if (!this.text || this.now() - this.setAt >= this.timeoutMs) {
			return undefined;
		}
		return this.text;
	}
}
