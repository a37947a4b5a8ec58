import { assertInvariant } from "./errors.js";
import { renderLine } from "./tab-renderer.js";

/**
 * One logical row of the buffer.
 *
 * Keeps the characters and their tab-expanded rendering side by side. Every
 * mutator re-renders before returning, so `rendered` always matches `content`.
 */
export class Line {
	private chars: string[];
	private renderedText = "";

	constructor(content = "") {
		this.chars = Array.from(content);
		this.render();
	}

	get content(): string {
		return this.chars.join("");
	}

	get rendered(): string {
		return this.renderedText;
	}

	/** Length in characters */
	get length(): number {
		return this.chars.length;
	}

	insert(column: number, char: string): void {
		this.assertColumn(column);
		this.chars.splice(column, 0, char);
		this.render();
	}

	/** Remove the character at `column` */
	remove(column: number): void {
		assertInvariant(column >= 0 && column < this.chars.length, `remove at ${column} of ${this.chars.length}`);
		this.chars.splice(column, 1);
		this.render();
	}

	/** Cut the line at `column` and return what followed it */
	truncate(column: number): string {
		this.assertColumn(column);
		const rest = this.chars.splice(column);
		this.render();
		return rest.join("");
	}

	append(text: string): void {
		this.chars.push(...Array.from(text));
		this.render();
	}

	private assertColumn(column: number): void {
		assertInvariant(
			Number.isInteger(column) && column >= 0 && column <= this.chars.length,
			`column ${column} outside 0..${this.chars.length}`,
		);
	}

	private render(): void {
		this.renderedText = renderLine(this.chars);
	}
}
