/**
 * Errors reported by the editor core.
 *
 * EditorError subclasses are user-level failures: they travel back to the shell as a
 * `failed` command outcome. InvariantError marks a broken internal invariant and is
 * never converted into an outcome.
 */

export class EditorError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** A file could not be read or written. */
export class IoError extends EditorError {
	readonly path: string;
	/** System error code of the failing call (ENOENT, EACCES, ...), when there is one */
	readonly code?: string;

	constructor(path: string, message: string, options?: ErrorOptions & { code?: string }) {
		super(message, options);
		this.path = path;
		this.code = options?.code;
	}

	static from(path: string, error: unknown): IoError {
		if (error instanceof Error) {
			const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
			return new IoError(path, error.message, { cause: error, code });
		}
		return new IoError(path, String(error), { cause: error });
	}
}

/** Save was requested for a buffer that has no associated file. */
export class NoFileNameError extends EditorError {
	constructor() {
		super("no file name specified");
	}
}

export class InvariantError extends Error {
	constructor(message: string) {
		super(`Invariant violated: ${message}`);
		this.name = "InvariantError";
	}
}

export function assertInvariant(condition: boolean, message: string): asserts condition {
	if (!condition) {
		throw new InvariantError(message);
	}
}
