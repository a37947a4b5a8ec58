/**
 * Keyboard input decoding for legacy (VT100/xterm) terminal sequences.
 *
 * API:
 * - parseKey(data) - Decode one input sequence into a key identifier
 * - matchesKey(data, keyId) - Check if input matches a key identifier
 * - decodePrintable(data) - The character to insert for printable input
 * - isKeyId(value) - Validate a key identifier read from configuration
 *
 * Modifier order in identifiers does not matter for matching; parseKey always
 * reports modifiers as ctrl, then shift, then alt.
 */

// =============================================================================
// Type-Safe Key Identifiers
// =============================================================================

type Letter =
	| "a"
	| "b"
	| "c"
	| "d"
	| "e"
	| "f"
	| "g"
	| "h"
	| "i"
	| "j"
	| "k"
	| "l"
	| "m"
	| "n"
	| "o"
	| "p"
	| "q"
	| "r"
	| "s"
	| "t"
	| "u"
	| "v"
	| "w"
	| "x"
	| "y"
	| "z";

type Digit = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9";

type SymbolKey = "`" | "-" | "=" | "[" | "]" | "\\" | ";" | "'" | "," | "." | "/";

type SpecialKey =
	| "escape"
	| "enter"
	| "tab"
	| "space"
	| "backspace"
	| "delete"
	| "insert"
	| "home"
	| "end"
	| "pageUp"
	| "pageDown"
	| "up"
	| "down"
	| "left"
	| "right";

type BaseKey = Letter | Digit | SymbolKey | SpecialKey;

/**
 * Union type of all valid key identifiers.
 */
export type KeyId =
	| BaseKey
	| `ctrl+${BaseKey}`
	| `shift+${BaseKey}`
	| `alt+${BaseKey}`
	| `ctrl+shift+${BaseKey}`
	| `shift+ctrl+${BaseKey}`
	| `ctrl+alt+${BaseKey}`
	| `alt+ctrl+${BaseKey}`
	| `shift+alt+${BaseKey}`
	| `alt+shift+${BaseKey}`
	| `ctrl+shift+alt+${BaseKey}`;

const SPECIAL_KEYS: ReadonlySet<string> = new Set<SpecialKey>([
	"escape",
	"enter",
	"tab",
	"space",
	"backspace",
	"delete",
	"insert",
	"home",
	"end",
	"pageUp",
	"pageDown",
	"up",
	"down",
	"left",
	"right",
]);

const SYMBOL_KEYS: ReadonlySet<string> = new Set<SymbolKey>(["`", "-", "=", "[", "]", "\\", ";", "'", ",", ".", "/"]);

function isBaseKey(key: string): key is BaseKey {
	return SPECIAL_KEYS.has(key) || SYMBOL_KEYS.has(key) || /^[a-z0-9]$/.test(key);
}

// =============================================================================
// Legacy Sequences
// =============================================================================

const MODIFIERS = {
	shift: 1,
	alt: 2,
	ctrl: 4,
} as const;

interface ParsedKeyId {
	key: BaseKey;
	ctrl: boolean;
	shift: boolean;
	alt: boolean;
}

const LEGACY_SEQUENCES: Record<string, KeyId> = {
	"\x1b[A": "up",
	"\x1b[B": "down",
	"\x1b[C": "right",
	"\x1b[D": "left",
	"\x1bOA": "up",
	"\x1bOB": "down",
	"\x1bOC": "right",
	"\x1bOD": "left",
	"\x1b[H": "home",
	"\x1bOH": "home",
	"\x1b[1~": "home",
	"\x1b[7~": "home",
	"\x1b[F": "end",
	"\x1bOF": "end",
	"\x1b[4~": "end",
	"\x1b[8~": "end",
	"\x1b[2~": "insert",
	"\x1b[3~": "delete",
	"\x1b[5~": "pageUp",
	"\x1b[[5~": "pageUp",
	"\x1b[6~": "pageDown",
	"\x1b[[6~": "pageDown",
	"\x1bOM": "enter",
	"\x1b[Z": "shift+tab",
	"\x1b": "escape",
	"\t": "tab",
	"\r": "enter",
	"\n": "enter",
	" ": "space",
	"\x7f": "backspace",
	"\x08": "backspace",
	"\x00": "ctrl+space",
	"\x1c": "ctrl+\\",
	"\x1d": "ctrl+]",
	"\x1f": "ctrl+-",
	"\x1b\r": "alt+enter",
	"\x1b\x7f": "alt+backspace",
};

/** Final byte of an xterm `CSI 1 ; <modifier> <final>` sequence */
const CSI_LETTER_KEYS: Record<string, BaseKey> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
};

/** Number of an xterm `CSI <number> ; <modifier> ~` sequence */
const CSI_TILDE_KEYS: Record<string, BaseKey> = {
	"2": "insert",
	"3": "delete",
	"5": "pageUp",
	"6": "pageDown",
};

function formatKeyId(parsed: ParsedKeyId): string {
	const mods: string[] = [];
	if (parsed.ctrl) mods.push("ctrl");
	if (parsed.shift) mods.push("shift");
	if (parsed.alt) mods.push("alt");
	return mods.length > 0 ? `${mods.join("+")}+${parsed.key}` : parsed.key;
}

function parseKeyId(keyId: string): ParsedKeyId | undefined {
	const parts = keyId.split("+");
	const key = parts.pop();
	if (key === undefined || !isBaseKey(key)) return undefined;
	if (!parts.every((part) => part === "ctrl" || part === "shift" || part === "alt")) return undefined;
	if (new Set(parts).size !== parts.length) return undefined;
	return {
		key,
		ctrl: parts.includes("ctrl"),
		shift: parts.includes("shift"),
		alt: parts.includes("alt"),
	};
}

function withModifier(key: BaseKey, modifierField: string): ParsedKeyId {
	const modifier = Number.parseInt(modifierField, 10) - 1;
	return {
		key,
		shift: (modifier & MODIFIERS.shift) !== 0,
		alt: (modifier & MODIFIERS.alt) !== 0,
		ctrl: (modifier & MODIFIERS.ctrl) !== 0,
	};
}

function parseModifiedSequence(data: string): ParsedKeyId | undefined {
	const letterMatch = /^\x1b\[1;(\d+)([A-Z])$/.exec(data);
	if (letterMatch) {
		const key = CSI_LETTER_KEYS[letterMatch[2]];
		return key ? withModifier(key, letterMatch[1]) : undefined;
	}
	const tildeMatch = /^\x1b\[(\d+);(\d+)~$/.exec(data);
	if (tildeMatch) {
		const key = CSI_TILDE_KEYS[tildeMatch[1]];
		return key ? withModifier(key, tildeMatch[2]) : undefined;
	}
	return undefined;
}

function parseSingleChar(char: string): ParsedKeyId | undefined {
	const code = char.charCodeAt(0);
	// Ctrl+letter arrives as 0x01-0x1a
	if (code >= 1 && code <= 26) {
		const key = String.fromCharCode(code + 96);
		return isBaseKey(key) ? { key, ctrl: true, shift: false, alt: false } : undefined;
	}
	if (char >= "A" && char <= "Z") {
		const key = char.toLowerCase();
		return isBaseKey(key) ? { key, ctrl: false, shift: true, alt: false } : undefined;
	}
	return isBaseKey(char) ? { key: char, ctrl: false, shift: false, alt: false } : undefined;
}

function parse(data: string): ParsedKeyId | undefined {
	const legacy = LEGACY_SEQUENCES[data];
	if (legacy) return parseKeyId(legacy);

	const modified = parseModifiedSequence(data);
	if (modified) return modified;

	if (data.length === 1) {
		return parseSingleChar(data);
	}

	// Alt+key arrives as ESC followed by the key
	if (data.length === 2 && data[0] === "\x1b") {
		const inner = parseSingleChar(data[1]);
		return inner ? { ...inner, alt: true } : undefined;
	}

	return undefined;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check whether a configured string is a valid key identifier.
 */
export function isKeyId(value: string): value is KeyId {
	return parseKeyId(value) !== undefined;
}

/**
 * Parse input data and return the key identifier if recognized.
 *
 * @param data - One input sequence, as emitted by StdinBuffer
 * @returns Key identifier (e.g. "ctrl+s", "shift+up") or undefined
 */
export function parseKey(data: string): string | undefined {
	const parsed = parse(data);
	return parsed ? formatKeyId(parsed) : undefined;
}

/**
 * Match input data against a key identifier.
 *
 * @param data - Raw input data from terminal
 * @param keyId - Key identifier (e.g. "ctrl+q", "pageDown")
 */
export function matchesKey(data: string, keyId: KeyId): boolean {
	const expected = parseKeyId(keyId);
	const actual = parse(data);
	if (!expected || !actual) return false;
	return (
		expected.key === actual.key &&
		expected.ctrl === actual.ctrl &&
		expected.shift === actual.shift &&
		expected.alt === actual.alt
	);
}

/**
 * The character a printable input sequence inserts, or undefined for control
 * characters and escape sequences.
 */
export function decodePrintable(data: string): string | undefined {
	const chars = Array.from(data);
	if (chars.length !== 1) return undefined;
	const code = data.codePointAt(0);
	if (code === undefined || code < 0x20 || code === 0x7f) return undefined;
	// C1 control block
	if (code >= 0x80 && code < 0xa0) return undefined;
	return data;
}
