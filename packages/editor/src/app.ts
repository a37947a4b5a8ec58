import {
	type CommandOutcome,
	type CursorDirection,
	type EditorCommand,
	EditorSession,
	type LineBuffer,
} from "@linepad/core";
import {
	decodePrintable,
	type EditorAction,
	type EditorKeybindingsManager,
	getEditorKeybindings,
	type Terminal,
} from "@linepad/tui";
import { APP_NAME, VERSION } from "./config.js";
import { DebugLog } from "./debug-log.js";
import { LinePrompt } from "./prompt.js";
import { defaultEditorTheme, EditorScreen, type EditorTheme, textRows } from "./screen.js";
import type { SettingsManager } from "./settings-manager.js";
import { StatusMessage } from "./status-message.js";

export const HELP_MESSAGE = "HELP: Ctrl-S = save | Ctrl-F = find | Ctrl-Q = quit";

const PASTE_START = "\x1b[200~";
const PASTE_END = "\x1b[201~";

const CURSOR_ACTIONS: ReadonlyArray<[EditorAction, CursorDirection]> = [
	["cursorUp", "up"],
	["cursorDown", "down"],
	["cursorLeft", "left"],
	["cursorRight", "right"],
	["cursorLineStart", "home"],
	["cursorLineEnd", "end"],
];

export interface EditorAppOptions {
	terminal: Terminal;
	settings: SettingsManager;
	/** Buffer to edit; an empty unnamed buffer when omitted */
	buffer?: LineBuffer;
	theme?: EditorTheme;
	keybindings?: EditorKeybindingsManager;
	log?: DebugLog;
	/** Clock for message expiry */
	now?: () => number;
}

/**
 * The editor control loop: decodes terminal input into session commands and
 * repaints after each one.
 */
export class EditorApp {
	private terminal: Terminal;
	private session: EditorSession;
	private screen: EditorScreen;
	private keybindings: EditorKeybindingsManager;
	private log: DebugLog;
	private status: StatusMessage;
	private prompt?: LinePrompt;
	private promptDone?: (value: string | undefined) => void;
	private readonly quitTimes: number;
	private quitRemaining: number;
	private running = false;
	private exitHandlers?: { resolve: () => void; reject: (error: unknown) => void };

	constructor(options: EditorAppOptions) {
		const { terminal, settings } = options;
		this.terminal = terminal;
		this.keybindings = options.keybindings ?? getEditorKeybindings();
		this.log = options.log ?? new DebugLog();
		this.status = new StatusMessage(settings.getMessageTimeoutMs(), options.now);
		this.quitTimes = settings.getQuitTimes();
		this.quitRemaining = this.quitTimes;
		this.session = new EditorSession({
			screenColumns: terminal.columns,
			screenRows: textRows(terminal.rows),
			buffer: options.buffer,
		});
		this.screen = new EditorScreen(terminal, {
			theme: options.theme ?? defaultEditorTheme,
			highlightDigits: settings.getHighlightDigits(),
			showWelcome: settings.getShowWelcome(),
			welcome: `${APP_NAME} editor -- version ${VERSION}`,
		});
	}

	get isRunning(): boolean {
		return this.running;
	}

	getSession(): EditorSession {
		return this.session;
	}

	/** Current message bar text */
	get message(): string | undefined {
		return this.prompt?.message ?? this.status.current;
	}

	/**
	 * Take over the terminal and edit until the user quits.
	 * Rejects, with the terminal restored, if handling a key throws.
	 */
	run(): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			this.exitHandlers = { resolve, reject };
			this.start();
		});
	}

	start(): void {
		if (this.running) return;
		this.running = true;
		this.terminal.start(
			(data) => this.guard(() => this.handleInput(data)),
			() => this.guard(() => this.handleResize()),
		);
		this.terminal.setTitle(this.session.getBuffer().fileName ?? APP_NAME);
		this.terminal.clearScreen();
		this.status.set(HELP_MESSAGE);
		this.log.log(`start ${this.terminal.columns}x${this.terminal.rows}`);
		this.render();
	}

	/** Restore the terminal. Safe to call more than once. */
	stop(): void {
		if (!this.running) return;
		this.running = false;
		this.terminal.clearScreen();
		this.terminal.stop();
		this.log.log("stop");
	}

	handleInput(data: string): void {
		if (!this.running) return;

		if (data.startsWith(PASTE_START)) {
			const end = data.endsWith(PASTE_END) ? data.length - PASTE_END.length : data.length;
			this.handlePaste(data.slice(PASTE_START.length, end));
		} else if (this.prompt) {
			this.handlePromptInput(this.prompt, data);
		} else {
			this.handleEditorInput(data);
		}

		if (this.running) {
			this.render();
		}
	}

	handleResize(): void {
		this.session.resize(this.terminal.columns, textRows(this.terminal.rows));
		this.render();
	}

	private guard(action: () => void): void {
		try {
			action();
		} catch (error) {
			this.log.log(`error ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
			this.stop();
			if (!this.exitHandlers) throw error;
			this.exitHandlers.reject(error);
		}
	}

	private handleEditorInput(data: string): void {
		const kb = this.keybindings;

		if (kb.matches(data, "quit")) {
			this.handleQuit();
			return;
		}
		this.quitRemaining = this.quitTimes;

		for (const [action, direction] of CURSOR_ACTIONS) {
			if (kb.matches(data, action)) {
				this.execute({ type: "moveCursor", direction });
				return;
			}
		}

		if (kb.matches(data, "pageUp")) {
			this.execute({ type: "pageMove", direction: "up" });
		} else if (kb.matches(data, "pageDown")) {
			this.execute({ type: "pageMove", direction: "down" });
		} else if (kb.matches(data, "save")) {
			this.save();
		} else if (kb.matches(data, "find")) {
			this.find();
		} else if (kb.matches(data, "deleteCharBackward")) {
			this.execute({ type: "deleteBackward" });
		} else if (kb.matches(data, "deleteCharForward")) {
			this.execute({ type: "deleteForward" });
		} else if (kb.matches(data, "newLine")) {
			this.execute({ type: "insertNewline" });
		} else if (kb.matches(data, "tab")) {
			this.execute({ type: "insertChar", char: "\t" });
		} else {
			const char = decodePrintable(data);
			if (char !== undefined) {
				this.execute({ type: "insertChar", char });
			}
		}
	}

	private handlePromptInput(prompt: LinePrompt, data: string): void {
		const result = prompt.handleInput(data);
		if (result.type !== "pending") {
			const done = this.promptDone;
			this.prompt = undefined;
			this.promptDone = undefined;
			this.status.set("");
			done?.(result.type === "submitted" ? result.value : undefined);
		}
	}

	private openPrompt(prompt: LinePrompt, onDone?: (value: string | undefined) => void): void {
		this.prompt = prompt;
		this.promptDone = onDone;
	}

	private handlePaste(text: string): void {
		if (this.prompt) {
			this.prompt.paste(text);
			return;
		}
		this.quitRemaining = this.quitTimes;

		const chars = Array.from(text);
		for (let i = 0; i < chars.length; i++) {
			const char = chars[i];
			if (char === "\r" || char === "\n") {
				// CRLF is one line break
				if (char === "\r" && chars[i + 1] === "\n") i++;
				this.execute({ type: "insertNewline" });
			} else if (char === "\t" || decodePrintable(char) !== undefined) {
				this.execute({ type: "insertChar", char });
			}
		}
	}

	private handleQuit(): void {
		if (this.session.getBuffer().dirty > 0 && this.quitRemaining > 0) {
			this.status.set(
				`WARNING!!! File has unsaved changes. Press Ctrl-Q ${this.quitRemaining} more times to quit.`,
			);
			this.quitRemaining--;
			return;
		}
		this.stop();
		this.exitHandlers?.resolve();
	}

	private save(): void {
		if (this.session.getBuffer().fileName !== undefined) {
			this.reportSave(this.execute({ type: "save" }));
			return;
		}

		const prompt = new LinePrompt({
			format: (input) => `Save as: ${input} (ESC to cancel)`,
			keybindings: this.keybindings,
		});
		this.openPrompt(prompt, (fileName) => {
			if (fileName === undefined) {
				this.status.set("Save aborted");
				return;
			}
			const outcome = this.execute({ type: "save", fileName });
			this.reportSave(outcome);
			if (outcome.type === "saved") {
				this.terminal.setTitle(fileName);
			}
		});
	}

	private reportSave(outcome: CommandOutcome): void {
		if (outcome.type === "saved") {
			this.status.set(`${outcome.bytes} bytes written to disk`);
		} else if (outcome.type === "failed") {
			this.status.set(`Can't save! I/O error: ${outcome.error.message}`);
		}
	}

	private find(): void {
		this.execute({ type: "startSearch" });
		const prompt = new LinePrompt({
			format: (input) => `Search: ${input} (Use ESC/Arrows/Enter)`,
			keybindings: this.keybindings,
			onKey: (query, key) => {
				this.execute({ type: "searchKeystroke", query, key });
			},
		});
		this.openPrompt(prompt);
	}

	private execute(command: EditorCommand): CommandOutcome {
		const outcome = this.session.execute(command);
		if (this.log.enabled) {
			const detail = outcome.type === "failed" ? ` ${outcome.error.name}: ${outcome.error.message}` : "";
			this.log.log(`${command.type} -> ${outcome.type}${detail}`);
		}
		return outcome;
	}

	private render(): void {
		this.screen.render(this.session.frame(), this.message);
	}
}
