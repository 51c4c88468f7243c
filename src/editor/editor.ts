import { ActionLog, NOOP, REDO, UNDO, type LogRequest } from "./actionLog.js";
import { deleteCharBackward, insertChar, insertNewline } from "./actions.js";
import { CommandRegistry, createDefaultRegistry } from "./commands.js";
import { buildKeymap, lookupKey, type KeyTarget, type Keymap } from "./keymap.js";
import {
  carry,
  createEditorState,
  type CarriedState,
  type EditorState,
  type Mode,
} from "./state.js";
import type { FrameInput } from "./view.js";

/** Terminal-side services the editor calls out to. */
export interface EditorUi {
  /** Shows a message the user must acknowledge before typing on. */
  notify(message: string): void;
  quit(): void;
}

export type EditorOptions = {
  mode?: Mode;
  debug?: boolean;
  lines?: readonly string[];
  filePath?: string | null;
  commands?: CommandRegistry;
};

export class Editor implements KeyTarget {
  readonly state: EditorState;
  readonly commands: CommandRegistry;
  private _log: ActionLog;
  private readonly keymap: Keymap;
  private keyCarried: CarriedState | null = null;

  constructor(
    private readonly ui: EditorUi,
    options: EditorOptions = {},
  ) {
    this.state = createEditorState({ mode: options.mode, debug: options.debug });
    this.state.filePath = options.filePath ?? null;
    this.commands = options.commands ?? createDefaultRegistry();
    this._log = this.createLog(options.lines ?? [""]);
    this.keymap = buildKeymap(this);
  }

  get log(): ActionLog {
    return this._log;
  }

  private createLog(lines: readonly string[]) {
    return new ActionLog(
      lines,
      () => this.keyCarried ?? carry(this.state.cursor),
      this.state.cursor,
    );
  }

  apply(request: LogRequest): readonly string[] {
    return this._log.apply(request);
  }

  /** Dispatches one key code. Codes with no binding in the current mode do nothing. */
  handleKey(code: number): void {
    this.state.lastKey = code;
    const handler = lookupKey(this.keymap, this.state.mode, code);
    if (!handler) return;

    this.keyCarried = carry(this.state.cursor);
    try {
      handler();
    } finally {
      this.keyCarried = null;
    }
  }

  setMode(mode: Mode): void {
    this.state.mode = mode;
    if (mode === "command") this.state.commandLine = "";
  }

  insert(ch: string): void {
    this.apply(insertChar(ch));
  }

  newline(): void {
    this.apply(insertNewline);
  }

  backspace(): void {
    this.apply(deleteCharBackward);
  }

  undo(): void {
    this.apply(UNDO);
  }

  redo(): void {
    this.apply(REDO);
  }

  moveCursor(dx: number, dy: number): void {
    const lines = this.apply(NOOP);
    const cursor = this.state.cursor;
    const line = Math.max(0, Math.min(cursor.line + dy, lines.length - 1));
    const col = Math.max(0, Math.min(cursor.col + dx, lines[line].length));
    cursor.line = line;
    cursor.col = col;
  }

  moveToLineStart(): void {
    this.state.cursor.col = 0;
  }

  moveToLineEnd(): void {
    const lines = this.apply(NOOP);
    this.state.cursor.col = lines[this.state.cursor.line].length;
  }

  appendCommand(ch: string): void {
    this.state.commandLine += ch;
  }

  deleteCommandChar(): void {
    this.state.commandLine = this.state.commandLine.slice(0, -1);
  }

  submitCommand(): void {
    const input = this.state.commandLine;
    this.commands.execute(this, input);
    this.state.commandLine = "";
    this.state.mode = "normal";
  }

  cancelCommand(): void {
    this.state.commandLine = "";
    this.state.mode = "normal";
  }

  /** Swaps in a fresh history over `lines`. Mode is left as it is. */
  replaceBuffer(lines: readonly string[], filePath: string | null): void {
    this.state.cursor.line = 0;
    this.state.cursor.col = 0;
    this.state.scrollTop = 0;
    this.state.filePath = filePath;
    this._log = this.createLog(lines);
  }

  notify(message: string): void {
    this.ui.notify(message);
  }

  quit(): void {
    this.state.running = false;
    this.ui.quit();
  }

  frameInput(): FrameInput {
    return {
      lines: this.apply(NOOP),
      state: this.state,
      dirty: this._log.isDirty(),
      historySize: this._log.historySize,
      redoSize: this._log.redoSize,
    };
  }
}
