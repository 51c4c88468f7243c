import { TextBuffer } from "./buffer.js";
import type { CarriedState, Cursor } from "./state.js";

/**
 * A buffer mutation. Must depend only on its arguments so that replaying
 * History from the pristine snapshot reproduces the live buffer.
 */
export type Action = (
  buffer: TextBuffer,
  carried: CarriedState,
  cursor: Cursor,
) => void;

export const NOOP = Symbol("noop");
export const UNDO = Symbol("undo");
export const REDO = Symbol("redo");

export type Sentinel = typeof NOOP | typeof UNDO | typeof REDO;
export type LogRequest = Action | Sentinel;

type Entry = { readonly action: Action; readonly carried: CarriedState };

/**
 * Owns the live buffer and its undo history. Undo rebuilds the buffer by
 * replaying every remaining entry against a clone of the starting lines, so
 * actions never need an inverse.
 */
export class ActionLog {
  private readonly pristine: TextBuffer;
  private live: TextBuffer;
  private history: Entry[] = [];
  private redoStack: Entry[] = [];
  private savedHistory: readonly Entry[] = [];

  constructor(
    initial: readonly string[],
    private readonly carry: () => CarriedState,
    private readonly cursor: Cursor,
  ) {
    this.pristine = new TextBuffer(initial);
    this.live = this.pristine.clone();
  }

  get lines(): readonly string[] {
    return this.live.lines;
  }

  get historySize() {
    return this.history.length;
  }

  get redoSize() {
    return this.redoStack.length;
  }

  apply(request: LogRequest): readonly string[] {
    if (request === NOOP) return this.lines;
    if (request === UNDO) {
      this.undo();
      return this.lines;
    }
    if (request === REDO) {
      this.redo();
      return this.lines;
    }

    // branching history is not kept
    if (this.commit({ action: request, carried: this.carry() })) {
      this.redoStack = [];
    }
    return this.lines;
  }

  markSaved() {
    this.savedHistory = [...this.history];
  }

  isDirty(): boolean {
    if (this.savedHistory.length !== this.history.length) return true;
    return this.history.some((entry, i) => entry !== this.savedHistory[i]);
  }

  /** Runs an entry against live state; records it only if the buffer changed. */
  private commit(entry: Entry): boolean {
    const before = [...this.live.lines];
    entry.action(this.live, entry.carried, this.cursor);
    if (this.live.equals(before)) return false;
    this.history.push(entry);
    return true;
  }

  private undo() {
    const entry = this.history.pop();
    if (!entry) return;
    this.redoStack.push(entry);

    this.live = this.pristine.clone();
    for (const { action, carried } of this.history) {
      action(this.live, carried, this.cursor);
    }
    // back to where the undone edit was made
    this.cursor.line = entry.carried.line;
    this.cursor.col = entry.carried.col;
    this.clampCursor();
  }

  private redo() {
    const entry = this.redoStack.pop();
    if (!entry) return;
    this.commit(entry);
  }

  private clampCursor() {
    const line = Math.max(
      0,
      Math.min(this.cursor.line, this.live.lineCount() - 1),
    );
    const col = Math.max(
      0,
      Math.min(this.cursor.col, this.live.lineAt(line).length),
    );
    this.cursor.line = line;
    this.cursor.col = col;
  }
}
