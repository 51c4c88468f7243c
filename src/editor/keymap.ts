import type { Mode } from "./state.js";

export const Key = {
  BACKSPACE: 8,
  NEWLINE: 10,
  RETURN: 13,
  CTRL_X: 24,
  CTRL_Z: 26,
  ESCAPE: 27,
  DELETE: 127,
} as const;

export type KeyHandler = () => void;

/** One row of 256 slots per mode, indexed by key code. */
export type Keymap = Record<Mode, ReadonlyArray<KeyHandler | undefined>>;

/** What key handlers drive. `Editor` is the one real implementation. */
export interface KeyTarget {
  setMode(mode: Mode): void;
  insert(ch: string): void;
  newline(): void;
  backspace(): void;
  undo(): void;
  redo(): void;
  moveCursor(dx: number, dy: number): void;
  moveToLineStart(): void;
  moveToLineEnd(): void;
  appendCommand(ch: string): void;
  deleteCommandChar(): void;
  submitCommand(): void;
  cancelCommand(): void;
}

export function isTextCode(code: number): boolean {
  return (code >= 32 && code <= 126) || (code >= 128 && code <= 255);
}

function emptyRow(): Array<KeyHandler | undefined> {
  return new Array<KeyHandler | undefined>(256).fill(undefined);
}

function bindText(row: Array<KeyHandler | undefined>, fn: (ch: string) => void) {
  for (let code = 0; code < 256; code++) {
    if (isTextCode(code)) {
      const ch = String.fromCharCode(code);
      row[code] = () => fn(ch);
    }
  }
}

function bindAll(
  row: Array<KeyHandler | undefined>,
  codes: readonly number[],
  handler: KeyHandler,
) {
  for (const code of codes) row[code] = handler;
}

const char = (c: string) => c.charCodeAt(0);

export function buildKeymap(t: KeyTarget): Keymap {
  const insert = emptyRow();
  bindText(insert, (ch) => t.insert(ch));
  bindAll(insert, [Key.NEWLINE, Key.RETURN], () => t.newline());
  bindAll(insert, [Key.DELETE, Key.BACKSPACE], () => t.backspace());
  insert[Key.CTRL_Z] = () => t.undo();
  // redo is Ctrl-X, not Ctrl-Y
  insert[Key.CTRL_X] = () => t.redo();
  insert[Key.ESCAPE] = () => t.setMode("normal");

  const normal = emptyRow();
  normal[char("i")] = () => t.setMode("insert");
  normal[char(":")] = () => t.setMode("command");
  normal[char("h")] = () => t.moveCursor(-1, 0);
  normal[char("l")] = () => t.moveCursor(+1, 0);
  normal[char("j")] = () => t.moveCursor(0, +1);
  normal[char("k")] = () => t.moveCursor(0, -1);
  normal[char("0")] = () => t.moveToLineStart();
  normal[char("$")] = () => t.moveToLineEnd();
  normal[Key.CTRL_Z] = () => t.undo();
  normal[Key.CTRL_X] = () => t.redo();

  const command = emptyRow();
  bindText(command, (ch) => t.appendCommand(ch));
  bindAll(command, [Key.DELETE, Key.BACKSPACE], () => t.deleteCommandChar());
  bindAll(command, [Key.NEWLINE, Key.RETURN], () => t.submitCommand());
  command[Key.ESCAPE] = () => t.cancelCommand();

  return { insert, normal, command };
}

export function lookupKey(
  keymap: Keymap,
  mode: Mode,
  code: number,
): KeyHandler | undefined {
  return keymap[mode][code];
}
