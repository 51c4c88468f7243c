import type { Action } from "./actionLog.js";

export function insertChar(ch: string): Action {
  return (buffer, { line, col }, cursor) => {
    const text = buffer.lineAt(line);
    buffer.lines[line] = text.slice(0, col) + ch + text.slice(col);
    cursor.line = line;
    cursor.col = col + 1;
  };
}

export const insertNewline: Action = (buffer, { line, col }, cursor) => {
  const text = buffer.lineAt(line);
  buffer.lines[line] = text.slice(0, col);
  buffer.lines.splice(line + 1, 0, text.slice(col));
  cursor.line = line + 1;
  cursor.col = 0;
};

export const deleteCharBackward: Action = (buffer, { line, col }, cursor) => {
  const text = buffer.lineAt(line);

  if (col > 0 && text.length > 0) {
    buffer.lines[line] = text.slice(0, col - 1) + text.slice(col);
    cursor.line = line;
    cursor.col = col - 1;
    return;
  }

  // At start of line, join with previous. Nothing precedes (0, 0).
  if (col === 0 && line !== 0) {
    const prev = buffer.lineAt(line - 1);
    buffer.lines[line - 1] = prev + text;
    buffer.lines.splice(line, 1);
    cursor.line = line - 1;
    cursor.col = prev.length;
  }
};

/**
 * Replaces every match of `pattern` on every line. The replacement is
 * inserted literally; `$1` and friends are not expanded.
 */
export function searchAndReplace(pattern: RegExp, replacement: string): Action {
  const global = pattern.global
    ? pattern
    : new RegExp(pattern.source, pattern.flags + "g");

  return (buffer, { line, col }, cursor) => {
    buffer.lines = buffer.lines.map((text) =>
      text.replace(global, () => replacement),
    );
    cursor.line = line;
    cursor.col = Math.min(col, buffer.lineAt(line).length);
  };
}
