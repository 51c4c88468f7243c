export type Mode = "insert" | "normal" | "command";

export type Cursor = { line: number; col: number };

/**
 * Cursor position captured when a key is received. Actions replay against
 * this, never against wherever the live cursor has since moved.
 */
export type CarriedState = Readonly<{ line: number; col: number }>;

export type EditorState = {
  mode: Mode;
  filePath: string | null;

  cursor: Cursor;
  scrollTop: number;

  // Command line
  commandLine: string;

  debug: boolean;
  lastKey: number | null;
  running: boolean;
};

export function createEditorState(
  init: { mode?: Mode; debug?: boolean } = {},
): EditorState {
  return {
    mode: init.mode ?? "insert",
    filePath: null,
    cursor: { line: 0, col: 0 },
    scrollTop: 0,
    commandLine: "",
    debug: init.debug ?? false,
    lastKey: null,
    running: true,
  };
}

export function carry(cursor: Cursor): CarriedState {
  return Object.freeze({ line: cursor.line, col: cursor.col });
}
