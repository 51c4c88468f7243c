import type { EditorState } from "./state.js";

export type FrameInput = {
  lines: readonly string[];
  state: EditorState;
  dirty: boolean;
  historySize: number;
  redoSize: number;
};

export type Frame = {
  body: string[];
  status: string;
  cursor: { x: number; y: number };
};

/** Scrolls by whole lines so the cursor row is on screen. */
export function ensureCursorVisible(state: EditorState, bodyHeight: number) {
  const height = Math.max(1, bodyHeight);
  if (state.cursor.line < state.scrollTop) state.scrollTop = state.cursor.line;
  if (state.cursor.line >= state.scrollTop + height)
    state.scrollTop = state.cursor.line - height + 1;
  if (state.scrollTop < 0) state.scrollTop = 0;
}

export function statusLine(input: FrameInput, fileLabel: string): string {
  const { state } = input;
  const dirty = input.dirty ? "*" : "";

  if (state.mode === "command") return `:${state.commandLine}`;

  const pos = `${state.cursor.line},${state.cursor.col}`;
  let status = ` ${state.mode.toUpperCase()}  ${fileLabel}${dirty}  ${pos}`;
  if (state.debug) {
    const key = state.lastKey ?? "-";
    status += `  [history:${input.historySize} redo:${input.redoSize} key:${key}]`;
  }
  return status;
}

/**
 * Lays out one screen: `height - 1` rows of text and a status row. Lines
 * longer than the width are cut, not wrapped.
 */
export function renderFrame(
  input: FrameInput,
  width: number,
  height: number,
  fileLabel = input.state.filePath ?? "[No File]",
): Frame {
  const { state, lines } = input;
  const bodyHeight = Math.max(1, height - 1);
  ensureCursorVisible(state, bodyHeight);

  const body: string[] = [];
  for (let i = 0; i < bodyHeight; i++) {
    const row = state.scrollTop + i;
    if (row >= lines.length) {
      body.push("~");
      continue;
    }
    body.push(lines[row].slice(0, width));
  }

  const status = statusLine(input, fileLabel);
  const cursor =
    state.mode === "command"
      ? { x: status.length, y: bodyHeight }
      : { x: state.cursor.col, y: state.cursor.line - state.scrollTop };

  return { body, status, cursor };
}
