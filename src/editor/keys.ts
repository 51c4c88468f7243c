import { Key } from "./keymap.js";

/** The parts of a terminal keypress event the editor looks at. */
export type KeyEvent = {
  name?: string;
  ctrl?: boolean;
};

/**
 * Maps a keypress to the single byte the key tables are indexed by, or
 * null for keys that have no byte (arrows, function keys, wide characters).
 */
export function toKeyCode(
  ch: string | undefined,
  key: KeyEvent | undefined,
): number | null {
  switch (key?.name) {
    case "escape":
      return Key.ESCAPE;
    case "enter":
      return Key.NEWLINE;
    case "return":
      // the terminal layer follows every "return" with an "enter"
      return null;
    case "backspace":
      return Key.DELETE;
    default:
      break;
  }

  if (key?.ctrl && key.name && /^[a-z]$/.test(key.name)) {
    return key.name.charCodeAt(0) - 96;
  }

  if (ch && ch.length === 1) {
    const code = ch.charCodeAt(0);
    if (code < 256) return code;
  }
  return null;
}
