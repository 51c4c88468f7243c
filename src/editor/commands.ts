import { NOOP } from "./actionLog.js";
import { searchAndReplace } from "./actions.js";
import { TextBuffer } from "./buffer.js";
import type { Editor } from "./editor.js";
import { debugLogger } from "../utils/debugLogger.js";
import {
  CommandError,
  describeFileError,
  getErrorMessage,
} from "../utils/errors.js";

export type CommandHandler = (editor: Editor, args: string) => void;

export type EditorCommand = {
  name: string;
  title: string;
  run: CommandHandler;
};

export type Resolved = { command: EditorCommand; args: string };

export class CommandRegistry {
  private commands = new Map<string, EditorCommand>();

  register(command: EditorCommand): void {
    this.commands.set(command.name, command);
  }

  names(): string[] {
    return [...this.commands.keys()];
  }

  /**
   * Finds the longest registered name that prefixes `input`; whatever
   * follows it is the raw argument string. So `file a.txt` runs `file`
   * even though `f` is also registered.
   */
  resolve(input: string): Resolved | null {
    for (let len = input.length; len > 0; len--) {
      const command = this.commands.get(input.slice(0, len));
      if (command) return { command, args: input.slice(len) };
    }
    return null;
  }

  /** Returns false when nothing matched; the input is dropped. */
  execute(editor: Editor, input: string): boolean {
    const resolved = this.resolve(input);
    if (!resolved) {
      debugLogger.debug(
        `No command matches ":${input}" (known: ${this.names().join(" ")})`,
      );
      return false;
    }

    const { command, args } = resolved;
    debugLogger.debug(`:${command.name} (${command.title}) args=${JSON.stringify(args)}`);
    try {
      command.run(editor, args);
    } catch (error) {
      if (!(error instanceof CommandError)) {
        debugLogger.error(`Command "${command.name}" failed:`, error);
      }
      editor.notify(getErrorMessage(error));
    }
    return true;
  }
}

function fileArg(args: string, usage: string): string {
  const match = /^ +(\S.*)$/.exec(args);
  if (!match) throw new CommandError(`Usage: ${usage}`);
  return match[1].trim();
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new CommandError(`Invalid pattern: ${getErrorMessage(error)}`);
  }
}

const quit: EditorCommand = {
  name: "q",
  title: "Quit without saving",
  run: (editor) => editor.quit(),
};

const write: EditorCommand = {
  name: "w",
  title: "Write buffer to file",
  run: (editor, args) => {
    const filePath = fileArg(args, "w <filename>");
    const buffer = new TextBuffer(editor.apply(NOOP));
    try {
      buffer.saveToFile(filePath);
    } catch (error) {
      throw new CommandError(describeFileError(error, filePath));
    }
    editor.log.markSaved();
    editor.state.filePath = filePath;
    debugLogger.log(`Wrote ${buffer.lineCount()} lines to ${filePath}`);
  },
};

function openFile(editor: Editor, args: string, usage: string) {
  const filePath = fileArg(args, usage);
  let buffer: TextBuffer;
  try {
    buffer = TextBuffer.loadFromFile(filePath);
  } catch (error) {
    throw new CommandError(describeFileError(error, filePath));
  }
  editor.replaceBuffer(buffer.lines, filePath);
  debugLogger.log(`Opened ${filePath} (${buffer.lineCount()} lines)`);
}

const file: EditorCommand = {
  name: "file",
  title: "Open file",
  run: (editor, args) => openFile(editor, args, "file <filename>"),
};

const fileShort: EditorCommand = {
  name: "f",
  title: "Open file",
  run: (editor, args) => openFile(editor, args, "f <filename>"),
};

const debug: EditorCommand = {
  name: "debug",
  title: "Toggle diagnostics",
  run: (editor) => {
    editor.state.debug = !editor.state.debug;
  },
};

const search: EditorCommand = {
  name: "/",
  title: "Search",
  run: (editor, args) => {
    if (!args) throw new CommandError("Usage: /pattern");
    const pattern = compilePattern(args);
    const lines = editor.apply(NOOP);
    for (let line = 0; line < lines.length; line++) {
      const match = pattern.exec(lines[line]);
      if (match) {
        editor.state.cursor.line = line;
        editor.state.cursor.col = match.index;
        return;
      }
    }
    throw new CommandError(`Pattern not found: ${args}`);
  },
};

const substitute: EditorCommand = {
  name: "s",
  title: "Search and replace",
  run: (editor, args) => {
    const match = /^\/([^/]+)\/(.*)$/.exec(args);
    if (!match) throw new CommandError("Usage: s/search/replace");
    const [, source, replacement] = match;
    const pattern = compilePattern(source);
    const before = editor.log.historySize;
    editor.apply(searchAndReplace(pattern, replacement));
    // unchanged buffers are not recorded
    if (editor.log.historySize === before) {
      throw new CommandError(`Pattern not found: ${source}`);
    }
  },
};

export function createDefaultRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  for (const command of [quit, write, fileShort, file, debug, search, substitute]) {
    registry.register(command);
  }
  return registry;
}
