#!/usr/bin/env node
import blessed from "neo-blessed";
import path from "node:path";
import chalk from "chalk";
import { Command } from "commander";

import { loadConfig, type EditorConfig } from "./config/config.js";
import { TextBuffer } from "./editor/buffer.js";
import { Editor, type EditorUi } from "./editor/editor.js";
import { toKeyCode } from "./editor/keys.js";
import { renderFrame } from "./editor/view.js";
import { debugLogger } from "./utils/debugLogger.js";
import { FatalError, describeFileError } from "./utils/errors.js";

type CliOptions = {
  normal?: boolean;
  debug?: boolean;
  config?: string;
};

function parseArgs(argv: string[]): { file: string | undefined; options: CliOptions } {
  const program = new Command()
    .name("vibe")
    .description("vi barebones editor")
    .argument("[file]", "file to open")
    .option("-n, --normal", "start in normal mode")
    .option("-d, --debug", "show undo diagnostics in the status line")
    .option("-c, --config <path>", "config file to read")
    .parse(argv);

  const file: string | undefined = program.args[0];
  return { file, options: program.opts<CliOptions>() };
}

function startEditor(config: EditorConfig, file: string | undefined) {
  const screen = blessed.screen({
    smartCSR: true,
    title: "vibe",
    fullUnicode: true,
  });

  const editorBox = blessed.box({
    top: 0,
    left: 0,
    width: "100%",
    height: "100%-1",
    tags: false,
  });
  screen.append(editorBox);

  const status = blessed.box({
    bottom: 0,
    left: 0,
    width: "100%",
    height: 1,
    tags: false,
  });
  screen.append(status);

  // Blocking notices: the next key only dismisses it
  const notice = blessed.message({
    top: "center",
    left: "center",
    width: "60%",
    height: "shrink",
    border: "line",
    hidden: true,
    tags: false,
  });
  screen.append(notice);
  let noticeOpen = false;

  const exit = (code: number) => {
    screen.destroy();
    process.stdout.write(chalk.dim("Exiting...\n"));
    void debugLogger.close().finally(() => process.exit(code));
  };

  const ui: EditorUi = {
    notify: (message) => {
      noticeOpen = true;
      notice.display(message, 0, () => {
        noticeOpen = false;
        render();
      });
    },
    quit: () => exit(0),
  };

  const editor = new Editor(ui, {
    mode: config.initialMode,
    debug: config.debug,
  });

  function render() {
    const label = editor.state.filePath
      ? path.basename(editor.state.filePath)
      : "[No File]";
    const frame = renderFrame(
      editor.frameInput(),
      Number(screen.width),
      Number(screen.height),
      label,
    );
    editorBox.setContent(frame.body.join("\n"));
    status.setContent(frame.status);
    screen.render();
    screen.program.cup(frame.cursor.y, frame.cursor.x);
    screen.program.showCursor();
  }

  screen.key(["C-c"], () => exit(0));
  process.on("SIGTERM", () => exit(0));
  screen.on("resize", () => render());

  screen.on("keypress", (ch, key) => {
    if (noticeOpen || !editor.state.running) return;
    const code = toKeyCode(ch, key);
    if (code === null) return;
    editor.handleKey(code);
    if (editor.state.running) render();
  });

  render();

  if (file) {
    const filePath = path.resolve(file);
    try {
      editor.replaceBuffer(TextBuffer.loadFromFile(filePath).lines, filePath);
      debugLogger.log(`Opened ${filePath}`);
      render();
    } catch (error) {
      debugLogger.warn(`Could not open ${filePath}:`, error);
      ui.notify(describeFileError(error, filePath));
    }
  }
}

function main() {
  const { file, options } = parseArgs(process.argv);

  let config: EditorConfig;
  try {
    config = loadConfig(options.config, options);
  } catch (error) {
    if (error instanceof FatalError) {
      console.error(chalk.red(error.message));
      process.exit(error.exitCode);
    }
    throw error;
  }

  if (config.debugLogFile) debugLogger.setFile(config.debugLogFile);
  debugLogger.log(`Starting in ${config.initialMode} mode`);
  startEditor(config, file);
}

main();
