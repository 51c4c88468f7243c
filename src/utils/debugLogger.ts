import * as fs from "node:fs";
import * as util from "node:util";

type Level = "LOG" | "WARN" | "ERROR" | "DEBUG";

/**
 * Developer-facing log. The terminal belongs to the editor screen, so
 * messages only ever go to a file: `VIBE_DEBUG_LOG_FILE`, or the path set
 * from config at startup. With neither, logging is off.
 */
export class DebugLogger {
  private logStream: fs.WriteStream | undefined;

  constructor(filePath: string | undefined = process.env["VIBE_DEBUG_LOG_FILE"]) {
    this.setFile(filePath);
  }

  setFile(filePath: string | undefined) {
    this.logStream?.end();
    const stream = filePath
      ? fs.createWriteStream(filePath, { flags: "a" })
      : undefined;
    this.logStream = stream;
    stream?.on("error", () => {
      // Nowhere left to report it; stop writing to this file.
      if (this.logStream === stream) this.logStream = undefined;
    });
  }

  private write(level: Level, args: unknown[]) {
    if (!this.logStream) return;
    const message = util.format(...args);
    const timestamp = new Date().toISOString();
    this.logStream.write(`[${timestamp}] [${level}] ${message}\n`);
  }

  log(...args: unknown[]): void {
    this.write("LOG", args);
  }

  warn(...args: unknown[]): void {
    this.write("WARN", args);
  }

  error(...args: unknown[]): void {
    this.write("ERROR", args);
  }

  debug(...args: unknown[]): void {
    this.write("DEBUG", args);
  }

  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = undefined;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(resolve));
  }
}

export const debugLogger = new DebugLogger();
