import fs from "node:fs";

/**
 * Line storage for a single document. Always holds at least one line.
 */
export class TextBuffer {
  lines: string[];

  constructor(lines: readonly string[] = [""]) {
    this.lines = lines.length === 0 ? [""] : [...lines];
  }

  static fromText(text: string): TextBuffer {
    // split("") yields [""], so an empty file still has one line
    return new TextBuffer(text.replace(/\r\n/g, "\n").split("\n"));
  }

  static loadFromFile(path: string): TextBuffer {
    return TextBuffer.fromText(fs.readFileSync(path, "utf8"));
  }

  saveToFile(path: string) {
    fs.writeFileSync(path, this.toText(), "utf8");
  }

  toText(): string {
    return this.lines.join("\n");
  }

  clone(): TextBuffer {
    return new TextBuffer(this.lines);
  }

  equals(other: readonly string[]): boolean {
    if (other.length !== this.lines.length) return false;
    return this.lines.every((line, i) => line === other[i]);
  }

  lineCount() {
    return this.lines.length;
  }

  lineAt(row: number) {
    return this.lines[row] ?? "";
  }
}
