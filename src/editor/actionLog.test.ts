import { describe, expect, it } from "vitest";
import { ActionLog, NOOP, REDO, UNDO } from "./actionLog.js";
import {
  deleteCharBackward,
  insertChar,
  insertNewline,
  searchAndReplace,
} from "./actions.js";
import { carry, type Cursor } from "./state.js";

function createLog(lines: readonly string[] = [""]) {
  const cursor: Cursor = { line: 0, col: 0 };
  const log = new ActionLog(lines, () => carry(cursor), cursor);
  return { log, cursor };
}

describe("ActionLog", () => {
  it("commits an action and returns the new lines", () => {
    const { log, cursor } = createLog();
    expect(log.apply(insertChar("a"))).toEqual(["a"]);
    expect(cursor).toEqual({ line: 0, col: 1 });
    expect(log.historySize).toBe(1);
  });

  it("never mutates or records on NOOP", () => {
    const { log } = createLog(["x"]);
    log.apply(insertChar("a"));
    log.apply(UNDO);

    expect(log.apply(NOOP)).toEqual(["x"]);
    expect(log.historySize).toBe(0);
    expect(log.redoSize).toBe(1);
  });

  it("treats undo and redo on empty stacks as no-ops", () => {
    const { log, cursor } = createLog(["abc"]);
    cursor.col = 2;
    expect(log.apply(UNDO)).toEqual(["abc"]);
    expect(log.apply(REDO)).toEqual(["abc"]);
    expect(cursor).toEqual({ line: 0, col: 2 });
    expect(log.historySize).toBe(0);
    expect(log.redoSize).toBe(0);
  });

  it("replays actions at the position they were made, not the live cursor", () => {
    const { log, cursor } = createLog(["abc"]);
    log.apply(insertChar("x"));
    expect(log.lines).toEqual(["xabc"]);

    cursor.col = 4;
    log.apply(insertChar("y"));
    expect(log.lines).toEqual(["xabcy"]);

    cursor.col = 0;
    log.apply(UNDO);
    expect(log.lines).toEqual(["xabc"]);
    expect(cursor).toEqual({ line: 0, col: 4 });

    log.apply(REDO);
    expect(log.lines).toEqual(["xabcy"]);
    expect(cursor).toEqual({ line: 0, col: 5 });
  });

  it("undoes N times then redoes N times back to the same state", () => {
    const { log, cursor } = createLog();
    log.apply(insertChar("a"));
    log.apply(insertChar("b"));
    log.apply(insertNewline);
    log.apply(insertChar("c"));
    const after = { lines: [...log.lines], cursor: { ...cursor } };

    for (let i = 0; i < 4; i++) log.apply(UNDO);
    expect(log.lines).toEqual([""]);
    expect(cursor).toEqual({ line: 0, col: 0 });

    for (let i = 0; i < 4; i++) log.apply(REDO);
    expect(log.lines).toEqual(after.lines);
    expect(cursor).toEqual(after.cursor);
    expect(after).toEqual({ lines: ["ab", "c"], cursor: { line: 1, col: 1 } });
  });

  it("drops the redo stack when a new action is committed", () => {
    const { log } = createLog();
    log.apply(insertChar("a"));
    log.apply(insertChar("b"));
    log.apply(UNDO);
    log.apply(insertChar("c"));

    expect(log.redoSize).toBe(0);
    expect(log.apply(REDO)).toEqual(["ac"]);
  });

  it("does not record actions that leave the buffer unchanged", () => {
    const { log } = createLog();
    log.apply(insertChar("a"));
    log.apply(UNDO);

    log.apply(deleteCharBackward);
    expect(log.historySize).toBe(0);
    expect(log.redoSize).toBe(1);
    expect(log.apply(REDO)).toEqual(["a"]);
  });

  it("undoes a whole-buffer replacement by replaying from the start", () => {
    const { log, cursor } = createLog(["foo foo", "bar"]);
    cursor.col = 7;
    log.apply(searchAndReplace(/foo/, "x"));
    expect(log.lines).toEqual(["x x", "bar"]);
    expect(cursor).toEqual({ line: 0, col: 3 });

    log.apply(UNDO);
    expect(log.lines).toEqual(["foo foo", "bar"]);
  });

  it("returns the cursor to each undone edit", () => {
    const { log, cursor } = createLog();
    log.apply(insertChar("a"));
    log.apply(insertNewline);
    log.apply(insertChar("b"));
    expect(cursor).toEqual({ line: 1, col: 1 });

    log.apply(UNDO);
    log.apply(UNDO);
    expect(log.lines).toEqual(["a"]);
    expect(cursor).toEqual({ line: 0, col: 1 });

    log.apply(UNDO);
    expect(log.lines).toEqual([""]);
    expect(cursor).toEqual({ line: 0, col: 0 });
  });

  it("tracks whether history has moved since the last save", () => {
    const { log } = createLog();
    expect(log.isDirty()).toBe(false);

    log.apply(insertChar("a"));
    expect(log.isDirty()).toBe(true);

    log.markSaved();
    expect(log.isDirty()).toBe(false);

    log.apply(UNDO);
    expect(log.isDirty()).toBe(true);

    log.apply(REDO);
    expect(log.isDirty()).toBe(false);
  });
});
