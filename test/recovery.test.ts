import { describe, expect, it, vi } from "vitest";
import {
  CONTINUE_INSTRUCTION,
  continuationMessages,
  isLikelyTruncated,
  recoverTruncatedResponse
} from "../src/pipeline/recovery.js";

describe("isLikelyTruncated", () => {
  it("treats empty and whitespace-only text as complete", () => {
    expect(isLikelyTruncated("")).toBe(false);
    expect(isLikelyTruncated("  \n\t")).toBe(false);
  });

  it("accepts text ending on closing punctuation with balanced braces", () => {
    expect(isLikelyTruncated('{"a": 1}')).toBe(false);
    expect(isLikelyTruncated("[1, 2, 3]\n")).toBe(false);
    expect(isLikelyTruncated("const x = f();")).toBe(false);
    expect(isLikelyTruncated("<div></div>")).toBe(false);
  });

  it("flags an ending that is not closing punctuation", () => {
    expect(isLikelyTruncated('{"a": 1')).toBe(true);
    expect(isLikelyTruncated("The plan is")).toBe(true);
  });

  it("flags an unterminated code fence", () => {
    expect(isLikelyTruncated('```json\n{"a": 1}')).toBe(true);
    expect(isLikelyTruncated('```json\n{"a": 1}\n```\n}')).toBe(false);
  });

  it("flags more opening than closing braces even when the ending looks closed", () => {
    expect(isLikelyTruncated('{"a": {"b": 1}')).toBe(true);
  });
});

describe("recoverTruncatedResponse", () => {
  it("returns complete text untouched without asking for more", async () => {
    const more = vi.fn(async () => "unused");
    const res = await recoverTruncatedResponse('{"done": true}', more);
    expect(res).toEqual({ text: '{"done": true}', attempts: 0, truncated: false, stoppedBy: "complete" });
    expect(more).not.toHaveBeenCalled();
  });

  it("appends continuations on a new line until the text looks complete", async () => {
    const more = vi.fn(async () => "3]}");
    const res = await recoverTruncatedResponse('{"a": [1, 2', more);
    expect(res.text).toBe('{"a": [1, 2\n3]}');
    expect(res.attempts).toBe(1);
    expect(res.truncated).toBe(false);
    expect(res.stoppedBy).toBe("complete");
    expect(more).toHaveBeenCalledWith('{"a": [1, 2');
  });

  it("stops after the first empty continuation with the text unchanged", async () => {
    const more = vi.fn(async () => "   \n");
    const res = await recoverTruncatedResponse('{"a": 1', more);
    expect(res).toEqual({ text: '{"a": 1', attempts: 1, truncated: true, stoppedBy: "empty" });
    expect(more).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxAttempts", async () => {
    const more = vi.fn(async () => "still going");
    const res = await recoverTruncatedResponse("start", more, { maxAttempts: 2 });
    expect(res.text).toBe("start\nstill going\nstill going");
    expect(res.attempts).toBe(2);
    expect(res.stoppedBy).toBe("exhausted");
    expect(res.truncated).toBe(true);
  });

  it("defaults to three attempts", async () => {
    const more = vi.fn(async () => "x");
    const res = await recoverTruncatedResponse("start", more);
    expect(res.attempts).toBe(3);
    expect(more).toHaveBeenCalledTimes(3);
  });

  it("reports a failed request instead of throwing", async () => {
    const more = vi.fn(async (): Promise<string> => {
      throw new Error("socket hang up");
    });
    const res = await recoverTruncatedResponse('{"a": 1', more);
    expect(res).toEqual({ text: '{"a": 1', attempts: 1, truncated: true, stoppedBy: "failed", error: "socket hang up" });
  });

  it("reports each attempt before making it", async () => {
    const seen: number[] = [];
    await recoverTruncatedResponse("a", async () => "b", {
      maxAttempts: 2,
      onAttempt: (attempt) => seen.push(attempt.attemptCount)
    });
    expect(seen).toEqual([1, 2]);
  });
});

describe("continuationMessages", () => {
  it("appends the continue instruction as a user turn", () => {
    const history = [
      { role: "system" as const, content: "sys" },
      { role: "user" as const, content: "task" }
    ];
    const out = continuationMessages(history);
    expect(out).toEqual([...history, { role: "user", content: CONTINUE_INSTRUCTION }]);
    expect(history).toHaveLength(2);
  });
});
