import { describe, expect, it } from "vitest";
import {
  extractStructuredPayload,
  normalizeCharacters,
  normalizeText,
  parseBalancedScan,
  parseFileManifest,
  repairBraces,
  stripCodeFences
} from "../src/pipeline/extract.js";

describe("extract helpers", () => {
  it("repairBraces appends exactly the missing closing braces", () => {
    expect(repairBraces('{"a": {"b": 1}')).toBe('{"a": {"b": 1}}');
    expect(repairBraces('{"a": 1}')).toBe('{"a": 1}');
    expect(repairBraces("}}")).toBe("}}");
  });

  it("stripCodeFences removes fence markers with their language tag", () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```\n')).toBe('{"a": 1}');
  });

  it("normalizeCharacters maps typographic characters to ASCII", () => {
    const input = "“hi” ‘x’ a—b … • item end ┌─┐│";
    expect(normalizeCharacters(input)).toBe("\"hi\" 'x' a-b ... - item end +-+|");
  });

  it("normalizeCharacters strips non-printables but keeps tabs and newlines", () => {
    expect(normalizeCharacters("a\u0000b\u200Bc\td\r\ne\uFEFF")).toBe("abc\td\r\ne");
  });

  it("normalizeText drops trailing commas before closers", () => {
    expect(normalizeText('{"a": [1, 2, ], "b": 3, }')).toBe('{"a": [1, 2 ], "b": 3 }');
  });
});

describe("extractStructuredPayload (json mode)", () => {
  it("parses clean JSON directly", () => {
    expect(extractStructuredPayload('{"a": 1}')).toEqual({ kind: "json", strategy: "direct", value: { a: 1 } });
  });

  it("parses a fenced-only reply directly after stripping fences", () => {
    const res = extractStructuredPayload('```json\n{"a": [1, 2]}\n```');
    expect(res).toEqual({ kind: "json", strategy: "direct", value: { a: [1, 2] } });
  });

  it("repairs a single missing closing brace", () => {
    const res = extractStructuredPayload('{"outer": {"inner": true}');
    expect(res).toEqual({ kind: "json", strategy: "direct", value: { outer: { inner: true } } });
  });

  it("falls back to normalization for smart quotes and trailing commas", () => {
    const res = extractStructuredPayload("{“name”: “mesh”, “tags”: [“a”,],}");
    expect(res).toEqual({ kind: "json", strategy: "normalized", value: { name: "mesh", tags: ["a"] } });
  });

  it("prefers a fenced json block over a longer unfenced object", () => {
    const text = [
      'Draft: {"long": "this unfenced object is much longer than the fenced one", "n": 12345}',
      "Final:",
      "```json",
      '{"x": 1}',
      "```"
    ].join("\n");
    expect(extractStructuredPayload(text)).toEqual({ kind: "json", strategy: "fenced_json", value: { x: 1 } });
  });

  it("uses the first fenced block that parses", () => {
    const text = "```json\nnot json\n```\ntext\n```json\n{\"second\": 2}\n```\n```json\n{\"third\": 3}\n```";
    expect(extractStructuredPayload(text)).toEqual({ kind: "json", strategy: "fenced_json", value: { second: 2 } });
  });

  it("scans for the longest balanced object in commentary", () => {
    const text = 'Sure! First {"a": 1} and then {"b": {"c": 2}, "d": 3} is the answer.';
    expect(extractStructuredPayload(text)).toEqual({
      kind: "json",
      strategy: "balanced_scan",
      value: { b: { c: 2 }, d: 3 }
    });
  });

  it("balanced scan keeps the earliest candidate on equal length", () => {
    expect(parseBalancedScan('x {"a": 1} y {"b": 2} z')).toEqual({ a: 1 });
  });

  it("returns raw normalized text with a reason when nothing parses", () => {
    const res = extractStructuredPayload("I could not do that — sorry.");
    expect(res).toEqual({
      kind: "raw",
      strategy: "raw",
      text: "I could not do that - sorry.",
      reason: "No JSON document could be parsed from response"
    });
  });

  it("does not accept a bare primitive as a payload", () => {
    expect(extractStructuredPayload("42").kind).toBe("raw");
    expect(extractStructuredPayload('"just a string"').kind).toBe("raw");
  });
});

describe("extractStructuredPayload (files mode)", () => {
  it("splits a manifest into files, keeping fence lines as content", () => {
    const text = [
      "Here are the files.",
      "### File: src/app.ts",
      "```ts",
      "export const x = 1;",
      "```",
      "### File: `README.md`",
      "# Title"
    ].join("\n");
    expect(extractStructuredPayload(text, { mode: "files" })).toEqual({
      kind: "files",
      strategy: "file_manifest",
      files: [
        { path: "src/app.ts", content: "```ts\nexport const x = 1;\n```" },
        { path: "README.md", content: "# Title" }
      ]
    });
  });

  it("keeps trailing commas inside file bodies", () => {
    const files = parseFileManifest("### File: a.js\nconst o = { a: 1, };");
    expect(files).toEqual([{ path: "a.js", content: "const o = { a: 1, };" }]);
  });

  it("skips headers with no content lines", () => {
    expect(parseFileManifest("### File: empty.txt\n### File: b.txt\nbody")).toEqual([
      { path: "b.txt", content: "body" }
    ]);
  });

  it("returns raw when there are no file headers", () => {
    const res = extractStructuredPayload('{"a": 1}', { mode: "files" });
    expect(res).toEqual({ kind: "raw", strategy: "raw", text: '{"a": 1}', reason: "No file headers found in response" });
  });
});
