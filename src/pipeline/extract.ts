export type ExtractionMode = "json" | "files";

export type JsonStrategy = "direct" | "normalized" | "fenced_json" | "balanced_scan";

export type JsonContainer = Record<string, unknown> | unknown[];

export type ManifestFile = {
  path: string;
  content: string;
};

export type ExtractedPayload =
  | { kind: "json"; strategy: JsonStrategy; value: JsonContainer }
  | { kind: "files"; strategy: "file_manifest"; files: ManifestFile[] }
  | { kind: "raw"; strategy: "raw"; text: string; reason: string };

export const FILE_HEADER_PATTERN = /^###\s+File:\s*(.+?)\s*$/;

const FENCE_MARKER = /```[A-Za-z0-9_+-]*/g;
const FENCED_JSON_BLOCK = /```json[^\S\n]*\n?([\s\S]*?)```/gi;
// Braced substring tolerating one level of nested braces.
const BALANCED_OBJECT = /\{(?:[^{}]|\{[^{}]*\})*\}/g;
const TRAILING_COMMA = /,(\s*[}\]])/g;
// C0/C1 controls (keeping \t \n \r), zero-width characters and the BOM.
const NON_PRINTABLE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\u200B-\u200F\u2060\uFEFF]/g;

const CHAR_REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/[\u2018\u2019\u201A\u201B\u2032\u02BC]/g, "'"],
  [/[\u201C\u201D\u201E\u201F\u2033\u00AB\u00BB]/g, '"'],
  [/[\u2010-\u2015\u2212\uFE58\uFE63\uFF0D]/g, "-"],
  [/\u2026/g, "..."],
  [/[\u2022\u2023\u2043\u2219\u25AA\u25CF\u25E6\u00B7]/g, "-"],
  [/[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g, " "],
  // Box drawing: horizontal strokes, vertical strokes, then every corner/junction.
  [/[\u2500\u2501\u2504\u2505\u2508\u2509\u254C\u254D\u2550\u2574\u2576\u2578\u257A\u257C\u257E]/g, "-"],
  [/[\u2502\u2503\u2506\u2507\u250A\u250B\u254E\u254F\u2551\u2575\u2577\u2579\u257B\u257D\u257F]/g, "|"],
  [/[\u2500-\u257F]/g, "+"]
];

function countOf(text: string, ch: string): number {
  let n = 0;
  for (const c of text) if (c === ch) n++;
  return n;
}

function isJsonContainer(value: unknown): value is JsonContainer {
  return typeof value === "object" && value !== null;
}

/** Appends one `}` per unmatched `{`. Structural guesswork: not guaranteed to yield valid JSON. */
export function repairBraces(text: string): string {
  const missing = countOf(text, "{") - countOf(text, "}");
  return missing > 0 ? text + "}".repeat(missing) : text;
}

export function stripCodeFences(text: string): string {
  return text.replace(FENCE_MARKER, "").trim();
}

/** ASCII stand-ins for typographic Unicode, minus non-printable characters. */
export function normalizeCharacters(text: string): string {
  let out = text;
  for (const [pattern, replacement] of CHAR_REPLACEMENTS) out = out.replace(pattern, replacement);
  return out.replace(NON_PRINTABLE, "");
}

export function normalizeText(text: string): string {
  return normalizeCharacters(text).replace(TRAILING_COMMA, "$1");
}

function tryParseContainer(candidate: string): JsonContainer | null {
  const trimmed = candidate.trim();
  if (trimmed.length === 0) return null;
  try {
    const parsed: unknown = JSON.parse(repairBraces(trimmed));
    return isJsonContainer(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function parseDirect(text: string): JsonContainer | null {
  return tryParseContainer(stripCodeFences(text));
}

export function parseNormalized(text: string): JsonContainer | null {
  return tryParseContainer(stripCodeFences(normalizeText(text)));
}

/** First ```json block that parses, in document order. */
export function parseFencedJson(text: string): JsonContainer | null {
  for (const match of text.matchAll(FENCED_JSON_BLOCK)) {
    const parsed = tryParseContainer(normalizeText(match[1] ?? ""));
    if (parsed) return parsed;
  }
  return null;
}

/**
 * Every balanced `{...}` substring is a candidate; the longest one that parses
 * wins, the earliest on equal length.
 */
export function parseBalancedScan(text: string): JsonContainer | null {
  let best: JsonContainer | null = null;
  let bestLength = 0;
  for (const match of normalizeText(text).matchAll(BALANCED_OBJECT)) {
    const candidate = match[0];
    if (candidate.length <= bestLength) continue;
    const parsed = tryParseContainer(candidate);
    if (!parsed) continue;
    best = parsed;
    bestLength = candidate.length;
  }
  return best;
}

function cleanManifestPath(raw: string): string {
  return raw.trim().replace(/^[`'"]+|[`'"]+$/g, "").trim();
}

/**
 * `### File: <path>` opens a file; every following line up to the next header
 * (fence lines included) is its content. Text before the first header is
 * ignored, as are headers with no content lines.
 */
export function parseFileManifest(text: string): ManifestFile[] {
  const files: ManifestFile[] = [];
  let currentPath: string | null = null;
  let lines: string[] = [];

  const flush = () => {
    if (currentPath && lines.length > 0) files.push({ path: currentPath, content: lines.join("\n") });
  };

  for (const line of text.split(/\r?\n/)) {
    const header = FILE_HEADER_PATTERN.exec(line);
    if (header) {
      flush();
      currentPath = cleanManifestPath(header[1] ?? "") || null;
      lines = [];
      continue;
    }
    if (currentPath) lines.push(line);
  }
  flush();

  return files;
}

const JSON_STRATEGIES: ReadonlyArray<[JsonStrategy, (text: string) => JsonContainer | null]> = [
  ["direct", parseDirect],
  ["normalized", parseNormalized],
  ["fenced_json", parseFencedJson],
  ["balanced_scan", parseBalancedScan]
];

/**
 * Runs the strategies in priority order and returns the first success. Never
 * throws: when nothing matches the caller gets the normalized text as `raw`.
 */
export function extractStructuredPayload(text: string, options?: { mode?: ExtractionMode }): ExtractedPayload {
  const mode = options?.mode ?? "json";

  if (mode === "files") {
    // File bodies are code: no trailing-comma surgery on them.
    const files = parseFileManifest(normalizeCharacters(text));
    if (files.length > 0) return { kind: "files", strategy: "file_manifest", files };
    return { kind: "raw", strategy: "raw", text: normalizeText(text), reason: "No file headers found in response" };
  }

  for (const [strategy, parse] of JSON_STRATEGIES) {
    const value = parse(text);
    if (value) return { kind: "json", strategy, value };
  }

  return { kind: "raw", strategy: "raw", text: normalizeText(text), reason: "No JSON document could be parsed from response" };
}
