import type { ChatMessage } from "../llm.js";
import { errorMessage } from "./utils.js";

export const DEFAULT_MAX_CONTINUATIONS = 3;

// A response ending on one of these looks finished.
const CLOSING_CHARS = new Set(["\n", "}", "]", ">", ";", '"', "'", ")"]);

export const CONTINUE_INSTRUCTION =
  "The previous response was truncated. Continue the response from where it stopped, using the same format. " +
  "Do NOT repeat content already fully returned; only provide the continuation.";

function countOf(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

/**
 * Independent signals, any one marks the text truncated: an unterminated code
 * fence, an ending that is not closing punctuation, or more `{` than `}`.
 */
export function isLikelyTruncated(text: string): boolean {
  const trimmed = text.trimEnd();
  if (trimmed.length === 0) return false;

  if (countOf(text, "```") % 2 !== 0) return true;
  if (!CLOSING_CHARS.has(trimmed[trimmed.length - 1])) return true;
  return countOf(text, "{") > countOf(text, "}");
}

export type RecoveryAttempt = {
  baseText: string;
  attemptCount: number;
  maxAttempts: number;
  isTruncated: boolean;
};

export type RecoveryStop = "complete" | "exhausted" | "empty" | "failed";

export type RecoveryResult = {
  text: string;
  attempts: number;
  truncated: boolean;
  stoppedBy: RecoveryStop;
  /** Set when a continuation request failed. */
  error?: string;
};

export type ContinueFn = (accumulated: string) => Promise<string>;

/**
 * Extends `initialText` with continuation replies until it no longer looks
 * truncated or `maxAttempts` requests have been made. An empty reply or a
 * failed request ends the loop; whatever has accumulated is returned.
 */
export async function recoverTruncatedResponse(
  initialText: string,
  requestContinuation: ContinueFn,
  options?: { maxAttempts?: number; onAttempt?: (attempt: RecoveryAttempt) => void }
): Promise<RecoveryResult> {
  const state: RecoveryAttempt = {
    baseText: initialText,
    attemptCount: 0,
    maxAttempts: Math.max(0, options?.maxAttempts ?? DEFAULT_MAX_CONTINUATIONS),
    isTruncated: isLikelyTruncated(initialText)
  };

  const finish = (stoppedBy: RecoveryStop, error?: string): RecoveryResult => {
    const result: RecoveryResult = {
      text: state.baseText,
      attempts: state.attemptCount,
      truncated: state.isTruncated,
      stoppedBy
    };
    if (error !== undefined) result.error = error;
    return result;
  };

  while (state.isTruncated) {
    if (state.attemptCount >= state.maxAttempts) return finish("exhausted");
    state.attemptCount += 1;
    options?.onAttempt?.({ ...state });

    let addition: string;
    try {
      addition = await requestContinuation(state.baseText);
    } catch (err) {
      // Never rethrow: the caller gets the accumulated text.
      return finish("failed", errorMessage(err));
    }
    if (addition.trim().length === 0) return finish("empty");

    state.baseText = `${state.baseText}\n${addition}`;
    state.isTruncated = isLikelyTruncated(state.baseText);
  }

  return finish("complete");
}

/** The original history plus the explicit "continue where you stopped" turn. */
export function continuationMessages(history: ChatMessage[]): ChatMessage[] {
  return [...history, { role: "user", content: CONTINUE_INSTRUCTION }];
}
