/**
 * The `<function_call>` text convention.
 *
 * Any generated text may embed structured calls as
 * `<function_call>{"name":"...","arguments":{...}}</function_call>` spans.
 * Arguments that arrive double-encoded (a JSON string holding JSON) are
 * decoded once more.
 */

import { z } from "zod";
import { FunctionCallParseError } from "./types/errors.js";
import { err, ok, type Result } from "./types/result.js";
import type { FunctionCall } from "./types/tool.js";
import { isRecord, reparseJsonString } from "./utils/json.js";

export const FUNCTION_CALL_OPEN = "<function_call>";
export const FUNCTION_CALL_CLOSE = "</function_call>";

const FunctionCallSpanSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown(),
});

function spanPattern(): RegExp {
  return /<function_call>([\s\S]*?)<\/function_call>/g;
}

function parseSpan(span: string): FunctionCall {
  let decoded: unknown;
  try {
    decoded = JSON.parse(span);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FunctionCallParseError(`invalid function call JSON: ${reason}`, {
      span,
      cause: error,
    });
  }

  const parsed = FunctionCallSpanSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new FunctionCallParseError(
      "function call must be an object with a non-empty string name",
      { span, cause: parsed.error },
    );
  }

  // A missing arguments key means no arguments; an explicit null stays null.
  const hasArguments = isRecord(decoded) && "arguments" in decoded;
  return {
    name: parsed.data.name,
    arguments: hasArguments ? reparseJsonString(parsed.data.arguments) : {},
  };
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Every call embedded in `text`, in document order. No spans yields an
 * empty array; the first malformed span throws FunctionCallParseError.
 */
export function extractFunctionCalls(text: string): FunctionCall[] {
  const calls: FunctionCall[] = [];
  for (const match of text.matchAll(spanPattern())) {
    calls.push(parseSpan(match[1] ?? ""));
  }
  return calls;
}

/**
 * Like `extractFunctionCalls`, but a malformed span yields a failed result
 * in its place instead of aborting the spans around it.
 */
export function extractFunctionCallsSettled(
  text: string,
): Array<Result<FunctionCall, FunctionCallParseError>> {
  const results: Array<Result<FunctionCall, FunctionCallParseError>> = [];
  for (const match of text.matchAll(spanPattern())) {
    try {
      results.push(ok(parseSpan(match[1] ?? "")));
    } catch (error) {
      if (!(error instanceof FunctionCallParseError)) throw error;
      results.push(err(error));
    }
  }
  return results;
}

export interface CleanedResponse {
  /** The input with every span removed and nothing else changed. */
  readonly text: string;
  /** Raw JSON bodies of the removed spans, in document order. */
  readonly calls: string[];
}

export function cleanResponse(raw: string): CleanedResponse {
  const calls: string[] = [];
  let text = "";
  let cursor = 0;

  for (const match of raw.matchAll(spanPattern())) {
    const start = match.index ?? 0;
    text += raw.slice(cursor, start);
    calls.push(match[1] ?? "");
    cursor = start + match[0].length;
  }
  text += raw.slice(cursor);

  return { text, calls };
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Render a call as a tagged span. String arguments holding JSON are decoded
 * first so they are not double-encoded on the wire.
 */
export function formatFunctionCall(name: string, args: unknown): string {
  const body = JSON.stringify({ name, arguments: reparseJsonString(args) });
  return `${FUNCTION_CALL_OPEN}${body}${FUNCTION_CALL_CLOSE}`;
}
