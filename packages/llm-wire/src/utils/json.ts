/**
 * JSON helpers shared by the response and stream translators.
 */

import { TextDecoder } from "node:util";
import { MalformedResponseError } from "../types/errors.js";

/** A response body or stream chunk as handed over by the transport. */
export type WireBytes = string | Uint8Array;

const decoder = new TextDecoder();

export function toText(input: WireBytes): string {
  return typeof input === "string" ? input : decoder.decode(input);
}

/**
 * Decode a JSON document, wrapping any syntax error in a
 * MalformedResponseError that keeps the raw text.
 */
export function parseJson(text: string, what = "response"): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedResponseError(`failed to parse ${what}: ${reason}`, {
      raw: text,
      cause: error,
    });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Decode a string that may hold JSON; returns the input unchanged if not. */
export function reparseJsonString(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}
