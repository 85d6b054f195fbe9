/**
 * Error mapping for vendor error payloads embedded in response bodies.
 *
 * Transport status codes are the caller's concern; this only recognizes the
 * structured `error` envelope vendors put in a body.
 */

import { UpstreamAPIError } from "../types/errors.js";
import { isRecord } from "./json.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** The vendor's error message, when the body carries one. */
function extractMessage(body: Record<string, unknown>): string | undefined {
  const error = body["error"];

  // Most vendors nest under `error.message`.
  if (isRecord(error) && typeof error["message"] === "string") {
    return error["message"] === "" ? undefined : error["message"];
  }

  // Some put a bare string in `error`.
  if (typeof error === "string" && error !== "") {
    return error;
  }

  return undefined;
}

function extractErrorCode(body: Record<string, unknown>): string | undefined {
  const error = body["error"];
  if (!isRecord(error)) return undefined;

  const code = error["code"];
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  if (typeof error["type"] === "string") return error["type"];
  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * An UpstreamAPIError for a body carrying a vendor error payload, or
 * `undefined` when the body is not an error. The message is kept verbatim.
 */
export function mapUpstreamError(
  body: unknown,
  provider: string,
): UpstreamAPIError | undefined {
  if (!isRecord(body)) return undefined;

  const message = extractMessage(body);
  if (message === undefined) return undefined;

  return new UpstreamAPIError(message, {
    provider,
    error_code: extractErrorCode(body),
    raw: body,
  });
}
