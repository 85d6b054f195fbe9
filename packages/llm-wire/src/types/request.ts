/**
 * Request types for the wire-translation layer.
 */

import type { CanonicalMessage } from "./message.js";
import type { Tool, ToolChoice } from "./tool.js";

/**
 * The provider-agnostic request callers assemble.
 *
 * `prompt` and `messages` are interchangeable; exactly one must be set.
 */
export interface CanonicalRequest {
  /** A single user turn. */
  readonly prompt?: string;
  /** A structured conversation, in order. */
  readonly messages?: readonly CanonicalMessage[];
  /** System instruction. */
  readonly system_prompt?: string;
  /** Tool definitions offered to the model. */
  readonly tools?: readonly Tool[];
  /** Defaults to the vendor's own default when omitted. */
  readonly tool_choice?: ToolChoice;
  /** JSON Schema (subset) the response must follow. */
  readonly response_schema?: Record<string, unknown>;
  /** Free-form per-call overrides: temperature, max_tokens, stream, vendor keys. */
  readonly options?: Readonly<Record<string, unknown>>;
}
