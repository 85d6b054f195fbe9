/**
 * Response types for the wire-translation layer.
 */

import type { FunctionCall } from "./tool.js";

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

/** Token accounting as reported by the vendor. */
export class Usage {
  readonly input_tokens: number;
  /** Input tokens served from the vendor's prompt cache. */
  readonly cached_input_tokens: number;
  readonly output_tokens: number;
  /** Non-cached input plus output. */
  readonly total_tokens: number;

  constructor(init: {
    input_tokens: number;
    output_tokens: number;
    cached_input_tokens?: number;
  }) {
    this.input_tokens = init.input_tokens;
    this.cached_input_tokens = init.cached_input_tokens ?? 0;
    this.output_tokens = init.output_tokens;
    this.total_tokens =
      this.input_tokens - this.cached_input_tokens + this.output_tokens;
  }
}

// ---------------------------------------------------------------------------
// ParsedResponse
// ---------------------------------------------------------------------------

/** The normalized result of parsing one full response body. */
export interface ParsedResponse {
  /**
   * Generated text. When the model answered only with tool calls, the calls
   * are rendered here as `<function_call>` spans joined by newlines.
   */
  readonly text: string;
  /** Native tool calls, with their arguments decoded. */
  readonly tool_calls: readonly FunctionCall[];
  readonly usage?: Usage;
}
