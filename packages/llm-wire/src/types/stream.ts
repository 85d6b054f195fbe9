/**
 * Stream decode results.
 *
 * Each inbound chunk decodes to exactly one result. End and skip are normal
 * stream control, never failures; failures are thrown.
 */

import { StreamResultType } from "./enums.js";
import type { Usage } from "./response.js";

/** The chunk carried a piece of generated text. */
export interface StreamToken {
  readonly type: typeof StreamResultType.TOKEN;
  readonly text: string;
  readonly usage?: Usage;
}

/** No token this chunk; keep reading. May still carry usage numbers. */
export interface StreamSkip {
  readonly type: typeof StreamResultType.SKIP;
  readonly usage?: Usage;
}

/** The stream has ended normally. */
export interface StreamEnd {
  readonly type: typeof StreamResultType.END;
}

export type StreamDecodeResult = StreamToken | StreamSkip | StreamEnd;

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function token(text: string, usage?: Usage): StreamToken {
  return usage
    ? { type: StreamResultType.TOKEN, text, usage }
    : { type: StreamResultType.TOKEN, text };
}

export function skip(usage?: Usage): StreamSkip {
  return usage
    ? { type: StreamResultType.SKIP, usage }
    : { type: StreamResultType.SKIP };
}

export const END: StreamEnd = { type: StreamResultType.END };
