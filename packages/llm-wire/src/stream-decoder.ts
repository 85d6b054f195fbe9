/**
 * Drive a provider's chunk decoder over a whole stream.
 */

import { ReadableStream } from "node:stream/web";
import type { Provider } from "./providers/adapter.js";
import { StreamResultType, type StreamDecodeResult } from "./types/index.js";
import { readLines, type WireBytes } from "./utils/index.js";

export type StreamSource =
  | Iterable<WireBytes>
  | AsyncIterable<WireBytes>
  | ReadableStream<Uint8Array>;

/**
 * Yield one decode result per chunk, stopping after the first end result.
 * A byte stream is split into lines first; iterables are taken chunk by
 * chunk as given. Decode failures propagate out of the iteration.
 */
export async function* decodeStream(
  provider: Provider,
  chunks: StreamSource,
): AsyncGenerator<StreamDecodeResult, void, undefined> {
  const source = chunks instanceof ReadableStream ? readLines(chunks) : chunks;

  for await (const chunk of source) {
    const result = provider.parseStreamResponse(chunk);
    yield result;
    if (result.type === StreamResultType.END) return;
  }
}

/** Concatenate every token of the stream. */
export async function collectStreamText(
  provider: Provider,
  chunks: StreamSource,
): Promise<string> {
  let text = "";
  for await (const result of decodeStream(provider, chunks)) {
    if (result.type === StreamResultType.TOKEN) text += result.text;
  }
  return text;
}
