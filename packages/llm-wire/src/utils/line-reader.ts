/**
 * Line reader for streamed response bodies.
 *
 * Splits a `ReadableStream<Uint8Array>` into text lines, the unit every
 * stream decoder consumes. Lines are terminated by `\r\n`, `\r` or `\n`;
 * chunks that split mid-line (or mid-character) are reassembled. Blank
 * lines are event separators and are not yielded.
 */

import type { ReadableStream } from "node:stream/web";
import { TextDecoder } from "node:util";

const LINE_BREAK = /\r\n|\r|\n/;

export async function* readLines(
  stream: ReadableStream<Uint8Array>,
): AsyncIterableIterator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();

  // Incomplete line carried across chunk boundaries.
  let buffer = "";

  try {
    for (;;) {
      const { value, done } = await reader.read();

      if (done) {
        buffer += decoder.decode();
        if (buffer !== "") yield buffer;
        break;
      }

      buffer += decoder.decode(value, { stream: true });

      const lines = buffer.split(LINE_BREAK);
      // The last element is "" when the chunk ended on a newline, otherwise
      // a partial line waiting for more data.
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        if (line !== "") yield line;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Strip SSE framing from one line. Returns the payload of a `data:` line,
 * the bare line when it has no field prefix, or `undefined` for blank,
 * comment and other field lines.
 */
export function stripDataPrefix(line: string): string | undefined {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith(":")) return undefined;
  if (trimmed.startsWith("data:")) return trimmed.slice(5).trim();
  if (/^(event|id|retry):/.test(trimmed)) return undefined;
  return trimmed;
}
