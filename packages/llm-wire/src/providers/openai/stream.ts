/**
 * OpenAI-shaped (Chat Completions) stream chunk decoding.
 *
 * - data: {"choices":[{"delta":{"role":"assistant"}}]}          -> skip
 * - data: {"choices":[{"delta":{"content":"text"}}]}            -> token
 * - data: {"choices":[{"delta":{},"finish_reason":"stop"}]}     -> skip
 * - data: {"choices":[],"usage":{...}}                          -> skip + usage
 * - data: [DONE]                                                -> end
 *
 * Only `[DONE]` ends the stream: the usage chunk arrives after the finish
 * reason.
 */

import { z } from "zod";
import {
  END,
  MalformedResponseError,
  skip,
  token,
  type StreamDecodeResult,
} from "../../types/index.js";
import {
  mapUpstreamError,
  parseJson,
  stripDataPrefix,
  toText,
  type WireBytes,
} from "../../utils/index.js";
import { ChatCompletionUsageSchema, translateUsage } from "./translate-response.js";

export const DONE_MARKER = "[DONE]";

const ChatCompletionChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({ content: z.string().nullish() })
          .nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .nullish(),
  usage: ChatCompletionUsageSchema.nullish(),
});

export function translateStreamChunk(
  chunk: WireBytes,
  providerName: string,
): StreamDecodeResult {
  const data = stripDataPrefix(toText(chunk));
  if (data === undefined || data === "") return skip();
  if (data === DONE_MARKER) return END;

  const raw = parseJson(data, "stream chunk");

  const upstream = mapUpstreamError(raw, providerName);
  if (upstream) throw upstream;

  const parsed = ChatCompletionChunkSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `unexpected stream chunk shape from ${providerName}`,
      { raw: data, cause: parsed.error },
    );
  }

  const usage = parsed.data.usage ? translateUsage(parsed.data.usage) : undefined;
  const choice = parsed.data.choices?.[0];
  if (!choice) return skip(usage);

  const content = choice.delta?.content;
  if (content) return token(content, usage);

  // Role-only, finish-only or empty delta.
  return skip(usage);
}
