/**
 * Anthropic-shaped stream event decoding.
 *
 * - message_start                       -> skip + usage
 * - content_block_delta / text_delta    -> token
 * - message_delta                       -> skip + usage
 * - message_stop, `event: message_stop` -> end
 * - anything else (ping, block start/stop, other event lines) -> skip
 *
 * Events may arrive framed as SSE `data:` lines or as bare JSON objects.
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
import { AnthropicUsageSchema, translateUsage } from "./translate-response.js";

export const MESSAGE_STOP = "message_stop";

const AnthropicStreamEventSchema = z.object({
  type: z.string().optional(),
  delta: z
    .object({
      type: z.string().optional(),
      text: z.string().optional(),
    })
    .nullish(),
  message: z.object({ usage: AnthropicUsageSchema.nullish() }).nullish(),
  usage: AnthropicUsageSchema.nullish(),
});

export function translateStreamChunk(
  chunk: WireBytes,
  providerName: string,
): StreamDecodeResult {
  const line = toText(chunk).trim();

  if (line.startsWith("event:")) {
    return line.slice(6).trim() === MESSAGE_STOP ? END : skip();
  }

  const data = stripDataPrefix(line);
  if (data === undefined || data === "") return skip();
  if (data === "[DONE]") return END;

  const raw = parseJson(data, "stream chunk");

  const upstream = mapUpstreamError(raw, providerName);
  if (upstream) throw upstream;

  const parsed = AnthropicStreamEventSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `unexpected stream event shape from ${providerName}`,
      { raw: data, cause: parsed.error },
    );
  }

  const event = parsed.data;
  switch (event.type) {
    case MESSAGE_STOP:
      return END;

    case "content_block_delta":
      if (event.delta?.type === "text_delta" && event.delta.text) {
        return token(event.delta.text);
      }
      return skip();

    case "message_start": {
      const usage = event.message?.usage;
      return skip(usage ? translateUsage(usage) : undefined);
    }

    case "message_delta":
      return skip(event.usage ? translateUsage(event.usage) : undefined);

    default:
      return skip();
  }
}
