/**
 * Bedrock stream chunk decoding.
 *
 * The anthropic family streams the Messages API event objects and shares
 * the Anthropic-shaped decoder. Every other family streams flat objects
 * carrying a text fragment (`token.text`, `outputs[0].text`, `generation`,
 * `outputText` or `text`) and a stop reason on the final chunk.
 */

import { z } from "zod";
import {
  END,
  MalformedResponseError,
  ModelFamily,
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
import { translateStreamChunk as translateAnthropicChunk } from "../anthropic/stream.js";

const FlatChunkSchema = z.object({
  token: z.object({ text: z.string().nullish() }).nullish(),
  outputs: z
    .array(
      z.object({
        text: z.string().nullish(),
        stop_reason: z.string().nullish(),
      }),
    )
    .nullish(),
  generation: z.string().nullish(),
  outputText: z.string().nullish(),
  text: z.string().nullish(),
  stop_reason: z.string().nullish(),
  finish_reason: z.string().nullish(),
  completionReason: z.string().nullish(),
  is_finished: z.boolean().nullish(),
});

type FlatChunk = z.infer<typeof FlatChunkSchema>;

function fragment(chunk: FlatChunk): string | undefined {
  return (
    chunk.token?.text ??
    chunk.outputs?.[0]?.text ??
    chunk.generation ??
    chunk.outputText ??
    chunk.text ??
    undefined
  );
}

function stopped(chunk: FlatChunk): boolean {
  return Boolean(
    chunk.stop_reason ||
      chunk.outputs?.[0]?.stop_reason ||
      chunk.finish_reason ||
      chunk.completionReason ||
      chunk.is_finished,
  );
}

function translateFlatChunk(
  chunk: WireBytes,
  providerName: string,
): StreamDecodeResult {
  const data = stripDataPrefix(toText(chunk));
  if (data === undefined || data === "") return skip();

  const raw = parseJson(data, "stream chunk");

  const upstream = mapUpstreamError(raw, providerName);
  if (upstream) throw upstream;

  const parsed = FlatChunkSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `unexpected stream chunk shape from ${providerName}`,
      { raw: data, cause: parsed.error },
    );
  }

  const text = fragment(parsed.data);
  if (text) return token(text);
  if (stopped(parsed.data)) return END;
  return skip();
}

export function translateStreamChunk(
  chunk: WireBytes,
  family: ModelFamily,
  providerName: string,
): StreamDecodeResult {
  switch (family) {
    case ModelFamily.ANTHROPIC:
      return translateAnthropicChunk(chunk, providerName);
    case ModelFamily.META:
    case ModelFamily.MISTRAL:
    case ModelFamily.COHERE:
    case ModelFamily.GENERIC:
      return translateFlatChunk(chunk, providerName);
  }
}
