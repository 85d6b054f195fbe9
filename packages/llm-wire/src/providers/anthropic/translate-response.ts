/**
 * Translate an Anthropic-shaped (Messages API) response body into a
 * ParsedResponse.
 */

import { z } from "zod";
import { formatFunctionCall } from "../../function-calls.js";
import {
  EmptyResponseError,
  MalformedResponseError,
  Usage,
  type FunctionCall,
  type ParsedResponse,
} from "../../types/index.js";
import {
  mapUpstreamError,
  parseJson,
  toText,
  type WireBytes,
} from "../../utils/index.js";

// ---------------------------------------------------------------------------
// Messages API response schema
// ---------------------------------------------------------------------------

export const AnthropicUsageSchema = z.object({
  input_tokens: z.number().default(0),
  output_tokens: z.number().default(0),
  cache_read_input_tokens: z.number().nullish(),
});

const AnthropicContentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  name: z.string().optional(),
  input: z.unknown().optional(),
});

const AnthropicResponseSchema = z.object({
  content: z.array(AnthropicContentBlockSchema).nullish(),
  usage: AnthropicUsageSchema.nullish(),
});

/**
 * `input_tokens` on this wire excludes cache reads; they are added back so
 * that `input_tokens` counts the whole prompt.
 */
export function translateUsage(
  raw: z.infer<typeof AnthropicUsageSchema>,
): Usage {
  const cached = raw.cache_read_input_tokens ?? 0;
  return new Usage({
    input_tokens: raw.input_tokens + cached,
    output_tokens: raw.output_tokens,
    cached_input_tokens: cached,
  });
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

export function translateResponse(
  body: WireBytes,
  providerName: string,
): ParsedResponse {
  const text = toText(body);
  const raw = parseJson(text);

  const upstream = mapUpstreamError(raw, providerName);
  if (upstream) throw upstream;

  const parsed = AnthropicResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `unexpected response shape from ${providerName}`,
      { raw: text, cause: parsed.error },
    );
  }

  const blocks = parsed.data.content ?? [];
  if (blocks.length === 0) {
    throw new EmptyResponseError(providerName);
  }

  let output = "";
  const toolCalls: FunctionCall[] = [];
  for (const block of blocks) {
    if (block.type === "text" && block.text !== undefined) {
      output += block.text;
    } else if (block.type === "tool_use" && block.name) {
      toolCalls.push({ name: block.name, arguments: block.input ?? {} });
    }
  }

  if (output === "" && toolCalls.length > 0) {
    output = toolCalls
      .map((tc) => formatFunctionCall(tc.name, tc.arguments))
      .join("\n");
  } else if (output === "") {
    throw new EmptyResponseError(providerName);
  }

  const usage = parsed.data.usage;
  return usage
    ? { text: output, tool_calls: toolCalls, usage: translateUsage(usage) }
    : { text: output, tool_calls: toolCalls };
}
