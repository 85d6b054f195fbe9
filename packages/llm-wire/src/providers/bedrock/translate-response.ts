/**
 * Read Bedrock invoke responses; the text lives in a different field for
 * every model family.
 */

import { z } from "zod";
import { formatFunctionCall } from "../../function-calls.js";
import {
  EmptyResponseError,
  MalformedResponseError,
  ModelFamily,
  UpstreamAPIError,
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
import {
  AnthropicUsageSchema,
  translateUsage as translateAnthropicUsage,
} from "../anthropic/translate-response.js";

const BedrockResponseSchema = z.object({
  // anthropic
  content: z
    .array(
      z.object({
        type: z.string(),
        text: z.string().optional(),
        name: z.string().optional(),
        input: z.unknown().optional(),
      }),
    )
    .nullish(),
  usage: AnthropicUsageSchema.nullish(),
  // meta
  generation: z.string().nullish(),
  prompt_token_count: z.number().nullish(),
  generation_token_count: z.number().nullish(),
  // mistral
  outputs: z.array(z.object({ text: z.string().nullish() })).nullish(),
  // cohere
  text: z.string().nullish(),
  // generic (Titan-style)
  inputTextTokenCount: z.number().nullish(),
  results: z
    .array(
      z.object({
        outputText: z.string().nullish(),
        tokenCount: z.number().nullish(),
      }),
    )
    .nullish(),
  // gateway error payloads
  message: z.string().nullish(),
});

type BedrockResponse = z.infer<typeof BedrockResponseSchema>;

interface Extracted {
  text: string | undefined;
  tool_calls: FunctionCall[];
  usage?: Usage;
}

function extractAnthropic(data: BedrockResponse): Extracted {
  const blocks = data.content ?? [];
  const toolCalls: FunctionCall[] = [];
  let text: string | undefined;

  for (const block of blocks) {
    if (block.type === "text" && block.text !== undefined) {
      text = (text ?? "") + block.text;
    } else if (block.type === "tool_use" && block.name) {
      toolCalls.push({ name: block.name, arguments: block.input ?? {} });
    }
  }
  if (text === undefined && toolCalls.length > 0) {
    text = toolCalls.map((tc) => formatFunctionCall(tc.name, tc.arguments)).join("\n");
  }

  return {
    text,
    tool_calls: toolCalls,
    usage: data.usage ? translateAnthropicUsage(data.usage) : undefined,
  };
}

function extract(family: ModelFamily, data: BedrockResponse): Extracted {
  switch (family) {
    case ModelFamily.ANTHROPIC:
      return extractAnthropic(data);

    case ModelFamily.META:
      return {
        text: data.generation ?? undefined,
        tool_calls: [],
        usage:
          data.prompt_token_count != null && data.generation_token_count != null
            ? new Usage({
                input_tokens: data.prompt_token_count,
                output_tokens: data.generation_token_count,
              })
            : undefined,
      };

    case ModelFamily.MISTRAL:
      return { text: data.outputs?.[0]?.text ?? undefined, tool_calls: [] };

    case ModelFamily.COHERE:
      return { text: data.text ?? undefined, tool_calls: [] };

    case ModelFamily.GENERIC: {
      const result = data.results?.[0];
      return {
        text: result?.outputText ?? undefined,
        tool_calls: [],
        usage:
          data.inputTextTokenCount != null && result?.tokenCount != null
            ? new Usage({
                input_tokens: data.inputTextTokenCount,
                output_tokens: result.tokenCount,
              })
            : undefined,
      };
    }
  }
}

export function translateResponse(
  body: WireBytes,
  family: ModelFamily,
  providerName: string,
): ParsedResponse {
  const text = toText(body);
  const raw = parseJson(text);

  const upstream = mapUpstreamError(raw, providerName);
  if (upstream) throw upstream;

  const parsed = BedrockResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `unexpected response shape from ${providerName}`,
      { raw: text, cause: parsed.error },
    );
  }

  const extracted = extract(family, parsed.data);
  if (extracted.text === undefined) {
    // The gateway reports failures as a bare top-level message.
    const message = parsed.data.message;
    if (message) {
      throw new UpstreamAPIError(message, { provider: providerName, raw: parsed.data });
    }
    throw new EmptyResponseError(providerName);
  }

  return extracted.usage
    ? { text: extracted.text, tool_calls: extracted.tool_calls, usage: extracted.usage }
    : { text: extracted.text, tool_calls: extracted.tool_calls };
}
