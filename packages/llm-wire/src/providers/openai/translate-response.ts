/**
 * Translate an OpenAI-shaped (Chat Completions) response body into a
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
  reparseJsonString,
  toText,
  type WireBytes,
} from "../../utils/index.js";

// ---------------------------------------------------------------------------
// Chat Completions response schema
// ---------------------------------------------------------------------------

export const ChatCompletionUsageSchema = z.object({
  prompt_tokens: z.number().default(0),
  completion_tokens: z.number().default(0),
  prompt_tokens_details: z
    .object({ cached_tokens: z.number().nullish() })
    .nullish(),
});

const ChatCompletionToolCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string().default(""),
  }),
});

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            function_call: z
              .object({ arguments: z.string().nullish() })
              .nullish(),
            tool_calls: z.array(ChatCompletionToolCallSchema).nullish(),
          })
          .default({}),
        finish_reason: z.string().nullish(),
      }),
    )
    .nullish(),
  usage: ChatCompletionUsageSchema.nullish(),
});

export function translateUsage(
  raw: z.infer<typeof ChatCompletionUsageSchema>,
): Usage {
  return new Usage({
    input_tokens: raw.prompt_tokens,
    output_tokens: raw.completion_tokens,
    cached_input_tokens: raw.prompt_tokens_details?.cached_tokens ?? 0,
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

  const parsed = ChatCompletionResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `unexpected response shape from ${providerName}`,
      { raw: text, cause: parsed.error },
    );
  }

  const data = parsed.data;
  const choice = data.choices?.[0];
  if (!choice) {
    throw new EmptyResponseError(providerName);
  }

  const toolCalls: FunctionCall[] = (choice.message.tool_calls ?? []).map(
    (tc) => ({
      name: tc.function.name,
      arguments: reparseJsonString(tc.function.arguments),
    }),
  );

  let output: string;
  if (choice.message.content) {
    output = choice.message.content;
  } else if (choice.message.function_call?.arguments) {
    output = choice.message.function_call.arguments;
  } else if (toolCalls.length > 0) {
    output = toolCalls
      .map((tc) => formatFunctionCall(tc.name, tc.arguments))
      .join("\n");
  } else {
    throw new EmptyResponseError(providerName);
  }

  return data.usage
    ? { text: output, tool_calls: toolCalls, usage: translateUsage(data.usage) }
    : { text: output, tool_calls: toolCalls };
}
