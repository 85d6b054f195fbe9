/**
 * Build Bedrock invoke bodies, one native shape per model family.
 *
 * | family    | prompt field                 | length field                       |
 * |-----------|------------------------------|------------------------------------|
 * | anthropic | messages (+ system)          | max_tokens (4096)                  |
 * | meta      | prompt "[INST] p [/INST]"    | max_gen_len (2048)                 |
 * | mistral   | prompt "<s>[INST] p [/INST]" | max_tokens (4096)                  |
 * | cohere    | message                      | max_tokens (4096)                  |
 * | generic   | inputText                    | textGenerationConfig.maxTokenCount |
 *
 * Sampling values resolve per-call, then adapter default, then family
 * default; the OptionBag handed in already holds the first two merged.
 */

import {
  ModelFamily,
  flattenMessages,
  type CanonicalMessage,
  type OptionBag,
} from "../../types/index.js";
import {
  ANTHROPIC_BEDROCK_VERSION,
  FAMILY_DEFAULT_MAX_TOKENS,
} from "./families.js";

// ---------------------------------------------------------------------------
// Native body types
// ---------------------------------------------------------------------------

export interface BedrockAnthropicBody {
  anthropic_version: string;
  max_tokens: number;
  messages: Array<{ role: string; content: string }>;
  system?: string;
  temperature?: number;
  top_p?: number;
  top_k?: number;
}

export interface BedrockMetaBody {
  prompt: string;
  max_gen_len: number;
  temperature?: number;
  top_p?: number;
}

export interface BedrockMistralBody {
  prompt: string;
  max_tokens: number;
  temperature?: number;
  top_p?: number;
  top_k?: number;
}

export interface BedrockCohereBody {
  message: string;
  max_tokens: number;
  temperature?: number;
  p?: number;
  k?: number;
}

export interface BedrockGenericBody {
  inputText: string;
  textGenerationConfig?: {
    maxTokenCount?: number;
    temperature?: number;
    topP?: number;
  };
}

export type BedrockRequestBody =
  | BedrockAnthropicBody
  | BedrockMetaBody
  | BedrockMistralBody
  | BedrockCohereBody
  | BedrockGenericBody;

export const SCHEMA_INSTRUCTION =
  "\n\nPlease respond with a JSON object matching this schema:\n";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Copy the defined entries of `fields` onto `target`. */
function assignDefined<T extends object>(target: T, fields: Partial<T>): T {
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) Object.assign(target, { [key]: value });
  }
  return target;
}

function maxTokens(options: OptionBag, familyDefault: number): number {
  return options.maxTokens ?? familyDefault;
}

/** Families without a system field get the system prompt ahead of the prompt. */
function withSystemPrompt(prompt: string, options: OptionBag): string {
  const systemPrompt = options.systemPrompt;
  return systemPrompt ? `${systemPrompt}\n\n${prompt}` : prompt;
}

// ---------------------------------------------------------------------------
// Per-family builders
// ---------------------------------------------------------------------------

function buildAnthropic(
  messages: Array<{ role: string; content: string }>,
  options: OptionBag,
): BedrockAnthropicBody {
  return assignDefined<BedrockAnthropicBody>(
    {
      anthropic_version: ANTHROPIC_BEDROCK_VERSION,
      max_tokens: maxTokens(options, FAMILY_DEFAULT_MAX_TOKENS.anthropic),
      messages,
    },
    {
      system: options.systemPrompt,
      temperature: options.temperature,
      top_p: options.topP,
      top_k: options.topK,
    },
  );
}

function buildMeta(prompt: string, options: OptionBag): BedrockMetaBody {
  return assignDefined<BedrockMetaBody>(
    {
      prompt: `[INST] ${withSystemPrompt(prompt, options)} [/INST]`,
      max_gen_len: maxTokens(options, FAMILY_DEFAULT_MAX_TOKENS.meta),
    },
    { temperature: options.temperature, top_p: options.topP },
  );
}

function buildMistral(prompt: string, options: OptionBag): BedrockMistralBody {
  return assignDefined<BedrockMistralBody>(
    {
      prompt: `<s>[INST] ${withSystemPrompt(prompt, options)} [/INST]`,
      max_tokens: maxTokens(options, FAMILY_DEFAULT_MAX_TOKENS.mistral),
    },
    {
      temperature: options.temperature,
      top_p: options.topP,
      top_k: options.topK,
    },
  );
}

function buildCohere(prompt: string, options: OptionBag): BedrockCohereBody {
  return assignDefined<BedrockCohereBody>(
    {
      message: withSystemPrompt(prompt, options),
      max_tokens: maxTokens(options, FAMILY_DEFAULT_MAX_TOKENS.cohere),
    },
    { temperature: options.temperature, p: options.topP, k: options.topK },
  );
}

function buildGeneric(prompt: string, options: OptionBag): BedrockGenericBody {
  const body: BedrockGenericBody = { inputText: withSystemPrompt(prompt, options) };
  const config = assignDefined<NonNullable<BedrockGenericBody["textGenerationConfig"]>>(
    {},
    {
      maxTokenCount: options.maxTokens,
      temperature: options.temperature,
      topP: options.topP,
    },
  );
  if (Object.keys(config).length > 0) {
    body.textGenerationConfig = config;
  }
  return body;
}

// ---------------------------------------------------------------------------
// Main translation functions
// ---------------------------------------------------------------------------

export function translateRequest(
  family: ModelFamily,
  prompt: string,
  options: OptionBag,
): BedrockRequestBody {
  switch (family) {
    case ModelFamily.ANTHROPIC:
      return buildAnthropic([{ role: "user", content: prompt }], options);
    case ModelFamily.META:
      return buildMeta(prompt, options);
    case ModelFamily.MISTRAL:
      return buildMistral(prompt, options);
    case ModelFamily.COHERE:
      return buildCohere(prompt, options);
    case ModelFamily.GENERIC:
      return buildGeneric(prompt, options);
  }
}

/**
 * The anthropic family takes the conversation natively; every other family
 * gets it flattened into `role: content` lines.
 */
export function translateMessagesRequest(
  family: ModelFamily,
  messages: readonly CanonicalMessage[],
  options: OptionBag,
): BedrockRequestBody {
  if (family === ModelFamily.ANTHROPIC) {
    return buildAnthropic(
      messages.map((m) => ({ role: m.role, content: m.content })),
      options,
    );
  }
  return translateRequest(family, flattenMessages(messages), options);
}

export function translateSchemaRequest(
  family: ModelFamily,
  prompt: string,
  schema: Record<string, unknown>,
  options: OptionBag,
): BedrockRequestBody {
  const instructed = `${prompt}${SCHEMA_INSTRUCTION}${JSON.stringify(schema, null, 2)}`;
  return translateRequest(family, instructed, options);
}
