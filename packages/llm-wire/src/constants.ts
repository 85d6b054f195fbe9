/**
 * Option keys shared across adapters, and fixed wire constants.
 */

export const OptionKey = {
  SYSTEM_PROMPT: "system_prompt",
  TOOLS: "tools",
  TOOL_CHOICE: "tool_choice",
  STRUCTURED_MESSAGES: "structured_messages",
  RESPONSE_SCHEMA: "structured_response_schema",
  TEMPERATURE: "temperature",
  MAX_TOKENS: "max_tokens",
  TOP_P: "top_p",
  TOP_K: "top_k",
  SEED: "seed",
  STREAM: "stream",
  REGION: "region",
} as const satisfies Record<string, string>;

export type OptionKey = (typeof OptionKey)[keyof typeof OptionKey];

/** Default `max_tokens` for Anthropic-shaped bodies when nobody set one. */
export const ANTHROPIC_DEFAULT_MAX_TOKENS = 1024;

/**
 * How many times an external caller may retry a parse-with-validation step.
 * The library itself never retries.
 */
export const RESPONSE_PARSER_RETRY_ATTEMPTS = 5;

/** Name of the synthetic function used to force structured output. */
export const OUTPUT_FORMATTER_FUNCTION = "output_formatter";
