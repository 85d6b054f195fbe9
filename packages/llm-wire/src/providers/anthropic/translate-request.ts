/**
 * Build Anthropic-shaped (Messages API) request bodies.
 *
 * - The system prompt is a top-level `system` field, never a message.
 * - `max_tokens` is required by the wire format; 1024 when nobody set one.
 * - Conversation messages become text content blocks, carrying
 *   `cache_control` when the message has a cache hint.
 * - There is no native structured-output field, so a schema is appended to
 *   the prompt as instructions.
 */

import { ANTHROPIC_DEFAULT_MAX_TOKENS } from "../../constants.js";
import type {
  CanonicalMessage,
  NormalizedToolChoice,
  OptionBag,
  ToolDefinition,
} from "../../types/index.js";

// ---------------------------------------------------------------------------
// Anthropic native types (request body)
// ---------------------------------------------------------------------------

export interface AnthropicTextBlock {
  type: "text";
  text: string;
  cache_control?: { type: string };
}

export interface AnthropicMessage {
  role: string;
  content: string | AnthropicTextBlock[];
}

export interface AnthropicToolDefinition {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export type AnthropicToolChoice =
  | { type: "auto" | "any" | "none" }
  | { type: "tool"; name: string };

export interface AnthropicRequestBody {
  model: string;
  messages: AnthropicMessage[];
  max_tokens: number;
  system?: string;
  tools?: AnthropicToolDefinition[];
  tool_choice?: AnthropicToolChoice;
  /** Pass-through options: temperature, top_k, stream, vendor keys. */
  [option: string]: unknown;
}

export const SCHEMA_INSTRUCTION =
  "\n\nPlease provide a response in the following JSON format: ";

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

function translateMessage(message: CanonicalMessage): AnthropicMessage {
  const block: AnthropicTextBlock = { type: "text", text: message.content };
  if (message.cache_control) {
    block.cache_control = { type: message.cache_control };
  }
  return { role: message.role, content: [block] };
}

// ---------------------------------------------------------------------------
// Tool translation
// ---------------------------------------------------------------------------

function translateTools(
  tools: readonly ToolDefinition[],
): AnthropicToolDefinition[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.parameters,
  }));
}

function translateToolChoice(
  toolChoice: NormalizedToolChoice,
): AnthropicToolChoice | undefined {
  switch (toolChoice.mode) {
    case "auto":
      return { type: "auto" };
    case "required":
      return { type: "any" };
    case "none":
      return { type: "none" };
    case "named":
      return toolChoice.tool_name
        ? { type: "tool", name: toolChoice.tool_name }
        : undefined;
  }
}

// ---------------------------------------------------------------------------
// Main translation functions
// ---------------------------------------------------------------------------

/**
 * `input` is either a single prompt (sent as one plain user message) or a
 * conversation (sent as content blocks).
 */
export function translateRequest(
  model: string,
  input: string | readonly CanonicalMessage[],
  options: OptionBag,
): AnthropicRequestBody {
  const messages: AnthropicMessage[] =
    typeof input === "string"
      ? [{ role: "user", content: input }]
      : input.map(translateMessage);

  const body: AnthropicRequestBody = {
    model,
    messages,
    ...options.extras(),
    max_tokens: options.maxTokens ?? ANTHROPIC_DEFAULT_MAX_TOKENS,
  };

  const systemPrompt = options.systemPrompt;
  if (systemPrompt) {
    body.system = systemPrompt;
  }

  const tools = options.tools;
  if (tools) {
    body.tools = translateTools(tools);
  }

  const toolChoice = options.toolChoice;
  if (toolChoice) {
    const choice = translateToolChoice(toolChoice);
    if (choice !== undefined) body.tool_choice = choice;
  }

  return body;
}

export function translateSchemaRequest(
  model: string,
  prompt: string,
  schema: Record<string, unknown>,
  options: OptionBag,
): AnthropicRequestBody {
  const instructed = `${prompt}${SCHEMA_INSTRUCTION}${JSON.stringify(schema)}`;
  return translateRequest(model, instructed, options);
}
