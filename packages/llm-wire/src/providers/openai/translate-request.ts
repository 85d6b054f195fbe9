/**
 * Build OpenAI-shaped (Chat Completions) request bodies.
 *
 * Body precedence: adapter defaults, then per-call options (already merged
 * into the OptionBag), then the explicitly translated system prompt, tools,
 * tool choice and schema fields.
 */

import { OUTPUT_FORMATTER_FUNCTION } from "../../constants.js";
import type { Logger } from "../../logger.js";
import {
  Role,
  type CanonicalMessage,
  type NormalizedToolChoice,
  type OptionBag,
  type ToolDefinition,
} from "../../types/index.js";
import { isRecord } from "../../utils/index.js";

// ---------------------------------------------------------------------------
// Chat Completions native types
// ---------------------------------------------------------------------------

export interface ChatCompletionMessage {
  role: string;
  content: string;
  [field: string]: unknown;
}

export interface ChatCompletionToolDef {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export type ChatCompletionToolChoice =
  | "auto"
  | "none"
  | "required"
  | { type: "function"; function: { name: string } };

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatCompletionMessage[];
  tools?: ChatCompletionToolDef[];
  tool_choice?: ChatCompletionToolChoice;
  response_format?: {
    type: "json_schema";
    json_schema: {
      name: string;
      schema: Record<string, unknown>;
      strict: boolean;
    };
  };
  functions?: Array<{
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  }>;
  function_call?: { name: string };
  /** Pass-through options: temperature, max_tokens, stream, vendor keys. */
  [option: string]: unknown;
}

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

function translateMessage(message: CanonicalMessage): ChatCompletionMessage {
  const wire: ChatCompletionMessage = {
    role: message.role,
    content: message.content,
  };
  for (const [key, value] of Object.entries(message.metadata ?? {})) {
    if (key !== "role" && key !== "content") wire[key] = value;
  }
  return wire;
}

function translateMessages(
  messages: readonly CanonicalMessage[],
  systemPrompt: string | undefined,
): ChatCompletionMessage[] {
  const result: ChatCompletionMessage[] = [];
  if (systemPrompt) {
    result.push({ role: Role.SYSTEM, content: systemPrompt });
  }
  for (const message of messages) {
    result.push(translateMessage(message));
  }
  return result;
}

// ---------------------------------------------------------------------------
// Tool translation
// ---------------------------------------------------------------------------

function translateTools(tools: readonly ToolDefinition[]): ChatCompletionToolDef[] {
  return tools.map((tool) => ({
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}

function translateToolChoice(
  toolChoice: NormalizedToolChoice,
): ChatCompletionToolChoice | undefined {
  switch (toolChoice.mode) {
    case "auto":
      return "auto";
    case "none":
      return "none";
    case "required":
      return "required";
    case "named":
      return toolChoice.tool_name
        ? { type: "function", function: { name: toolChoice.tool_name } }
        : undefined;
  }
}

// ---------------------------------------------------------------------------
// Schema cleaning
// ---------------------------------------------------------------------------

const SUPPORTED_SCHEMA_KEYWORDS: ReadonlySet<string> = new Set([
  "type",
  "properties",
  "required",
  "items",
  "enum",
  "description",
]);

/**
 * Reduce a JSON Schema to the keywords strict structured output accepts.
 * Every object level gets `additionalProperties: false`. The path of each
 * dropped keyword is appended to `dropped`.
 */
export function cleanSchema(
  schema: Record<string, unknown>,
  dropped: string[] = [],
  path = "$",
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(schema)) {
    if (!SUPPORTED_SCHEMA_KEYWORDS.has(key)) {
      if (key !== "additionalProperties") dropped.push(`${path}.${key}`);
      continue;
    }

    if (key === "properties" && isRecord(value)) {
      const properties: Record<string, unknown> = {};
      for (const [name, property] of Object.entries(value)) {
        properties[name] = isRecord(property)
          ? cleanSchema(property, dropped, `${path}.properties.${name}`)
          : property;
      }
      result[key] = properties;
    } else if (key === "items" && isRecord(value)) {
      result[key] = cleanSchema(value, dropped, `${path}.items`);
    } else {
      result[key] = value;
    }
  }

  if (schema["type"] === "object") {
    result["additionalProperties"] = false;
  }
  return result;
}

// ---------------------------------------------------------------------------
// Main translation functions
// ---------------------------------------------------------------------------

export function translateRequest(
  model: string,
  messages: readonly CanonicalMessage[],
  options: OptionBag,
): ChatCompletionRequestBody {
  const body: ChatCompletionRequestBody = {
    model,
    messages: translateMessages(messages, options.systemPrompt),
    ...options.extras(),
  };

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

/**
 * Attach a strict `json_schema` response format and force the synthetic
 * output-formatter function.
 */
export function translateSchemaRequest(
  model: string,
  messages: readonly CanonicalMessage[],
  schema: Record<string, unknown>,
  options: OptionBag,
  logger: Logger,
): ChatCompletionRequestBody {
  const dropped: string[] = [];
  const cleaned = cleanSchema(schema, dropped);
  if (dropped.length > 0) {
    logger.warn(
      `Unsupported schema keywords dropped for structured output: ${dropped.join(", ")}`,
    );
  }

  const body = translateRequest(model, messages, options);
  body.response_format = {
    type: "json_schema",
    json_schema: {
      name: "structured_response",
      schema: cleaned,
      strict: true,
    },
  };
  body.functions = [
    {
      name: OUTPUT_FORMATTER_FUNCTION,
      description: "Format the output according to the schema",
      parameters: schema,
    },
  ];
  body.function_call = { name: OUTPUT_FORMATTER_FUNCTION };
  return body;
}
