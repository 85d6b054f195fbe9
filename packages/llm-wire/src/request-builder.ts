/**
 * Assemble CanonicalRequests and dispatch them onto a Provider.
 */

import { OptionKey } from "./constants.js";
import type { Provider } from "./providers/adapter.js";
import {
  InvalidRequestError,
  OptionBag,
  UnsupportedCapabilityError,
  flattenMessages,
  type CanonicalMessage,
  type CanonicalRequest,
  type Tool,
  type ToolChoice,
} from "./types/index.js";

// ---------------------------------------------------------------------------
// RequestBuilder
// ---------------------------------------------------------------------------

export class RequestBuilder {
  private prompt: string | undefined;
  private readonly messages: CanonicalMessage[] = [];
  private systemPrompt: string | undefined;
  private tools: Tool[] | undefined;
  private toolChoice: ToolChoice | undefined;
  private responseSchema: Record<string, unknown> | undefined;
  private readonly options: Record<string, unknown> = {};

  withPrompt(prompt: string): this {
    this.prompt = prompt;
    return this;
  }

  withMessage(message: CanonicalMessage): this {
    this.messages.push(message);
    return this;
  }

  withMessages(messages: readonly CanonicalMessage[]): this {
    this.messages.push(...messages);
    return this;
  }

  withSystemPrompt(systemPrompt: string): this {
    this.systemPrompt = systemPrompt;
    return this;
  }

  withTools(tools: readonly Tool[]): this {
    this.tools = [...tools];
    return this;
  }

  withToolChoice(toolChoice: ToolChoice): this {
    this.toolChoice = toolChoice;
    return this;
  }

  withResponseSchema(schema: Record<string, unknown>): this {
    this.responseSchema = schema;
    return this;
  }

  withOption(key: string, value: unknown): this {
    this.options[key] = value;
    return this;
  }

  withOptions(options: Readonly<Record<string, unknown>>): this {
    Object.assign(this.options, options);
    return this;
  }

  /** Throws InvalidRequestError unless exactly one of prompt or messages is set. */
  build(): CanonicalRequest {
    const request: CanonicalRequest = {
      prompt: this.prompt,
      messages: this.messages.length > 0 ? [...this.messages] : undefined,
      system_prompt: this.systemPrompt,
      tools: this.tools,
      tool_choice: this.toolChoice,
      response_schema: this.responseSchema,
      options: { ...this.options },
    };
    validateRequest(request);
    return request;
  }
}

export function validateRequest(request: CanonicalRequest): void {
  const hasPrompt = request.prompt !== undefined;
  const hasMessages =
    request.messages !== undefined && request.messages.length > 0;
  if (hasPrompt === hasMessages) {
    throw new InvalidRequestError(
      "a request needs exactly one of prompt or messages",
    );
  }
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

function requestOptions(request: CanonicalRequest): OptionBag {
  const bag = new OptionBag(request.options);
  if (request.system_prompt !== undefined) {
    bag.set(OptionKey.SYSTEM_PROMPT, request.system_prompt);
  }
  if (request.tools !== undefined) bag.set(OptionKey.TOOLS, request.tools);
  if (request.tool_choice !== undefined) {
    bag.set(OptionKey.TOOL_CHOICE, request.tool_choice);
  }
  return bag;
}

/**
 * Build the request body for `request` with the matching provider
 * operation: schema builder when a response schema is set, streaming
 * builder when the `stream` option is true, messages builder for a
 * conversation, prompt builder otherwise.
 */
export function prepareRequest(
  provider: Provider,
  request: CanonicalRequest,
): string {
  validateRequest(request);
  const options = requestOptions(request);
  const messages = request.messages;

  if (options.tools && !provider.supportsFunctionCalling()) {
    throw new UnsupportedCapabilityError(provider.name, "function calling");
  }

  if (request.response_schema) {
    if (messages) {
      options.set(OptionKey.STRUCTURED_MESSAGES, messages);
      return provider.prepareRequestWithSchema(
        flattenMessages(messages),
        request.response_schema,
        options,
      );
    }
    return provider.prepareRequestWithSchema(
      request.prompt ?? "",
      request.response_schema,
      options,
    );
  }

  if (options.stream) {
    if (!messages) {
      return provider.prepareStreamRequest(request.prompt ?? "", options);
    }
    if (!provider.supportsStreaming()) {
      throw new UnsupportedCapabilityError(provider.name, "streaming");
    }
  }

  return messages
    ? provider.prepareRequestWithMessages(messages, options)
    : provider.prepareRequest(request.prompt ?? "", options);
}
