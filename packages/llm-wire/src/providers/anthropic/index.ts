/**
 * Anthropic-shaped wire format (Messages API): request building, response
 * parsing and stream decoding.
 */

export {
  translateRequest,
  translateSchemaRequest,
  SCHEMA_INSTRUCTION,
} from "./translate-request.js";
export type {
  AnthropicRequestBody,
  AnthropicMessage,
  AnthropicTextBlock,
  AnthropicToolDefinition,
  AnthropicToolChoice,
} from "./translate-request.js";
export { translateResponse, translateUsage } from "./translate-response.js";
export { translateStreamChunk, MESSAGE_STOP } from "./stream.js";
