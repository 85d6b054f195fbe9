/**
 * OpenAI-shaped wire format (Chat Completions): request building, schema
 * cleaning, response parsing and stream decoding.
 */

export {
  translateRequest,
  translateSchemaRequest,
  cleanSchema,
} from "./translate-request.js";
export type {
  ChatCompletionRequestBody,
  ChatCompletionMessage,
  ChatCompletionToolDef,
  ChatCompletionToolChoice,
} from "./translate-request.js";
export { translateResponse, translateUsage } from "./translate-response.js";
export { translateStreamChunk, DONE_MARKER } from "./stream.js";
