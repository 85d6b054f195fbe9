/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, WireFormat, ModelFamily, StreamResultType } from "./enums.js";

// Message types
export type { CanonicalMessage } from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  flattenMessages,
} from "./message.js";

// Tool types
export type {
  Tool,
  ToolDefinition,
  ToolChoice,
  ToolChoiceMode,
  NormalizedToolChoice,
  FunctionCall,
} from "./tool.js";
export {
  ToolSchema,
  ToolChoiceSchema,
  ToolChoiceModeSchema,
  normalizeToolChoice,
} from "./tool.js";

// Options
export type { OptionsInput } from "./options.js";
export { OptionBag, RESERVED_OPTION_KEYS } from "./options.js";

// Request types
export type { CanonicalRequest } from "./request.js";

// Response types
export type { ParsedResponse } from "./response.js";
export { Usage } from "./response.js";

// Stream types
export type {
  StreamDecodeResult,
  StreamToken,
  StreamSkip,
  StreamEnd,
} from "./stream.js";
export { token, skip, END } from "./stream.js";

// Result
export type { Result } from "./result.js";
export { ok, err } from "./result.js";

// Errors
export {
  LLMWireError,
  ConfigurationError,
  ConfigNotFoundError,
  ProviderNotFoundError,
  UnsupportedCapabilityError,
  InvalidRequestError,
  MissingCredentialsError,
  MalformedResponseError,
  EmptyResponseError,
  UpstreamAPIError,
  FunctionCallParseError,
} from "./errors.js";
