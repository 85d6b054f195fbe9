export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export utilities
export * from "./utils/index.js";

// Re-export provider adapters
export * from "./providers/index.js";

// Constants
export {
  OptionKey,
  ANTHROPIC_DEFAULT_MAX_TOKENS,
  RESPONSE_PARSER_RETRY_ATTEMPTS,
  OUTPUT_FORMATTER_FUNCTION,
} from "./constants.js";

// Configuration
export {
  ClientConfigSchema,
  ProviderConfigSchema,
  parseClientConfig,
  parseProviderConfig,
  configFromEnv,
  awsCredentialsFromEnv,
  azureOpenAIFromEnv,
  DEFAULT_AWS_REGION,
  DEFAULT_AZURE_OPENAI_API_VERSION,
} from "./config.js";
export type {
  ClientConfig,
  ClientConfigInput,
  ProviderConfig,
  ProviderConfigInput,
  AwsCredentials,
  AzureOpenAISettings,
} from "./config.js";

// Logging
export { LogLevel, ConsoleLogger, ScopedLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Function-call grammar
export {
  FUNCTION_CALL_OPEN,
  FUNCTION_CALL_CLOSE,
  extractFunctionCalls,
  extractFunctionCallsSettled,
  cleanResponse,
  formatFunctionCall,
} from "./function-calls.js";
export type { CleanedResponse } from "./function-calls.js";

// Registry
export {
  ProviderRegistry,
  DEFAULT_PROVIDER_CONFIGS,
  azureOpenAIConfig,
  createDefaultRegistry,
} from "./registry.js";
export type { DefaultRegistryOptions } from "./registry.js";

// Requests
export { RequestBuilder, prepareRequest, validateRequest } from "./request-builder.js";

// Streams
export { decodeStream, collectStreamText } from "./stream-decoder.js";
export type { StreamSource } from "./stream-decoder.js";
