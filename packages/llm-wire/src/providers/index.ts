/**
 * Barrel re-export for all provider adapters.
 */

// Adapter interface
export type {
  Provider,
  ProviderConstructor,
  DefaultOptionsSource,
} from "./adapter.js";
export { BaseProvider } from "./base.js";

// Config-driven adapter (OpenAI-shaped and Anthropic-shaped vendors)
export {
  GenericProvider,
  createGenericProvider,
  isShapedConfig,
} from "./generic/index.js";
export type {
  ShapedProviderConfig,
  ProviderConfigLookup,
} from "./generic/index.js";

// Bedrock adapter
export {
  BedrockProvider,
  BEDROCK_CONFIG,
  BEDROCK_SERVICE,
  classifyModelFamily,
  FAMILY_DEFAULT_MAX_TOKENS,
} from "./bedrock/index.js";

// Wire-format translators
export * as openai from "./openai/index.js";
export * as anthropic from "./anthropic/index.js";
