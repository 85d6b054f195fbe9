/**
 * ProviderRegistry: name → adapter constructor and name → ProviderConfig.
 *
 * A registry is a plain value: build one at startup (usually with
 * `createDefaultRegistry`) and hand it to whatever needs provider lookup.
 * Every method is synchronous, so on Node's single thread a registration
 * can never interleave with a lookup.
 */

import {
  DEFAULT_AZURE_OPENAI_API_VERSION,
  awsCredentialsFromEnv,
  azureOpenAIFromEnv,
  parseProviderConfig,
  type AwsCredentials,
  type AzureOpenAISettings,
  type ProviderConfig,
  type ProviderConfigInput,
} from "./config.js";
import type { Provider, ProviderConstructor } from "./providers/adapter.js";
import { BEDROCK_CONFIG, BedrockProvider } from "./providers/bedrock/index.js";
import {
  GenericProvider,
  isShapedConfig,
  type ProviderConfigLookup,
} from "./providers/generic/index.js";
import { ProviderNotFoundError } from "./types/index.js";

// ---------------------------------------------------------------------------
// Default provider configs
// ---------------------------------------------------------------------------

const JSON_HEADERS = { "Content-Type": "application/json" };

function openAIShaped(
  name: string,
  endpoint: string,
  overrides: Partial<ProviderConfigInput> = {},
): ProviderConfigInput {
  return {
    name,
    wire_format: "openai",
    endpoint,
    auth_header: "Authorization",
    auth_prefix: "Bearer ",
    required_headers: JSON_HEADERS,
    supports_schema: true,
    supports_streaming: true,
    supports_function_calling: true,
    ...overrides,
  };
}

const AZURE_DEPLOYMENT_PATH = "/openai/deployments/{model}/chat/completions";

/**
 * The azure-openai config: `{model}` names the deployment and the API
 * version travels as a query parameter. Without a resource endpoint the
 * host keeps its `{resource}` placeholder, to be replaced through
 * `registerConfig` or `setEndpoint`.
 */
export function azureOpenAIConfig(
  settings: AzureOpenAISettings = {},
): ProviderConfigInput {
  const base = settings.endpoint
    ? settings.endpoint.replace(/\/+$/, "")
    : "https://{resource}.openai.azure.com";
  return openAIShaped("azure-openai", `${base}${AZURE_DEPLOYMENT_PATH}`, {
    auth_header: "api-key",
    auth_prefix: "",
    endpoint_params: {
      "api-version": settings.api_version ?? DEFAULT_AZURE_OPENAI_API_VERSION,
    },
  });
}

export const DEFAULT_PROVIDER_CONFIGS: readonly ProviderConfigInput[] = [
  openAIShaped("openai", "https://api.openai.com/v1/chat/completions"),
  azureOpenAIConfig(),
  {
    name: "anthropic",
    wire_format: "anthropic",
    endpoint: "https://api.anthropic.com/v1/messages",
    auth_header: "x-api-key",
    auth_prefix: "",
    required_headers: { ...JSON_HEADERS, "anthropic-version": "2023-06-01" },
    supports_schema: true,
    supports_streaming: true,
    supports_function_calling: true,
  },
  openAIShaped("groq", "https://api.groq.com/openai/v1/chat/completions"),
  openAIShaped("deepseek", "https://api.deepseek.com/chat/completions"),
  openAIShaped("mistral", "https://api.mistral.ai/v1/chat/completions"),
  openAIShaped("openrouter", "https://openrouter.ai/api/v1/chat/completions"),
  openAIShaped(
    "google-openai",
    "https://generativelanguage.googleapis.com/v1beta/openai/chat/completions",
  ),
  openAIShaped(
    "aliyun",
    "https://dashscope.aliyuncs.com/compatible-mode/v1/chat/completions",
  ),
  openAIShaped("lmstudio", "http://localhost:1234/v1/chat/completions", {
    supports_function_calling: false,
  }),
  openAIShaped("ollama", "http://localhost:11434/v1/chat/completions", {
    auth_header: "",
    auth_prefix: "",
    supports_schema: false,
    supports_function_calling: false,
  }),
  BEDROCK_CONFIG,
];

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class ProviderRegistry implements ProviderConfigLookup {
  private readonly constructors = new Map<string, ProviderConstructor>();
  private readonly configs = new Map<string, ProviderConfig>();
  /** Names whose constructor is the generic adapter added by registerConfig. */
  private readonly generic = new Set<string>();

  /** Register (or replace) the constructor for `name`. */
  register(name: string, ctor: ProviderConstructor): this {
    this.constructors.set(name, ctor);
    this.generic.delete(name);
    return this;
  }

  /**
   * Validate and register (or replace) a config. An OpenAI- or
   * Anthropic-shaped config gets the generic adapter as its constructor,
   * unless one was registered explicitly with `register`.
   * Throws ConfigurationError when the config is invalid.
   */
  registerConfig(input: ProviderConfigInput): ProviderConfig {
    const config = parseProviderConfig(input);
    this.configs.set(config.name, config);

    const replaceable =
      !this.constructors.has(config.name) || this.generic.has(config.name);
    if (replaceable) {
      if (isShapedConfig(config)) {
        this.constructors.set(
          config.name,
          (credential, model, extraHeaders) =>
            new GenericProvider(config, credential, model, extraHeaders),
        );
        this.generic.add(config.name);
      } else {
        this.constructors.delete(config.name);
        this.generic.delete(config.name);
      }
    }
    return config;
  }

  getConfig(name: string): ProviderConfig | undefined {
    return this.configs.get(name);
  }

  hasConfig(name: string): boolean {
    return this.configs.has(name);
  }

  has(name: string): boolean {
    return this.constructors.has(name);
  }

  /** Every name with a registered constructor, sorted. */
  names(): string[] {
    return [...this.constructors.keys()].sort();
  }

  /**
   * Construct the adapter registered under `name`. Throws
   * ProviderNotFoundError, without constructing anything, for unknown names.
   */
  get(
    name: string,
    credential: string,
    model: string,
    extraHeaders?: Readonly<Record<string, string>>,
  ): Provider {
    const ctor = this.constructors.get(name);
    if (!ctor) {
      throw new ProviderNotFoundError(name);
    }
    return ctor(credential, model, extraHeaders ?? {});
  }
}

// ---------------------------------------------------------------------------
// Default registry
// ---------------------------------------------------------------------------

export interface DefaultRegistryOptions {
  /** Register only these names; all defaults when omitted. */
  providers?: readonly string[];
  /** Bedrock signing material; read from the environment at construction when omitted. */
  aws?: AwsCredentials;
  /** Azure resource endpoint and API version; read from the environment when omitted. */
  azure?: AzureOpenAISettings;
  /** Environment for the AWS and Azure fallbacks; `process.env` when omitted. */
  env?: Readonly<Record<string, string | undefined>>;
}

export function createDefaultRegistry(
  options: DefaultRegistryOptions = {},
): ProviderRegistry {
  const wanted = options.providers ? new Set(options.providers) : undefined;
  const registry = new ProviderRegistry();
  const azure = azureOpenAIConfig(options.azure ?? azureOpenAIFromEnv(options.env));

  for (const defaults of DEFAULT_PROVIDER_CONFIGS) {
    if (wanted && !wanted.has(defaults.name)) continue;
    const config = defaults.name === azure.name ? azure : defaults;
    registry.registerConfig(config);
    if (config.name === BEDROCK_CONFIG.name) {
      registry.register(
        config.name,
        (credential, model, extraHeaders) =>
          new BedrockProvider(
            credential,
            model,
            extraHeaders,
            options.aws ?? awsCredentialsFromEnv(options.env),
          ),
      );
    }
  }
  return registry;
}
