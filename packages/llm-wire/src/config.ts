/**
 * Configuration schemas: client-wide generation defaults, provider wire
 * configs, and the environment readers that feed them.
 */

import { z } from "zod";
import { LogLevel } from "./logger.js";
import { WireFormat } from "./types/enums.js";
import { ConfigurationError } from "./types/errors.js";

type Env = Readonly<Record<string, string | undefined>>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

function envValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

// ---------------------------------------------------------------------------
// Client configuration
// ---------------------------------------------------------------------------

export const ClientConfigSchema = z.object({
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().positive().default(300),
  top_p: z.number().min(0).max(1).optional(),
  seed: z.number().int().optional(),
  log_level: z.nativeEnum(LogLevel).default(LogLevel.WARN),
  /** Hint for the caller's retry policy; the library never retries. */
  max_retries: z.number().int().min(0).default(3),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

export function parseClientConfig(input: unknown): ClientConfig {
  const parsed = ClientConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `invalid client configuration: ${formatIssues(parsed.error)}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

const ClientEnvSchema = z.object({
  temperature: z.coerce.number().optional(),
  max_tokens: z.coerce.number().optional(),
  top_p: z.coerce.number().optional(),
  seed: z.coerce.number().optional(),
  log_level: z.string().optional(),
  max_retries: z.coerce.number().optional(),
});

/**
 * Read client configuration from `LLM_*` environment variables. Unset or
 * blank variables fall back to the schema defaults.
 */
export function configFromEnv(env: Env = process.env): ClientConfig {
  const raw = ClientEnvSchema.safeParse({
    temperature: envValue(env, "LLM_TEMPERATURE"),
    max_tokens: envValue(env, "LLM_MAX_TOKENS"),
    top_p: envValue(env, "LLM_TOP_P"),
    seed: envValue(env, "LLM_SEED"),
    log_level: envValue(env, "LLM_LOG_LEVEL"),
    max_retries: envValue(env, "LLM_MAX_RETRIES"),
  });
  if (!raw.success) {
    throw new ConfigurationError(
      `invalid client configuration: ${formatIssues(raw.error)}`,
      { cause: raw.error },
    );
  }
  return parseClientConfig(raw.data);
}

// ---------------------------------------------------------------------------
// AWS credentials
// ---------------------------------------------------------------------------

export const DEFAULT_AWS_REGION = "us-east-1";

/** Pre-resolved signing material for the Bedrock gateway. */
export interface AwsCredentials {
  readonly region: string;
  readonly access_key_id?: string;
  readonly secret_access_key?: string;
  readonly session_token?: string;
}

export function awsCredentialsFromEnv(env: Env = process.env): AwsCredentials {
  return {
    region:
      envValue(env, "AWS_REGION") ??
      envValue(env, "AWS_DEFAULT_REGION") ??
      DEFAULT_AWS_REGION,
    access_key_id: envValue(env, "AWS_ACCESS_KEY_ID"),
    secret_access_key: envValue(env, "AWS_SECRET_ACCESS_KEY"),
    session_token: envValue(env, "AWS_SESSION_TOKEN"),
  };
}

// ---------------------------------------------------------------------------
// Azure OpenAI deployment
// ---------------------------------------------------------------------------

export const DEFAULT_AZURE_OPENAI_API_VERSION = "2024-10-21";

/** Where the azure-openai config points; both optional. */
export interface AzureOpenAISettings {
  /** Resource base URL, e.g. `https://my-resource.openai.azure.com`. */
  readonly endpoint?: string;
  readonly api_version?: string;
}

export function azureOpenAIFromEnv(env: Env = process.env): AzureOpenAISettings {
  return {
    endpoint: envValue(env, "AZURE_OPENAI_ENDPOINT"),
    api_version: envValue(env, "AZURE_OPENAI_API_VERSION"),
  };
}

// ---------------------------------------------------------------------------
// Provider configuration
// ---------------------------------------------------------------------------

export const ProviderConfigSchema = z
  .object({
    name: z.string().min(1),
    wire_format: z.nativeEnum(WireFormat),
    /** URL template; `{model}` is replaced with the model id. */
    endpoint: z.string().default(""),
    auth_header: z.string().default(""),
    auth_prefix: z.string().default(""),
    required_headers: z.record(z.string()).default({}),
    endpoint_params: z.record(z.string()).default({}),
    supports_schema: z.boolean().default(false),
    supports_streaming: z.boolean().default(false),
    supports_function_calling: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    if (config.wire_format !== WireFormat.CUSTOM && config.endpoint === "") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `an endpoint is required for ${config.wire_format} wire format`,
        path: ["endpoint"],
      });
    }
  });

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;

export function parseProviderConfig(input: unknown): ProviderConfig {
  const parsed = ProviderConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      `invalid provider configuration: ${formatIssues(parsed.error)}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
