/**
 * GenericProvider: one adapter for every vendor whose API is OpenAI-shaped
 * or Anthropic-shaped, driven entirely by its ProviderConfig.
 *
 * The config's wire format picks the translation branch; custom-shaped
 * configs are rejected at construction and need a dedicated adapter.
 */

import type { ProviderConfig } from "../../config.js";
import {
  ConfigNotFoundError,
  ConfigurationError,
  OptionBag,
  WireFormat,
  createUserMessage,
  err,
  ok,
  type CanonicalMessage,
  type OptionsInput,
  type ParsedResponse,
  type Result,
  type StreamDecodeResult,
} from "../../types/index.js";
import type { WireBytes } from "../../utils/index.js";
import * as anthropic from "../anthropic/index.js";
import { BaseProvider } from "../base.js";
import * as openai from "../openai/index.js";

/** A ProviderConfig the generic adapter can serve. */
export type ShapedProviderConfig = ProviderConfig & {
  wire_format: typeof WireFormat.OPENAI | typeof WireFormat.ANTHROPIC;
};

export function isShapedConfig(
  config: ProviderConfig,
): config is ShapedProviderConfig {
  return config.wire_format !== WireFormat.CUSTOM;
}

/** Where createGenericProvider looks configs up; a ProviderRegistry fits. */
export interface ProviderConfigLookup {
  getConfig(name: string): ProviderConfig | undefined;
}

export class GenericProvider extends BaseProvider {
  readonly name: string;
  private endpointOverride: string | undefined;

  constructor(
    private readonly config: ShapedProviderConfig,
    credential: string,
    model: string,
    extraHeaders?: Readonly<Record<string, string>>,
  ) {
    super(credential, model, extraHeaders);
    this.name = config.name;
  }

  get wireFormat(): ShapedProviderConfig["wire_format"] {
    return this.config.wire_format;
  }

  /** Send requests somewhere other than the configured endpoint. */
  setEndpoint(url: string): void {
    this.endpointOverride = url;
  }

  endpoint(): string {
    if (this.endpointOverride) return this.endpointOverride;

    const endpoint = this.config.endpoint.replaceAll("{model}", this.model);
    const params = Object.entries(this.config.endpoint_params);
    if (params.length === 0) return endpoint;

    let url: URL;
    try {
      url = new URL(endpoint);
    } catch (error) {
      throw new ConfigurationError(
        `invalid endpoint for provider ${this.name}: ${endpoint}`,
        { cause: error },
      );
    }
    for (const [key, value] of params) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  headers(): Record<string, string> {
    const headers: Record<string, string> = { ...this.config.required_headers };

    if (this.credential && this.config.auth_header) {
      headers[this.config.auth_header] = `${this.config.auth_prefix}${this.credential}`;
    }

    Object.assign(headers, this.extraHeaders);

    this.logger.debug(`Headers prepared: ${Object.keys(headers).join(", ")}`);
    return headers;
  }

  // -----------------------------------------------------------------------
  // Request builders
  // -----------------------------------------------------------------------

  prepareRequest(prompt: string, options?: OptionsInput): string {
    const bag = this.mergeOptions(options);
    const conversation = bag.structuredMessages;

    switch (this.config.wire_format) {
      case WireFormat.OPENAI:
        return JSON.stringify(
          openai.translateRequest(
            this.model,
            conversation ?? [createUserMessage(prompt)],
            bag,
          ),
        );
      case WireFormat.ANTHROPIC:
        return JSON.stringify(
          anthropic.translateRequest(this.model, conversation ?? prompt, bag),
        );
    }
  }

  prepareRequestWithMessages(
    messages: readonly CanonicalMessage[],
    options?: OptionsInput,
  ): string {
    const bag = this.mergeOptions(options);

    switch (this.config.wire_format) {
      case WireFormat.OPENAI:
        return JSON.stringify(openai.translateRequest(this.model, messages, bag));
      case WireFormat.ANTHROPIC:
        return JSON.stringify(
          anthropic.translateRequest(this.model, messages, bag),
        );
    }
  }

  protected buildSchemaRequest(
    prompt: string,
    schema: Record<string, unknown>,
    options: OptionBag,
  ): string {
    const bag = this.mergeOptions(options);

    switch (this.config.wire_format) {
      case WireFormat.OPENAI:
        return JSON.stringify(
          openai.translateSchemaRequest(
            this.model,
            bag.structuredMessages ?? [createUserMessage(prompt)],
            schema,
            bag,
            this.logger,
          ),
        );
      case WireFormat.ANTHROPIC:
        return JSON.stringify(
          anthropic.translateSchemaRequest(this.model, prompt, schema, bag),
        );
    }
  }

  // -----------------------------------------------------------------------
  // Response readers
  // -----------------------------------------------------------------------

  parseResponse(body: WireBytes): ParsedResponse {
    switch (this.config.wire_format) {
      case WireFormat.OPENAI:
        return openai.translateResponse(body, this.name);
      case WireFormat.ANTHROPIC:
        return anthropic.translateResponse(body, this.name);
    }
  }

  parseStreamResponse(chunk: WireBytes): StreamDecodeResult {
    switch (this.config.wire_format) {
      case WireFormat.OPENAI:
        return openai.translateStreamChunk(chunk, this.name);
      case WireFormat.ANTHROPIC:
        return anthropic.translateStreamChunk(chunk, this.name);
    }
  }

  // -----------------------------------------------------------------------
  // Capabilities
  // -----------------------------------------------------------------------

  supportsSchema(): boolean {
    return this.config.supports_schema;
  }

  supportsStreaming(): boolean {
    return this.config.supports_streaming;
  }

  supportsFunctionCalling(): boolean {
    return this.config.supports_function_calling;
  }
}

/**
 * Build a GenericProvider from the config registered under `name`. A missing
 * config or a custom-shaped one is returned as an error, never thrown.
 */
export function createGenericProvider(
  configs: ProviderConfigLookup,
  name: string,
  credential: string,
  model: string,
  extraHeaders?: Readonly<Record<string, string>>,
): Result<GenericProvider, ConfigurationError> {
  const config = configs.getConfig(name);
  if (!config) {
    return err(new ConfigNotFoundError(name));
  }
  if (!isShapedConfig(config)) {
    return err(
      new ConfigurationError(
        `provider ${name} uses a custom wire format and needs a dedicated adapter`,
      ),
    );
  }
  return ok(new GenericProvider(config, credential, model, extraHeaders));
}
