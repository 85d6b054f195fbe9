/**
 * Shared adapter state and the operations every adapter implements the
 * same way: option and header setters, capability guards and function-call
 * extraction.
 */

import { OptionKey } from "../constants.js";
import { extractFunctionCalls } from "../function-calls.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  OptionBag,
  UnsupportedCapabilityError,
  type CanonicalMessage,
  type FunctionCall,
  type OptionsInput,
  type ParsedResponse,
  type StreamDecodeResult,
} from "../types/index.js";
import type { WireBytes } from "../utils/index.js";
import type { DefaultOptionsSource, Provider } from "./adapter.js";

export abstract class BaseProvider implements Provider {
  abstract readonly name: string;

  /** Adapter defaults; per-call options are merged over these. */
  protected readonly defaults = new OptionBag();
  protected extraHeaders: Record<string, string>;
  protected logger: Logger = silentLogger;

  constructor(
    protected readonly credential: string,
    readonly model: string,
    extraHeaders?: Readonly<Record<string, string>>,
  ) {
    this.extraHeaders = { ...extraHeaders };
  }

  abstract endpoint(): string;
  abstract headers(): Record<string, string>;
  abstract prepareRequest(prompt: string, options?: OptionsInput): string;
  abstract prepareRequestWithMessages(
    messages: readonly CanonicalMessage[],
    options?: OptionsInput,
  ): string;
  abstract parseResponse(body: WireBytes): ParsedResponse;
  abstract parseStreamResponse(chunk: WireBytes): StreamDecodeResult;
  abstract supportsSchema(): boolean;
  abstract supportsStreaming(): boolean;
  abstract supportsFunctionCalling(): boolean;

  /** Build the schema request once support has been checked. */
  protected abstract buildSchemaRequest(
    prompt: string,
    schema: Record<string, unknown>,
    options: OptionBag,
  ): string;

  prepareRequestWithSchema(
    prompt: string,
    schema: Record<string, unknown>,
    options?: OptionsInput,
  ): string {
    if (!this.supportsSchema()) {
      throw new UnsupportedCapabilityError(this.name, "schema output");
    }
    return this.buildSchemaRequest(prompt, schema, OptionBag.from(options));
  }

  prepareStreamRequest(prompt: string, options?: OptionsInput): string {
    if (!this.supportsStreaming()) {
      throw new UnsupportedCapabilityError(this.name, "streaming");
    }
    return this.prepareRequest(
      prompt,
      OptionBag.merge(options, { [OptionKey.STREAM]: true }),
    );
  }

  extractFunctionCalls(text: string): FunctionCall[] {
    return extractFunctionCalls(text);
  }

  setOption(key: string, value: unknown): void {
    this.defaults.set(key, value);
    this.logger.debug(`Option set key=${key}`);
  }

  setDefaultOptions(config: DefaultOptionsSource): void {
    this.setOption(OptionKey.TEMPERATURE, config.temperature);
    this.setOption(OptionKey.MAX_TOKENS, config.max_tokens);
    if (config.seed !== undefined) {
      this.setOption(OptionKey.SEED, config.seed);
    }
  }

  setExtraHeaders(headers: Readonly<Record<string, string>>): void {
    this.extraHeaders = { ...headers };
  }

  setLogger(logger: Logger): void {
    this.logger = logger.child({ provider: this.name });
  }

  /** Adapter defaults overlaid with the per-call options. */
  protected mergeOptions(options?: OptionsInput): OptionBag {
    return OptionBag.merge(this.defaults, options);
  }
}
