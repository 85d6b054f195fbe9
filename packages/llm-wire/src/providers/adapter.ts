/**
 * Provider: the contract every vendor adapter implements.
 *
 * An adapter turns canonical prompts, conversations and options into the
 * JSON body a vendor expects, and turns the vendor's response bodies and
 * stream chunks back into text and tool calls. It never opens a connection:
 * sending the body to `endpoint()` with `headers()` is the caller's job.
 */

import type { ClientConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type {
  CanonicalMessage,
  FunctionCall,
  OptionsInput,
  ParsedResponse,
  StreamDecodeResult,
} from "../types/index.js";
import type { WireBytes } from "../utils/index.js";

/** The slice of client configuration that seeds adapter defaults. */
export type DefaultOptionsSource = Pick<ClientConfig, "temperature" | "max_tokens"> &
  Partial<Pick<ClientConfig, "seed">>;

export interface Provider {
  /** Registry name, e.g. "openai", "groq", "bedrock". */
  readonly name: string;

  /** Model id this adapter was created for. */
  readonly model: string;

  /** Target URL for one call. */
  endpoint(): string;

  /**
   * Static required headers, then the derived auth header, then caller
   * extra headers. Later entries win on collision.
   */
  headers(): Record<string, string>;

  /** JSON body for a single-prompt call. */
  prepareRequest(prompt: string, options?: OptionsInput): string;

  /**
   * JSON body asking for output shaped by `schema`. Throws
   * UnsupportedCapabilityError when the adapter has no schema support.
   */
  prepareRequestWithSchema(
    prompt: string,
    schema: Record<string, unknown>,
    options?: OptionsInput,
  ): string;

  /** JSON body for a structured conversation. */
  prepareRequestWithMessages(
    messages: readonly CanonicalMessage[],
    options?: OptionsInput,
  ): string;

  /**
   * JSON body for a streamed single-prompt call. Throws
   * UnsupportedCapabilityError when the adapter cannot stream.
   */
  prepareStreamRequest(prompt: string, options?: OptionsInput): string;

  /** Read the generated text and tool calls from a full response body. */
  parseResponse(body: WireBytes): ParsedResponse;

  /** Decode one stream chunk (one line, or one event object). */
  parseStreamResponse(chunk: WireBytes): StreamDecodeResult;

  /** Recover `<function_call>` spans from generated text. */
  extractFunctionCalls(text: string): FunctionCall[];

  supportsSchema(): boolean;
  supportsStreaming(): boolean;
  supportsFunctionCalling(): boolean;

  /** Set one adapter default; per-call options still win over it. */
  setOption(key: string, value: unknown): void;

  /** Seed temperature, max_tokens and (when present) seed. */
  setDefaultOptions(config: DefaultOptionsSource): void;

  /** Replace the caller-supplied extra headers. */
  setExtraHeaders(headers: Readonly<Record<string, string>>): void;

  setLogger(logger: Logger): void;
}

/** How the registry builds an adapter. */
export type ProviderConstructor = (
  credential: string,
  model: string,
  extraHeaders?: Readonly<Record<string, string>>,
) => Provider;
