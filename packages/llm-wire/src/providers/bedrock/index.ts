/**
 * BedrockProvider: the AWS Bedrock runtime.
 *
 * One vendor name fronts several model families with incompatible payloads,
 * and every request must carry a SigV4 signature, so neither wire format of
 * the generic adapter fits. The family is fixed by the model id at
 * construction.
 */

import { DEFAULT_AWS_REGION, type AwsCredentials, type ProviderConfigInput } from "../../config.js";
import { OptionKey } from "../../constants.js";
import {
  WireFormat,
  type CanonicalMessage,
  type ModelFamily,
  type OptionBag,
  type OptionsInput,
  type ParsedResponse,
  type StreamDecodeResult,
} from "../../types/index.js";
import {
  signRequest,
  type SignableRequest,
  type WireBytes,
} from "../../utils/index.js";
import { BaseProvider } from "../base.js";
import { classifyModelFamily } from "./families.js";
import {
  translateMessagesRequest,
  translateRequest,
  translateSchemaRequest,
} from "./translate-request.js";
import { translateResponse } from "./translate-response.js";
import { translateStreamChunk } from "./stream.js";

export const BEDROCK_SERVICE = "bedrock";

const BEDROCK_HEADERS = {
  "Content-Type": "application/json",
  Accept: "application/json",
} as const satisfies Record<string, string>;

/** Registry entry; the custom wire format routes it to this adapter. */
export const BEDROCK_CONFIG = {
  name: "bedrock",
  wire_format: WireFormat.CUSTOM,
  endpoint: "https://bedrock-runtime.{region}.amazonaws.com/model/{model}/invoke",
  required_headers: { ...BEDROCK_HEADERS },
  supports_schema: true,
  supports_streaming: true,
  supports_function_calling: false,
} satisfies ProviderConfigInput;

export class BedrockProvider extends BaseProvider {
  readonly name = BEDROCK_CONFIG.name;
  readonly family: ModelFamily;
  private region: string;
  private readonly aws: AwsCredentials;

  /**
   * `credential` is unused: Bedrock authenticates with the signing keys in
   * `aws`, which default to none (signing then fails closed).
   */
  constructor(
    credential: string,
    model: string,
    extraHeaders?: Readonly<Record<string, string>>,
    aws?: AwsCredentials,
  ) {
    super(credential, model, extraHeaders);
    this.family = classifyModelFamily(model);
    this.aws = aws ?? { region: DEFAULT_AWS_REGION };
    this.region = this.aws.region;
  }

  endpoint(): string {
    return `https://bedrock-runtime.${this.region}.amazonaws.com/model/${this.model}/invoke`;
  }

  /** The response-streaming variant of `endpoint()`. */
  streamEndpoint(): string {
    return `https://bedrock-runtime.${this.region}.amazonaws.com/model/${this.model}/invoke-with-response-stream`;
  }

  /** Signature headers are added later, by `signRequest`. */
  headers(): Record<string, string> {
    return { ...BEDROCK_HEADERS, ...this.extraHeaders };
  }

  /** `region` moves the adapter to another AWS region; other keys are defaults. */
  override setOption(key: string, value: unknown): void {
    if (key === OptionKey.REGION) {
      if (typeof value === "string" && value !== "") {
        this.region = value;
        this.logger.debug(`Region set region=${value}`);
      }
      return;
    }
    super.setOption(key, value);
  }

  // -----------------------------------------------------------------------
  // Request builders
  // -----------------------------------------------------------------------

  prepareRequest(prompt: string, options?: OptionsInput): string {
    const bag = this.mergeOptions(options);
    const conversation = bag.structuredMessages;
    const body = conversation
      ? translateMessagesRequest(this.family, conversation, bag)
      : translateRequest(this.family, prompt, bag);
    return JSON.stringify(body);
  }

  prepareRequestWithMessages(
    messages: readonly CanonicalMessage[],
    options?: OptionsInput,
  ): string {
    return JSON.stringify(
      translateMessagesRequest(this.family, messages, this.mergeOptions(options)),
    );
  }

  protected buildSchemaRequest(
    prompt: string,
    schema: Record<string, unknown>,
    options: OptionBag,
  ): string {
    return JSON.stringify(
      translateSchemaRequest(this.family, prompt, schema, this.mergeOptions(options)),
    );
  }

  // -----------------------------------------------------------------------
  // Response readers
  // -----------------------------------------------------------------------

  parseResponse(body: WireBytes): ParsedResponse {
    return translateResponse(body, this.family, this.name);
  }

  parseStreamResponse(chunk: WireBytes): StreamDecodeResult {
    return translateStreamChunk(chunk, this.family, this.name);
  }

  // -----------------------------------------------------------------------
  // Capabilities
  // -----------------------------------------------------------------------

  supportsSchema(): boolean {
    return BEDROCK_CONFIG.supports_schema;
  }

  supportsStreaming(): boolean {
    return BEDROCK_CONFIG.supports_streaming;
  }

  supportsFunctionCalling(): boolean {
    return BEDROCK_CONFIG.supports_function_calling;
  }

  // -----------------------------------------------------------------------
  // Signing
  // -----------------------------------------------------------------------

  /**
   * Headers for `request` with the SigV4 signature added. Throws
   * MissingCredentialsError when the access key or secret key is missing.
   */
  signRequest(request: SignableRequest, now?: Date): Record<string, string> {
    return signRequest(request, {
      region: this.region,
      service: BEDROCK_SERVICE,
      credentials: this.aws,
      now,
    });
  }
}

export { classifyModelFamily, FAMILY_DEFAULT_MAX_TOKENS } from "./families.js";
export { translateStreamChunk } from "./stream.js";
