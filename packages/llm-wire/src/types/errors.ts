/**
 * Error hierarchy for the wire-translation layer.
 *
 * All library errors inherit from LLMWireError. Nothing here is retried or
 * logged by the library itself; every error goes back to the immediate
 * caller of the operation that raised it.
 */

// ---------------------------------------------------------------------------
// LLMWireError — base for all library errors
// ---------------------------------------------------------------------------

/** Base error for all library errors. */
export class LLMWireError extends Error {
  /** Whether retrying the whole call may succeed. */
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, { cause: options?.cause });
    this.name = "LLMWireError";
    this.retryable = options?.retryable ?? false;
  }
}

// ---------------------------------------------------------------------------
// Configuration errors
// ---------------------------------------------------------------------------

/** Misconfiguration: invalid config values, unusable provider config. */
export class ConfigurationError extends LLMWireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "ConfigurationError";
  }
}

/** No provider configuration is registered under the requested name. */
export class ConfigNotFoundError extends ConfigurationError {
  readonly provider: string;

  constructor(provider: string) {
    super(`Provider configuration for '${provider}' not found`);
    this.name = "ConfigNotFoundError";
    this.provider = provider;
  }
}

/** No provider constructor is registered under the requested name. */
export class ProviderNotFoundError extends ConfigurationError {
  readonly provider: string;

  constructor(provider: string) {
    super(`unknown provider: ${provider}`);
    this.name = "ProviderNotFoundError";
    this.provider = provider;
  }
}

// ---------------------------------------------------------------------------
// Request-side errors
// ---------------------------------------------------------------------------

/** A capability (schema output, streaming) was requested but is not offered. */
export class UnsupportedCapabilityError extends LLMWireError {
  readonly provider: string;
  readonly capability: string;

  constructor(provider: string, capability: string) {
    super(`provider ${provider} does not support ${capability}`, {
      retryable: false,
    });
    this.name = "UnsupportedCapabilityError";
    this.provider = provider;
    this.capability = capability;
  }
}

/** The canonical request cannot be translated as given. */
export class InvalidRequestError extends LLMWireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "InvalidRequestError";
  }
}

/** Signing was attempted without access or secret key material. */
export class MissingCredentialsError extends LLMWireError {
  constructor(message: string) {
    super(message, { retryable: false });
    this.name = "MissingCredentialsError";
  }
}

// ---------------------------------------------------------------------------
// Response-side errors
// ---------------------------------------------------------------------------

/** A response body or stream chunk is not valid JSON. */
export class MalformedResponseError extends LLMWireError {
  /** The text that failed to decode. */
  readonly raw: string;

  constructor(message: string, options: { raw: string; cause?: unknown }) {
    super(message, { cause: options.cause, retryable: false });
    this.name = "MalformedResponseError";
    this.raw = options.raw;
  }
}

/** A well-formed body that carries no generated content. */
export class EmptyResponseError extends LLMWireError {
  readonly provider: string;

  constructor(provider: string, message = "empty response from API") {
    super(message, { retryable: true });
    this.name = "EmptyResponseError";
    this.provider = provider;
  }
}

/** The vendor returned a structured error payload. */
export class UpstreamAPIError extends LLMWireError {
  readonly provider: string;
  /** Vendor error type/code, when present. */
  readonly error_code?: string;
  /** Parsed error body. */
  readonly raw?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      provider: string;
      error_code?: string;
      raw?: Record<string, unknown>;
    },
  ) {
    super(message, { retryable: true });
    this.name = "UpstreamAPIError";
    this.provider = options.provider;
    this.error_code = options.error_code;
    this.raw = options.raw;
  }
}

/** An embedded `<function_call>` span holds malformed JSON. */
export class FunctionCallParseError extends LLMWireError {
  /** The span body that failed to parse. */
  readonly span: string;

  constructor(message: string, options: { span: string; cause?: unknown }) {
    super(message, { cause: options.cause, retryable: false });
    this.name = "FunctionCallParseError";
    this.span = options.span;
  }
}
