/**
 * Core enums for the wire-translation layer.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/**
 * Well-known conversation roles. Message roles are plain strings and are
 * passed through to the wire untouched; these constants only name the common
 * ones.
 */
export const Role = {
  /** High-level instructions shaping model behavior. Typically first. */
  SYSTEM: "system",
  /** Human input. */
  USER: "user",
  /** Model output. */
  ASSISTANT: "assistant",
  /** Tool execution results. */
  TOOL: "tool",
  /** Privileged instructions from the application (not the end user). */
  DEVELOPER: "developer",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// WireFormat
// ---------------------------------------------------------------------------

/** The family of JSON shapes a vendor's API expects and returns. */
export const WireFormat = {
  /** `{model, messages}` bodies, `choices[0].message` responses. */
  OPENAI: "openai",
  /** `{model, messages, max_tokens, system}` bodies, content-block responses. */
  ANTHROPIC: "anthropic",
  /** Not expressible by configuration; needs a dedicated adapter. */
  CUSTOM: "custom",
} as const satisfies Record<string, string>;

export type WireFormat = (typeof WireFormat)[keyof typeof WireFormat];

// ---------------------------------------------------------------------------
// ModelFamily
// ---------------------------------------------------------------------------

/** Payload families fronted by the signed multi-model gateway. */
export const ModelFamily = {
  ANTHROPIC: "anthropic",
  META: "meta",
  MISTRAL: "mistral",
  COHERE: "cohere",
  /** Titan-style `inputText` payloads; also the fallback for unknown ids. */
  GENERIC: "generic",
} as const satisfies Record<string, string>;

export type ModelFamily = (typeof ModelFamily)[keyof typeof ModelFamily];

// ---------------------------------------------------------------------------
// StreamResultType
// ---------------------------------------------------------------------------

/** Discriminator tags for StreamDecodeResult. */
export const StreamResultType = {
  /** The chunk produced a piece of generated text. */
  TOKEN: "token",
  /** No token this chunk; keep reading. */
  SKIP: "skip",
  /** Normal end of the stream. */
  END: "end",
} as const satisfies Record<string, string>;

export type StreamResultType =
  (typeof StreamResultType)[keyof typeof StreamResultType];
