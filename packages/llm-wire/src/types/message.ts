/**
 * Message types for the wire-translation layer.
 */

import { Role } from "./enums.js";

// ---------------------------------------------------------------------------
// CanonicalMessage
// ---------------------------------------------------------------------------

/**
 * One turn of a conversation, in conversation order.
 *
 * `role` is passed through to the wire as-is; adapters never re-interpret it.
 */
export interface CanonicalMessage {
  readonly role: string;
  readonly content: string;
  /** Cache hint tag, e.g. "ephemeral". */
  readonly cache_control?: string;
  /** Extra fields merged into the wire message by OpenAI-shaped adapters. */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Factory helpers
// ---------------------------------------------------------------------------

export function createSystemMessage(text: string): CanonicalMessage {
  return { role: Role.SYSTEM, content: text };
}

export function createUserMessage(
  text: string,
  cacheControl?: string,
): CanonicalMessage {
  return cacheControl
    ? { role: Role.USER, content: text, cache_control: cacheControl }
    : { role: Role.USER, content: text };
}

export function createAssistantMessage(text: string): CanonicalMessage {
  return { role: Role.ASSISTANT, content: text };
}

/**
 * Flatten a conversation into `role: content` lines, for wire shapes that
 * only take a single prompt string.
 */
export function flattenMessages(messages: readonly CanonicalMessage[]): string {
  return messages.map((m) => `${m.role}: ${m.content}\n`).join("");
}
