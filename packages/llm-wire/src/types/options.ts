/**
 * OptionBag: the ordered key→value container behind adapter defaults and
 * per-call overrides.
 *
 * Merge precedence: `OptionBag.merge(a, b, ...)` applies bags left to right,
 * so a later bag wins on key collision. Adapters always merge
 * `(defaults, perCall)`, which makes per-call values override adapter
 * defaults. A key keeps the position where it was first seen.
 */

import { z } from "zod";
import { OptionKey } from "../constants.js";
import { InvalidRequestError } from "./errors.js";
import type { CanonicalMessage } from "./message.js";
import {
  ToolChoiceSchema,
  ToolSchema,
  normalizeToolChoice,
  type NormalizedToolChoice,
  type ToolDefinition,
} from "./tool.js";

/** Anything an operation accepts as per-call options. */
export type OptionsInput = OptionBag | Readonly<Record<string, unknown>>;

/**
 * Keys the translators handle explicitly; they never flow into a request
 * body through the generic option merge.
 */
export const RESERVED_OPTION_KEYS: ReadonlySet<string> = new Set([
  OptionKey.SYSTEM_PROMPT,
  OptionKey.TOOLS,
  OptionKey.TOOL_CHOICE,
  OptionKey.STRUCTURED_MESSAGES,
  OptionKey.RESPONSE_SCHEMA,
  "model",
  "messages",
]);

const NumberSchema = z.number().finite();
const IntegerSchema = z.number().int();
const ToolsSchema = z.array(ToolSchema);
const MessageSchema = z.object({
  role: z.string(),
  content: z.string(),
  cache_control: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export class OptionBag {
  private readonly entries = new Map<string, unknown>();

  constructor(init?: OptionsInput) {
    if (init) this.assign(init);
  }

  /** Merge bags left to right; later bags win. */
  static merge(...bags: Array<OptionsInput | undefined>): OptionBag {
    const merged = new OptionBag();
    for (const bag of bags) {
      if (bag) merged.assign(bag);
    }
    return merged;
  }

  static from(input?: OptionsInput): OptionBag {
    return input instanceof OptionBag ? input : new OptionBag(input);
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): unknown {
    return this.entries.get(key);
  }

  set(key: string, value: unknown): this {
    this.entries.set(key, value);
    return this;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /** Copy every entry of `input` into this bag, overwriting collisions. */
  assign(input: OptionsInput): this {
    const source =
      input instanceof OptionBag ? input.entries : Object.entries(input);
    for (const [key, value] of source) {
      this.entries.set(key, value);
    }
    return this;
  }

  /** A new bag with the same entries. */
  clone(): OptionBag {
    return new OptionBag(this);
  }

  /** A new bag with `overrides` applied on top of this one. */
  with(overrides: OptionsInput): OptionBag {
    return OptionBag.merge(this, overrides);
  }

  /** A new bag without the given keys. */
  without(...keys: string[]): OptionBag {
    const copy = this.clone();
    for (const key of keys) copy.delete(key);
    return copy;
  }

  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.entries);
  }

  /**
   * Every entry not reserved for explicit translation. This is the escape
   * hatch that carries vendor-specific keys into request bodies.
   */
  extras(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of this.entries) {
      if (!RESERVED_OPTION_KEYS.has(key)) out[key] = value;
    }
    return out;
  }

  // -----------------------------------------------------------------------
  // Typed accessors. An ill-typed sampling value reads as undefined; an
  // ill-typed reserved value throws InvalidRequestError, since it would
  // otherwise vanish from the request body.
  // -----------------------------------------------------------------------

  get temperature(): number | undefined {
    return this.read(OptionKey.TEMPERATURE, NumberSchema);
  }

  get maxTokens(): number | undefined {
    return this.read(OptionKey.MAX_TOKENS, IntegerSchema);
  }

  get topP(): number | undefined {
    return this.read(OptionKey.TOP_P, NumberSchema);
  }

  get topK(): number | undefined {
    return this.read(OptionKey.TOP_K, IntegerSchema);
  }

  get seed(): number | undefined {
    return this.read(OptionKey.SEED, IntegerSchema);
  }

  get stream(): boolean {
    return this.read(OptionKey.STREAM, z.boolean()) ?? false;
  }

  get systemPrompt(): string | undefined {
    const value = this.readReserved(OptionKey.SYSTEM_PROMPT, z.string());
    return value === "" ? undefined : value;
  }

  get tools(): ToolDefinition[] | undefined {
    const value = this.readReserved(OptionKey.TOOLS, ToolsSchema);
    return value && value.length > 0 ? value : undefined;
  }

  get toolChoice(): NormalizedToolChoice | undefined {
    const value = this.readReserved(OptionKey.TOOL_CHOICE, ToolChoiceSchema);
    return value === undefined ? undefined : normalizeToolChoice(value);
  }

  get responseSchema(): Record<string, unknown> | undefined {
    return this.readReserved(OptionKey.RESPONSE_SCHEMA, z.record(z.unknown()));
  }

  get structuredMessages(): CanonicalMessage[] | undefined {
    return this.readReserved(
      OptionKey.STRUCTURED_MESSAGES,
      z.array(MessageSchema),
    );
  }

  private read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    if (!this.entries.has(key)) return undefined;
    const parsed = schema.safeParse(this.entries.get(key));
    return parsed.success ? parsed.data : undefined;
  }

  /** Absent, undefined and null read as undefined; anything else must parse. */
  private readReserved<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): T | undefined {
    const value = this.entries.get(key);
    if (value === undefined || value === null) return undefined;
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${[key, ...issue.path].join(".")}: ${issue.message}`)
        .join("; ");
      throw new InvalidRequestError(`invalid "${key}" option: ${issues}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
