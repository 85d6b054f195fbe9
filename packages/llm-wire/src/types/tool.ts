/**
 * Tool-related types for the wire-translation layer.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Tool (Definition)
// ---------------------------------------------------------------------------

export const ToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  parameters: z.record(z.unknown()).default({}),
});

/** A tool definition offered to the model. */
export type Tool = z.input<typeof ToolSchema>;

/** A Tool with its defaults filled in. */
export type ToolDefinition = z.output<typeof ToolSchema>;

// ---------------------------------------------------------------------------
// ToolChoice
// ---------------------------------------------------------------------------

export const ToolChoiceModeSchema = z.enum(["auto", "none", "required", "named"]);

export type ToolChoiceMode = z.infer<typeof ToolChoiceModeSchema>;

export const ToolChoiceSchema = z.union([
  ToolChoiceModeSchema,
  z.object({
    mode: ToolChoiceModeSchema,
    tool_name: z.string().optional(),
  }),
]);

/**
 * Controls whether and how the model uses tools. A bare mode string is
 * accepted wherever the object form is.
 */
export type ToolChoice = z.infer<typeof ToolChoiceSchema>;

/** The object form of a ToolChoice. */
export interface NormalizedToolChoice {
  readonly mode: ToolChoiceMode;
  /** Required when mode is "named". */
  readonly tool_name?: string;
}

export function normalizeToolChoice(choice: ToolChoice): NormalizedToolChoice {
  return typeof choice === "string" ? { mode: choice } : choice;
}

// ---------------------------------------------------------------------------
// FunctionCall
// ---------------------------------------------------------------------------

/** A structured tool invocation recovered from a response. */
export interface FunctionCall {
  readonly name: string;
  /** Parsed arguments; a JSON-encoded string is decoded before it lands here. */
  readonly arguments: unknown;
}
