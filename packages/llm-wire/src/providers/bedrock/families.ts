/**
 * Model families behind the Bedrock runtime, classified from the model id.
 */

import { ModelFamily } from "../../types/index.js";

const FAMILY_PREFIXES: ReadonlyArray<readonly [string, ModelFamily]> = [
  ["anthropic.", ModelFamily.ANTHROPIC],
  ["meta.", ModelFamily.META],
  ["mistral.", ModelFamily.MISTRAL],
  ["cohere.", ModelFamily.COHERE],
];

/**
 * Cross-region inference profiles prefix the model id with a geography,
 * e.g. `us.anthropic.claude-3-5-sonnet-20240620-v1:0`.
 */
const REGION_PROFILE_PREFIX = /^(us|eu|apac|us-gov)\./;

/** Unrecognized ids (amazon., ai21., ...) fall back to the generic family. */
export function classifyModelFamily(model: string): ModelFamily {
  const id = model.replace(REGION_PROFILE_PREFIX, "");
  for (const [prefix, family] of FAMILY_PREFIXES) {
    if (id.startsWith(prefix)) return family;
  }
  return ModelFamily.GENERIC;
}

/** Output-length default per family; the generic family sends none. */
export const FAMILY_DEFAULT_MAX_TOKENS = {
  anthropic: 4096,
  meta: 2048,
  mistral: 4096,
  cohere: 4096,
} as const satisfies Partial<Record<ModelFamily, number>>;

export const ANTHROPIC_BEDROCK_VERSION = "bedrock-2023-05-31";
