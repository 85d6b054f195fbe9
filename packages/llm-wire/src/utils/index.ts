/**
 * Barrel re-export for utility modules.
 */

// JSON helpers
export {
  toText,
  parseJson,
  isRecord,
  reparseJsonString,
} from "./json.js";
export type { WireBytes } from "./json.js";

// Line reader
export { readLines, stripDataPrefix } from "./line-reader.js";

// Request signing
export {
  SIGNING_ALGORITHM,
  sha256Hex,
  hmacSha256,
  deriveSigningKey,
  formatSigningTime,
  uriEncode,
  canonicalUri,
  canonicalQueryString,
  signRequest,
} from "./sigv4.js";
export type {
  SigningCredentials,
  SignableRequest,
  SigningParams,
} from "./sigv4.js";

// Error mapping
export { mapUpstreamError } from "./error-mapping.js";
