/**
 * AWS Signature Version 4 request signing.
 *
 * Covers the subset the Bedrock runtime needs: a fixed signed-header set,
 * a SHA-256 payload digest and the four-step HMAC signing-key derivation.
 */

import { createHash, createHmac } from "node:crypto";
import { MissingCredentialsError } from "../types/errors.js";
import type { WireBytes } from "./json.js";

export const SIGNING_ALGORITHM = "AWS4-HMAC-SHA256";
const REQUEST_TYPE = "aws4_request";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SigningCredentials {
  readonly access_key_id?: string;
  readonly secret_access_key?: string;
  readonly session_token?: string;
}

/** The parts of an outbound request the signature covers. */
export interface SignableRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: WireBytes;
}

export interface SigningParams {
  readonly region: string;
  readonly service: string;
  readonly credentials: SigningCredentials;
  /** Signing time; defaults to the current time. */
  readonly now?: Date;
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export function sha256Hex(data: WireBytes): string {
  return createHash("sha256").update(data).digest("hex");
}

export function hmacSha256(key: string | Uint8Array, data: string): Buffer {
  return createHmac("sha256", key).update(data).digest();
}

export function deriveSigningKey(
  secretKey: string,
  dateStamp: string,
  region: string,
  service: string,
): Buffer {
  const kDate = hmacSha256(`AWS4${secretKey}`, dateStamp);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  return hmacSha256(kService, REQUEST_TYPE);
}

/** `YYYYMMDDTHHMMSSZ` and `YYYYMMDD` for a point in time. */
export function formatSigningTime(now: Date): {
  amzDate: string;
  dateStamp: string;
} {
  const amzDate = now.toISOString().replace(/[:-]|\.\d{3}/g, "");
  return { amzDate, dateStamp: amzDate.slice(0, 8) };
}

function headerValue(
  headers: Readonly<Record<string, string>>,
  name: string,
): string {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return "";
}

/** Percent-encode everything outside the RFC 3986 unreserved set. */
export function uriEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/** Each path segment encoded once more, as the service sees the path. */
export function canonicalUri(url: URL): string {
  return url.pathname.split("/").map(uriEncode).join("/");
}

/** Query parameters encoded, then sorted by name and value. */
export function canonicalQueryString(url: URL): string {
  return [...url.searchParams]
    .map(([key, value]): [string, string] => [uriEncode(key), uriEncode(value)])
    .sort(([ak, av], [bk, bv]) =>
      ak === bk ? (av < bv ? -1 : av > bv ? 1 : 0) : ak < bk ? -1 : 1,
    )
    .map(([key, value]) => `${key}=${value}`)
    .join("&");
}

// ---------------------------------------------------------------------------
// Signing
// ---------------------------------------------------------------------------

/**
 * Sign a request and return its headers with `X-Amz-Date`, `Host`,
 * `X-Amz-Security-Token` (when a session token is present),
 * `X-Amz-Content-Sha256` and `Authorization` added.
 *
 * Throws MissingCredentialsError before doing any work when the access key
 * or secret key is missing.
 */
export function signRequest(
  request: SignableRequest,
  params: SigningParams,
): Record<string, string> {
  const { access_key_id, secret_access_key, session_token } =
    params.credentials;
  if (!access_key_id || !secret_access_key) {
    throw new MissingCredentialsError(
      "AWS credentials not configured: an access key id and a secret access key are required",
    );
  }

  const url = new URL(request.url);
  const { amzDate, dateStamp } = formatSigningTime(params.now ?? new Date());
  const payloadHash = sha256Hex(request.body);

  const headers: Record<string, string> = { ...request.headers };
  headers["X-Amz-Date"] = amzDate;
  headers["Host"] = url.host;
  if (session_token) {
    headers["X-Amz-Security-Token"] = session_token;
  }
  headers["X-Amz-Content-Sha256"] = payloadHash;

  const signedHeaders = [
    "content-type",
    "host",
    "x-amz-content-sha256",
    "x-amz-date",
    ...(session_token ? ["x-amz-security-token"] : []),
  ].sort();

  const canonicalHeaders = signedHeaders
    .map((name) => `${name}:${headerValue(headers, name).trim()}\n`)
    .join("");
  const signedHeaderList = signedHeaders.join(";");

  const canonicalRequest = [
    request.method.toUpperCase(),
    canonicalUri(url),
    canonicalQueryString(url),
    canonicalHeaders,
    signedHeaderList,
    payloadHash,
  ].join("\n");

  const credentialScope = `${dateStamp}/${params.region}/${params.service}/${REQUEST_TYPE}`;
  const stringToSign = [
    SIGNING_ALGORITHM,
    amzDate,
    credentialScope,
    sha256Hex(canonicalRequest),
  ].join("\n");

  const signingKey = deriveSigningKey(
    secret_access_key,
    dateStamp,
    params.region,
    params.service,
  );
  const signature = createHmac("sha256", signingKey)
    .update(stringToSign)
    .digest("hex");

  headers["Authorization"] =
    `${SIGNING_ALGORITHM} Credential=${access_key_id}/${credentialScope}, ` +
    `SignedHeaders=${signedHeaderList}, Signature=${signature}`;

  return headers;
}
