import { describe, it, expect } from "vitest";
import {
  canonicalQueryString,
  canonicalUri,
  deriveSigningKey,
  formatSigningTime,
  sha256Hex,
  signRequest,
  uriEncode,
  type SignableRequest,
  type SigningParams,
} from "../src/utils/sigv4.js";
import { MissingCredentialsError } from "../src/types/errors.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const NOW = new Date("2024-01-15T10:20:30.000Z");

const REQUEST: SignableRequest = {
  method: "POST",
  url: "https://bedrock-runtime.us-east-1.amazonaws.com/model/test-model/invoke",
  headers: { "Content-Type": "application/json" },
  body: '{"inputText":"Hello"}',
};

const PARAMS: SigningParams = {
  region: "us-east-1",
  service: "bedrock",
  credentials: {
    access_key_id: "test-access-key",
    secret_access_key: "test-secret",
  },
  now: NOW,
};

function signatureOf(headers: Record<string, string>): string {
  return /Signature=([0-9a-f]+)$/.exec(headers["Authorization"] ?? "")?.[1] ?? "";
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("sha256Hex", () => {
  it("hashes known inputs", () => {
    expect(sha256Hex("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
    expect(sha256Hex("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });
});

describe("formatSigningTime", () => {
  it("formats the amz date and date stamp in UTC", () => {
    expect(formatSigningTime(NOW)).toEqual({
      amzDate: "20240115T102030Z",
      dateStamp: "20240115",
    });
  });
});

describe("deriveSigningKey", () => {
  it("matches the signing key from the AWS documentation example", () => {
    const key = deriveSigningKey(
      "wJalrXUtnFEMI/K7MDENG+bPxRfiCYEXAMPLEKEY",
      "20120215",
      "us-east-1",
      "iam",
    );
    expect(key.toString("hex")).toBe(
      "f4780e2d9f65fa895f9c67b32ce1baf0b0d8a43505a000a1a9e090d414db404d",
    );
  });

  it("is deterministic and depends on every input", () => {
    const key = deriveSigningKey("test-secret", "20240115", "us-east-1", "bedrock");
    expect(key).toHaveLength(32);
    expect(
      deriveSigningKey("test-secret", "20240115", "us-east-1", "bedrock").equals(key),
    ).toBe(true);
    expect(
      deriveSigningKey("test-secret", "20240116", "us-east-1", "bedrock").equals(key),
    ).toBe(false);
    expect(
      deriveSigningKey("test-secret", "20240115", "eu-west-1", "bedrock").equals(key),
    ).toBe(false);
  });
});

describe("canonical request parts", () => {
  it("encodes outside the unreserved set", () => {
    expect(uriEncode("a-b_c.d~e")).toBe("a-b_c.d~e");
    expect(uriEncode("it's (x)*!")).toBe("it%27s%20%28x%29%2A%21");
  });

  it("encodes each path segment once more", () => {
    expect(
      canonicalUri(new URL("https://h.example/model/meta.llama3-8b-instruct-v1:0/invoke")),
    ).toBe("/model/meta.llama3-8b-instruct-v1%3A0/invoke");
    expect(canonicalUri(new URL("https://h.example/a%3Ab"))).toBe("/a%253Ab");
    expect(canonicalUri(new URL("https://h.example"))).toBe("/");
  });

  it("sorts and encodes query parameters", () => {
    expect(
      canonicalQueryString(new URL("https://h.example/p?b=2&a=x%20y&a=1&c=it's*")),
    ).toBe("a=1&a=x%20y&b=2&c=it%27s%2A");
    expect(canonicalQueryString(new URL("https://h.example/p"))).toBe("");
  });
});

describe("signRequest", () => {
  it("adds the signing headers", () => {
    const headers = signRequest(REQUEST, PARAMS);

    expect(headers["Content-Type"]).toBe("application/json");
    expect(headers["X-Amz-Date"]).toBe("20240115T102030Z");
    expect(headers["Host"]).toBe("bedrock-runtime.us-east-1.amazonaws.com");
    expect(headers["X-Amz-Content-Sha256"]).toBe(sha256Hex(REQUEST.body));
    expect(headers["X-Amz-Security-Token"]).toBeUndefined();
    expect(headers["Authorization"]).toMatch(
      new RegExp(
        "^AWS4-HMAC-SHA256 Credential=test-access-key/20240115/us-east-1/bedrock/aws4_request, " +
          "SignedHeaders=content-type;host;x-amz-content-sha256;x-amz-date, " +
          "Signature=[0-9a-f]{64}$",
      ),
    );
  });

  it("does not modify the request headers", () => {
    signRequest(REQUEST, PARAMS);
    expect(REQUEST.headers).toEqual({ "Content-Type": "application/json" });
  });

  it("signs the session token when present", () => {
    const headers = signRequest(REQUEST, {
      ...PARAMS,
      credentials: { ...PARAMS.credentials, session_token: "test-session" },
    });
    expect(headers["X-Amz-Security-Token"]).toBe("test-session");
    expect(headers["Authorization"]).toContain(
      "SignedHeaders=content-type;host;x-amz-content-sha256;x-amz-date;x-amz-security-token,",
    );
  });

  it("yields the same signature for identical inputs", () => {
    expect(signatureOf(signRequest(REQUEST, PARAMS))).toBe(
      signatureOf(signRequest(REQUEST, PARAMS)),
    );
  });

  it("changes the signature when any single input changes", () => {
    const base = signatureOf(signRequest(REQUEST, PARAMS));
    const variants = [
      signRequest({ ...REQUEST, body: '{"inputText":"Hello!"}' }, PARAMS),
      signRequest({ ...REQUEST, method: "PUT" }, PARAMS),
      signRequest({ ...REQUEST, url: `${REQUEST.url}-with-response-stream` }, PARAMS),
      signRequest(REQUEST, { ...PARAMS, region: "us-west-2" }),
      signRequest(REQUEST, { ...PARAMS, now: new Date("2024-01-15T10:20:31.000Z") }),
      signRequest(REQUEST, {
        ...PARAMS,
        credentials: { ...PARAMS.credentials, secret_access_key: "other-secret" },
      }),
    ];
    for (const headers of variants) {
      expect(signatureOf(headers)).not.toBe(base);
    }
  });

  it("ignores query parameter order", () => {
    const url = "https://bedrock-runtime.us-east-1.amazonaws.com/model/m/invoke";
    expect(signatureOf(signRequest({ ...REQUEST, url: `${url}?b=2&a=1` }, PARAMS))).toBe(
      signatureOf(signRequest({ ...REQUEST, url: `${url}?a=1&b=2` }, PARAMS)),
    );
  });

  it("reads the content type case-insensitively", () => {
    const lower = signRequest(
      { ...REQUEST, headers: { "content-type": "application/json" } },
      PARAMS,
    );
    expect(signatureOf(lower)).toBe(signatureOf(signRequest(REQUEST, PARAMS)));
  });

  it("throws MissingCredentialsError without an access key or secret", () => {
    expect(() =>
      signRequest(REQUEST, { ...PARAMS, credentials: { secret_access_key: "test-secret" } }),
    ).toThrow(MissingCredentialsError);
    expect(() =>
      signRequest(REQUEST, { ...PARAMS, credentials: { access_key_id: "test-access-key" } }),
    ).toThrow(MissingCredentialsError);
  });
});
