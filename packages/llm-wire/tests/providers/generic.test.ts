import { describe, it, expect, vi } from "vitest";
import { parseProviderConfig, type ProviderConfig } from "../../src/config.js";
import type { Logger } from "../../src/logger.js";
import {
  GenericProvider,
  createGenericProvider,
  isShapedConfig,
  type ProviderConfigLookup,
  type ShapedProviderConfig,
} from "../../src/providers/generic/index.js";
import {
  ConfigNotFoundError,
  ConfigurationError,
  UnsupportedCapabilityError,
} from "../../src/types/index.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function shaped(input: unknown): ShapedProviderConfig {
  const config = parseProviderConfig(input);
  if (!isShapedConfig(config)) throw new Error("expected a shaped config");
  return config;
}

function lookup(...configs: ProviderConfig[]): ProviderConfigLookup {
  const byName = new Map(configs.map((c): [string, ProviderConfig] => [c.name, c]));
  return { getConfig: (name) => byName.get(name) };
}

const GATEWAY = shaped({
  name: "gateway",
  wire_format: "openai",
  endpoint: "https://llm.example.test/deployments/{model}/chat",
  auth_header: "api-key",
  required_headers: { "Content-Type": "application/json" },
  endpoint_params: { "api-version": "2024-06-01" },
  supports_streaming: false,
});

// ===========================================================================
// Endpoint and headers
// ===========================================================================

describe("GenericProvider.endpoint", () => {
  it("substitutes the model and appends endpoint params", () => {
    const p = new GenericProvider(GATEWAY, "test-key", "my-model");
    expect(p.endpoint()).toBe(
      "https://llm.example.test/deployments/my-model/chat?api-version=2024-06-01",
    );
  });

  it("returns the template as-is without params", () => {
    const config = shaped({
      name: "plain",
      wire_format: "openai",
      endpoint: "https://api.example.test/v1/chat/completions",
    });
    expect(new GenericProvider(config, "", "m").endpoint()).toBe(
      "https://api.example.test/v1/chat/completions",
    );
  });

  it("prefers an explicit endpoint override", () => {
    const p = new GenericProvider(GATEWAY, "test-key", "my-model");
    p.setEndpoint("http://127.0.0.1:8080/v1/chat/completions");
    expect(p.endpoint()).toBe("http://127.0.0.1:8080/v1/chat/completions");
  });

  it("throws ConfigurationError when params meet an unparseable endpoint", () => {
    const config = shaped({
      name: "broken",
      wire_format: "openai",
      endpoint: "not a url",
      endpoint_params: { a: "b" },
    });
    expect(() => new GenericProvider(config, "", "m").endpoint()).toThrow(
      ConfigurationError,
    );
  });
});

describe("GenericProvider.headers", () => {
  it("layers required, auth and extra headers with extras winning", () => {
    const p = new GenericProvider(GATEWAY, "test-key", "m", {
      "X-Trace": "abc",
      "Content-Type": "application/vnd.test+json",
    });
    expect(p.headers()).toEqual({
      "Content-Type": "application/vnd.test+json",
      "api-key": "test-key",
      "X-Trace": "abc",
    });
  });

  it("omits the auth header without a credential", () => {
    expect(new GenericProvider(GATEWAY, "", "m").headers()).toEqual({
      "Content-Type": "application/json",
    });
  });

  it("replaces extra headers", () => {
    const p = new GenericProvider(GATEWAY, "test-key", "m", { "X-Old": "1" });
    p.setExtraHeaders({ "X-New": "2" });
    expect(p.headers()).toEqual({
      "Content-Type": "application/json",
      "api-key": "test-key",
      "X-New": "2",
    });
  });

  it("logs header names at debug level, scoped to the provider", () => {
    const debug = vi.fn();
    const scoped: Logger = {
      debug,
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: () => scoped,
    };
    const child = vi.fn((): Logger => scoped);
    const root: Logger = { ...scoped, child };

    const p = new GenericProvider(GATEWAY, "test-key", "m");
    p.setLogger(root);
    p.headers();

    expect(child).toHaveBeenCalledWith({ provider: "gateway" });
    expect(debug).toHaveBeenCalledWith("Headers prepared: Content-Type, api-key");
  });
});

// ===========================================================================
// Capabilities
// ===========================================================================

describe("GenericProvider capabilities", () => {
  it("reports the config flags", () => {
    const p = new GenericProvider(GATEWAY, "test-key", "m");
    expect(p.supportsSchema()).toBe(false);
    expect(p.supportsStreaming()).toBe(false);
    expect(p.supportsFunctionCalling()).toBe(false);
    expect(p.wireFormat).toBe("openai");
  });

  it("refuses stream requests without streaming support", () => {
    const p = new GenericProvider(GATEWAY, "test-key", "m");
    expect(() => p.prepareStreamRequest("Hi")).toThrow(
      new UnsupportedCapabilityError("gateway", "streaming"),
    );
  });

  it("extracts function calls from text", () => {
    const p = new GenericProvider(GATEWAY, "test-key", "m");
    expect(
      p.extractFunctionCalls('<function_call>{"name":"f","arguments":{}}</function_call>'),
    ).toEqual([{ name: "f", arguments: {} }]);
  });
});

// ===========================================================================
// createGenericProvider
// ===========================================================================

describe("createGenericProvider", () => {
  it("builds an adapter from a registered config", () => {
    const result = createGenericProvider(lookup(GATEWAY), "gateway", "test-key", "m");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toBeInstanceOf(GenericProvider);
      expect(result.value.name).toBe("gateway");
    }
  });

  it("returns ConfigNotFoundError for an unknown name", () => {
    const result = createGenericProvider(lookup(), "missing", "test-key", "m");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigNotFoundError);
      expect(result.error.message).toBe("Provider configuration for 'missing' not found");
    }
  });

  it("rejects a custom wire format", () => {
    const custom = parseProviderConfig({ name: "special", wire_format: "custom" });
    const result = createGenericProvider(lookup(custom), "special", "test-key", "m");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "provider special uses a custom wire format and needs a dedicated adapter",
      );
    }
  });
});
