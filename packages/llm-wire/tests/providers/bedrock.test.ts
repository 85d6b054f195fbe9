import { describe, it, expect } from "vitest";
import {
  BedrockProvider,
  classifyModelFamily,
} from "../../src/providers/bedrock/index.js";
import {
  EmptyResponseError,
  MissingCredentialsError,
  UpstreamAPIError,
} from "../../src/types/index.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CLAUDE = "anthropic.claude-3-haiku-20240307-v1:0";
const LLAMA = "meta.llama3-8b-instruct-v1:0";
const MISTRAL = "mistral.mistral-7b-instruct-v0:2";
const COMMAND = "cohere.command-r-v1:0";
const TITAN = "amazon.titan-text-express-v1";

const AWS = {
  region: "us-east-1",
  access_key_id: "test-access-key",
  secret_access_key: "test-secret",
};

function provider(model: string): BedrockProvider {
  return new BedrockProvider("", model, {}, AWS);
}

function body(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("expected a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

// ===========================================================================
// Family classification
// ===========================================================================

describe("classifyModelFamily", () => {
  it("classifies by model id prefix", () => {
    expect(classifyModelFamily(CLAUDE)).toBe("anthropic");
    expect(classifyModelFamily(LLAMA)).toBe("meta");
    expect(classifyModelFamily(MISTRAL)).toBe("mistral");
    expect(classifyModelFamily(COMMAND)).toBe("cohere");
  });

  it("sees through cross-region inference profiles", () => {
    expect(classifyModelFamily(`us.${CLAUDE}`)).toBe("anthropic");
    expect(classifyModelFamily(`eu.${LLAMA}`)).toBe("meta");
  });

  it("falls back to the generic family", () => {
    expect(classifyModelFamily(TITAN)).toBe("generic");
    expect(classifyModelFamily("ai21.j2-ultra-v1")).toBe("generic");
  });
});

// ===========================================================================
// Request building
// ===========================================================================

describe("BedrockProvider.prepareRequest", () => {
  it("uses the anthropic family default of 4096 tokens", () => {
    expect(body(provider(CLAUDE).prepareRequest("Hi"))).toEqual({
      anthropic_version: "bedrock-2023-05-31",
      max_tokens: 4096,
      messages: [{ role: "user", content: "Hi" }],
    });
  });

  it("resolves per-call, then adapter default, then family default", () => {
    const p = provider(CLAUDE);
    p.setDefaultOptions({ temperature: 0.7, max_tokens: 300 });

    const withDefault = body(p.prepareRequest("Hi"));
    expect(withDefault["max_tokens"]).toBe(300);
    expect(withDefault["temperature"]).toBe(0.7);

    const withOverride = body(p.prepareRequest("Hi", { max_tokens: 1000, temperature: 0 }));
    expect(withOverride["max_tokens"]).toBe(1000);
    expect(withOverride["temperature"]).toBe(0);
  });

  it("sends the system prompt natively for the anthropic family", () => {
    const result = body(provider(CLAUDE).prepareRequest("Hi", { system_prompt: "Be terse" }));
    expect(result["system"]).toBe("Be terse");
  });

  it("wraps meta prompts in instruction tags", () => {
    expect(body(provider(LLAMA).prepareRequest("Hi"))).toEqual({
      prompt: "[INST] Hi [/INST]",
      max_gen_len: 2048,
    });
    expect(
      body(provider(LLAMA).prepareRequest("Hi", { system_prompt: "Be terse", top_p: 0.8 })),
    ).toEqual({
      prompt: "[INST] Be terse\n\nHi [/INST]",
      max_gen_len: 2048,
      top_p: 0.8,
    });
  });

  it("builds mistral bodies", () => {
    expect(body(provider(MISTRAL).prepareRequest("Hi", { top_k: 50 }))).toEqual({
      prompt: "<s>[INST] Hi [/INST]",
      max_tokens: 4096,
      top_k: 50,
    });
  });

  it("builds cohere bodies with p and k", () => {
    expect(
      body(provider(COMMAND).prepareRequest("Hi", { top_p: 0.9, top_k: 10 })),
    ).toEqual({ message: "Hi", max_tokens: 4096, p: 0.9, k: 10 });
  });

  it("builds generic bodies with an optional generation config", () => {
    expect(body(provider(TITAN).prepareRequest("Hi"))).toEqual({ inputText: "Hi" });
    expect(
      body(provider(TITAN).prepareRequest("Hi", { max_tokens: 256, temperature: 0.2 })),
    ).toEqual({
      inputText: "Hi",
      textGenerationConfig: { maxTokenCount: 256, temperature: 0.2 },
    });
  });
});

describe("BedrockProvider.prepareRequestWithMessages", () => {
  const conversation = [
    { role: "user", content: "Hi" },
    { role: "assistant", content: "Hello" },
    { role: "user", content: "Bye" },
  ];

  it("keeps native messages for the anthropic family", () => {
    expect(body(provider(CLAUDE).prepareRequestWithMessages(conversation))["messages"]).toEqual(
      conversation,
    );
  });

  it("flattens the conversation for other families", () => {
    expect(body(provider(LLAMA).prepareRequestWithMessages(conversation))["prompt"]).toBe(
      "[INST] user: Hi\nassistant: Hello\nuser: Bye\n [/INST]",
    );
  });

  it("honours structured messages on the prompt builder", () => {
    const result = body(
      provider(CLAUDE).prepareRequest("ignored", { structured_messages: conversation }),
    );
    expect(result["messages"]).toEqual(conversation);
  });
});

describe("BedrockProvider.prepareRequestWithSchema", () => {
  it("appends the pretty-printed schema", () => {
    expect(
      body(provider(COMMAND).prepareRequestWithSchema("Name a color", { type: "string" })),
    ).toEqual({
      message:
        'Name a color\n\nPlease respond with a JSON object matching this schema:\n{\n  "type": "string"\n}',
      max_tokens: 4096,
    });
  });
});

// ===========================================================================
// Endpoint, headers and signing
// ===========================================================================

describe("BedrockProvider endpoint and headers", () => {
  it("targets the regional runtime", () => {
    const p = provider(CLAUDE);
    expect(p.endpoint()).toBe(
      `https://bedrock-runtime.us-east-1.amazonaws.com/model/${CLAUDE}/invoke`,
    );
    expect(p.streamEndpoint()).toBe(
      `https://bedrock-runtime.us-east-1.amazonaws.com/model/${CLAUDE}/invoke-with-response-stream`,
    );
  });

  it("switches region through setOption without touching the body", () => {
    const p = provider(TITAN);
    p.setOption("region", "eu-west-1");
    expect(p.endpoint()).toBe(
      `https://bedrock-runtime.eu-west-1.amazonaws.com/model/${TITAN}/invoke`,
    );
    expect(body(p.prepareRequest("Hi"))).toEqual({ inputText: "Hi" });
  });

  it("defaults to us-east-1 without AWS settings", () => {
    expect(new BedrockProvider("", TITAN).endpoint()).toContain("bedrock-runtime.us-east-1.");
  });

  it("sends JSON headers plus extras", () => {
    const p = new BedrockProvider("", CLAUDE, { "X-Trace": "abc" }, AWS);
    expect(p.headers()).toEqual({
      "Content-Type": "application/json",
      Accept: "application/json",
      "X-Trace": "abc",
    });
  });

  it("signs requests for the current region", () => {
    const p = provider(CLAUDE);
    p.setOption("region", "eu-west-1");
    const headers = p.signRequest(
      { method: "POST", url: p.endpoint(), headers: p.headers(), body: p.prepareRequest("Hi") },
      new Date("2024-03-01T00:00:00.000Z"),
    );
    expect(headers["Host"]).toBe("bedrock-runtime.eu-west-1.amazonaws.com");
    expect(headers["Authorization"]).toContain(
      "Credential=test-access-key/20240301/eu-west-1/bedrock/aws4_request",
    );
  });

  it("fails closed without signing keys", () => {
    const p = new BedrockProvider("", CLAUDE);
    expect(() =>
      p.signRequest({ method: "POST", url: p.endpoint(), headers: {}, body: "{}" }),
    ).toThrow(MissingCredentialsError);
  });

  it("reports capabilities", () => {
    const p = provider(CLAUDE);
    expect(p.name).toBe("bedrock");
    expect(p.supportsSchema()).toBe(true);
    expect(p.supportsStreaming()).toBe(true);
    expect(p.supportsFunctionCalling()).toBe(false);
  });
});

// ===========================================================================
// Response parsing
// ===========================================================================

describe("BedrockProvider.parseResponse", () => {
  it("reads anthropic content blocks", () => {
    const result = provider(CLAUDE).parseResponse(
      '{"content":[{"type":"text","text":"Hi"}],"usage":{"input_tokens":3,"output_tokens":1}}',
    );
    expect(result.text).toBe("Hi");
    expect(result.usage?.total_tokens).toBe(4);
  });

  it("reads meta generations with usage", () => {
    const result = provider(LLAMA).parseResponse(
      '{"generation":"Hello","prompt_token_count":4,"generation_token_count":2,"stop_reason":"stop"}',
    );
    expect(result.text).toBe("Hello");
    expect(result.usage?.total_tokens).toBe(6);
  });

  it("reads mistral, cohere and generic outputs", () => {
    expect(
      provider(MISTRAL).parseResponse('{"outputs":[{"text":"Bonjour","stop_reason":"stop"}]}').text,
    ).toBe("Bonjour");
    expect(provider(COMMAND).parseResponse('{"text":"Hola"}').text).toBe("Hola");
    const titan = provider(TITAN).parseResponse(
      '{"inputTextTokenCount":3,"results":[{"outputText":"Hej","tokenCount":2}]}',
    );
    expect(titan.text).toBe("Hej");
    expect(titan.usage?.total_tokens).toBe(5);
  });

  it("raises the gateway message as an upstream error", () => {
    expect(() =>
      provider(LLAMA).parseResponse('{"message":"The security token included in the request is invalid."}'),
    ).toThrow(
      new UpstreamAPIError("The security token included in the request is invalid.", {
        provider: "bedrock",
      }),
    );
  });

  it("throws EmptyResponseError when the family field is missing", () => {
    expect(() => provider(LLAMA).parseResponse("{}")).toThrow(EmptyResponseError);
  });
});

// ===========================================================================
// Stream decoding
// ===========================================================================

describe("BedrockProvider.parseStreamResponse", () => {
  it("decodes flat family chunks", () => {
    expect(provider(LLAMA).parseStreamResponse('{"generation":"Hel"}')).toEqual({
      type: "token",
      text: "Hel",
    });
    expect(
      provider(LLAMA).parseStreamResponse('{"generation":"","stop_reason":"stop"}'),
    ).toEqual({ type: "end" });
    expect(
      provider(MISTRAL).parseStreamResponse('{"outputs":[{"text":"x","stop_reason":null}]}'),
    ).toEqual({ type: "token", text: "x" });
    expect(
      provider(COMMAND).parseStreamResponse('{"text":"","is_finished":true}'),
    ).toEqual({ type: "end" });
    expect(provider(TITAN).parseStreamResponse('{"outputText":"abc"}')).toEqual({
      type: "token",
      text: "abc",
    });
  });

  it("skips chunks with neither text nor a stop reason", () => {
    expect(provider(LLAMA).parseStreamResponse('{"generation":""}')).toEqual({ type: "skip" });
    expect(provider(LLAMA).parseStreamResponse("")).toEqual({ type: "skip" });
  });

  it("decodes anthropic family events", () => {
    const p = provider(CLAUDE);
    expect(
      p.parseStreamResponse('{"type":"content_block_delta","delta":{"type":"text_delta","text":"Hi"}}'),
    ).toEqual({ type: "token", text: "Hi" });
    expect(p.parseStreamResponse('{"type":"message_stop"}')).toEqual({ type: "end" });
    expect(p.parseStreamResponse('{"type":"content_block_start"}')).toEqual({ type: "skip" });
  });
});
