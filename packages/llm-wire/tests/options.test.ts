import { describe, it, expect } from "vitest";
import { InvalidRequestError } from "../src/types/errors.js";
import { OptionBag, RESERVED_OPTION_KEYS } from "../src/types/options.js";

describe("OptionBag.merge", () => {
  it("lets later bags win while keys keep their first position", () => {
    const merged = OptionBag.merge({ a: 1, b: 2 }, { b: 3, c: 4 });
    expect(merged.keys()).toEqual(["a", "b", "c"]);
    expect(merged.get("b")).toBe(3);
  });

  it("skips undefined bags", () => {
    const merged = OptionBag.merge(undefined, { a: 1 }, undefined);
    expect(merged.toRecord()).toEqual({ a: 1 });
  });

  it("does not mutate its inputs", () => {
    const defaults = new OptionBag({ temperature: 0.2 });
    OptionBag.merge(defaults, { temperature: 0.9 });
    expect(defaults.temperature).toBe(0.2);
  });
});

describe("OptionBag helpers", () => {
  it("from returns the same bag instance", () => {
    const bag = new OptionBag({ a: 1 });
    expect(OptionBag.from(bag)).toBe(bag);
    expect(OptionBag.from({ a: 1 }).get("a")).toBe(1);
    expect(OptionBag.from().size).toBe(0);
  });

  it("with and without return new bags", () => {
    const bag = new OptionBag({ a: 1, b: 2 });
    expect(bag.with({ b: 5 }).get("b")).toBe(5);
    expect(bag.without("a").keys()).toEqual(["b"]);
    expect(bag.keys()).toEqual(["a", "b"]);
  });
});

describe("OptionBag typed accessors", () => {
  it("reads well-typed values", () => {
    const bag = new OptionBag({
      temperature: 0.5,
      max_tokens: 256,
      top_p: 0.9,
      top_k: 40,
      seed: 7,
      stream: true,
      system_prompt: "Be terse",
    });
    expect(bag.temperature).toBe(0.5);
    expect(bag.maxTokens).toBe(256);
    expect(bag.topP).toBe(0.9);
    expect(bag.topK).toBe(40);
    expect(bag.seed).toBe(7);
    expect(bag.stream).toBe(true);
    expect(bag.systemPrompt).toBe("Be terse");
  });

  it("reads ill-typed values as undefined", () => {
    const bag = new OptionBag({
      temperature: "hot",
      max_tokens: 1.5,
      stream: "yes",
    });
    expect(bag.temperature).toBeUndefined();
    expect(bag.maxTokens).toBeUndefined();
    expect(bag.stream).toBe(false);
  });

  it("throws InvalidRequestError on an ill-typed reserved value", () => {
    expect(() => new OptionBag({ tools: "calculator" }).tools).toThrow(
      InvalidRequestError,
    );
    expect(() => new OptionBag({ tool_choice: "sometimes" }).toolChoice).toThrow(
      InvalidRequestError,
    );
    expect(() => new OptionBag({ system_prompt: 42 }).systemPrompt).toThrow(
      'invalid "system_prompt" option',
    );
    expect(
      () => new OptionBag({ structured_messages: [{ role: "user" }] }).structuredMessages,
    ).toThrow(InvalidRequestError);
  });

  it("reads null or undefined reserved values as absent", () => {
    const bag = new OptionBag({ tools: null, tool_choice: undefined });
    expect(bag.tools).toBeUndefined();
    expect(bag.toolChoice).toBeUndefined();
  });

  it("treats an empty system prompt and empty tool list as absent", () => {
    const bag = new OptionBag({ system_prompt: "", tools: [] });
    expect(bag.systemPrompt).toBeUndefined();
    expect(bag.tools).toBeUndefined();
  });

  it("fills tool defaults", () => {
    const bag = new OptionBag({ tools: [{ name: "lookup" }] });
    expect(bag.tools).toEqual([
      { name: "lookup", description: "", parameters: {} },
    ]);
  });

  it("normalizes a bare tool choice mode", () => {
    expect(new OptionBag({ tool_choice: "required" }).toolChoice).toEqual({
      mode: "required",
    });
    expect(
      new OptionBag({ tool_choice: { mode: "named", tool_name: "lookup" } })
        .toolChoice,
    ).toEqual({ mode: "named", tool_name: "lookup" });
  });

  it("reads the structured response schema and messages", () => {
    const schema = { type: "object" };
    const bag = new OptionBag({
      structured_response_schema: schema,
      structured_messages: [{ role: "user", content: "Hi" }],
    });
    expect(bag.responseSchema).toEqual(schema);
    expect(bag.structuredMessages).toEqual([{ role: "user", content: "Hi" }]);
  });
});

describe("OptionBag.extras", () => {
  it("excludes every reserved key", () => {
    const bag = new OptionBag({
      temperature: 0.1,
      system_prompt: "x",
      tools: [],
      tool_choice: "auto",
      structured_messages: [],
      structured_response_schema: {},
      model: "m",
      messages: [],
      logprobs: true,
    });
    expect(bag.extras()).toEqual({ temperature: 0.1, logprobs: true });
    expect(RESERVED_OPTION_KEYS.size).toBe(7);
  });
});
