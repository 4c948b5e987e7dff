import { describe, expect, it } from "vitest";
import { ALLOWED_PARAMS, filterParams } from "../../llm/params.js";

describe("filterParams", () => {
  it("keeps allow-listed parameters with valid values", () => {
    const result = filterParams({ temperature: 0.7, max_tokens: 256, stream: false, stop: ["\n\n"], seed: 42 });

    expect(result.params).toEqual({ temperature: 0.7, max_tokens: 256, stream: false, stop: ["\n\n"], seed: 42 });
    expect(result.warnings).toEqual([]);
    expect(result.timeout).toBeUndefined();
  });

  it("drops out-of-range values with a warning", () => {
    const result = filterParams({ temperature: 5 });

    expect(result.params).toEqual({});
    expect(result.warnings).toEqual(["Parameter temperature=5 must be a number in [0, 2], ignoring"]);
  });

  it("drops values of the wrong type", () => {
    const result = filterParams({ max_tokens: "100", top_k: 0 });

    expect(result.params).toEqual({});
    expect(result.warnings).toEqual([
      'Parameter max_tokens="100" must be a number in [1, 32768], ignoring',
      "Parameter top_k=0 must be a number in [1, 100], ignoring",
    ]);
  });

  it("accepts the range boundaries", () => {
    const result = filterParams({ frequency_penalty: -2, presence_penalty: 2, top_p: 0, max_tokens: 32768 });

    expect(result.params).toEqual({ frequency_penalty: -2, presence_penalty: 2, top_p: 0, max_tokens: 32768 });
  });

  it("keeps fractional values inside a numeric range", () => {
    const result = filterParams({ max_tokens: 100.5, top_k: 2.5 });

    expect(result.params).toEqual({ max_tokens: 100.5, top_k: 2.5 });
    expect(result.warnings).toEqual([]);
  });

  it("drops a seed that does not fit a safe integer", () => {
    const result = filterParams({ seed: JSON.parse("12345678901234567890") });

    expect(result.params).toEqual({});
    expect(result.warnings).toEqual(["Parameter seed=12345678901234567000 must be a safe integer, ignoring"]);
  });

  it("ignores unknown parameters", () => {
    const result = filterParams({ logit_bias: {}, temperature: 1 });

    expect(result.params).toEqual({ temperature: 1 });
    expect(result.warnings).toEqual(["Ignoring unsupported parameter: logit_bias"]);
  });

  it("splits off the timeout and never forwards it", () => {
    const result = filterParams({ timeout: 5, top_p: 0.9 });

    expect(result.timeout).toBe(5);
    expect(result.params).toEqual({ top_p: 0.9 });
  });

  it("rejects a non-positive timeout", () => {
    const result = filterParams({ timeout: 0 });

    expect(result.timeout).toBeUndefined();
    expect(result.warnings).toEqual(["Parameter timeout=0 must be a positive number of seconds, using the default"]);
  });

  it("skips undefined values silently", () => {
    expect(filterParams({ temperature: undefined })).toEqual({ params: {}, timeout: undefined, warnings: [] });
  });

  it("covers every allow-listed name", () => {
    expect(Object.keys(ALLOWED_PARAMS).sort()).toEqual([
      "frequency_penalty",
      "max_tokens",
      "presence_penalty",
      "seed",
      "stop",
      "stream",
      "temperature",
      "top_k",
      "top_p",
    ]);
  });
});
