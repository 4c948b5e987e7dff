import { describe, expect, it } from "vitest";
import { classifyCompletion, classifyModels, toModelInfo } from "../../llm/classify.js";
import { captureLogger } from "../helpers.js";

describe("classifyCompletion", () => {
  it("maps a non-200 status to a provider error with the raw body", () => {
    expect(classifyCompletion(404, "Not found", "m")).toEqual({
      kind: "provider_error",
      statusCode: 404,
      body: "Not found",
    });
  });

  it("extracts content, model and token count from a 200 response", () => {
    const body = JSON.stringify({
      model: "llama3",
      choices: [{ message: { role: "assistant", content: "Hello there" } }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });

    expect(classifyCompletion(200, body, "requested")).toEqual({
      kind: "success",
      content: "Hello there",
      model: "llama3",
      tokenCount: 15,
    });
  });

  it("falls back to the requested model and leaves the token count undefined", () => {
    const body = JSON.stringify({ choices: [{ message: { content: "Hi" } }] });

    expect(classifyCompletion(200, body, "requested")).toEqual({
      kind: "success",
      content: "Hi",
      model: "requested",
      tokenCount: undefined,
    });
  });

  it("falls back to the requested model when the response names none", () => {
    const body = JSON.stringify({ model: null, choices: [{ message: { content: "Hi" } }], usage: { total_tokens: 3 } });

    expect(classifyCompletion(200, body, "requested")).toEqual({
      kind: "success",
      content: "Hi",
      model: "requested",
      tokenCount: 3,
    });
  });

  it("treats null content as an empty answer", () => {
    const body = JSON.stringify({ choices: [{ message: { content: null } }] });

    const result = classifyCompletion(200, body, "m");
    expect(result.kind === "success" && result.content).toBe("");
  });

  it("accepts empty choices as an empty answer and warns", () => {
    const { logger, messages } = captureLogger();

    const result = classifyCompletion(200, JSON.stringify({ choices: [] }), "m", logger);

    expect(result).toEqual({ kind: "success", content: "", model: "m", tokenCount: undefined });
    expect(messages("warn")).toEqual(["Response contained no choices, treating it as an empty answer"]);
  });

  it("classifies an unreadable 200 body as a transport error", () => {
    const result = classifyCompletion(200, "<html>gateway</html>", "m");

    expect(result.kind).toBe("transport_error");
    expect(result.kind === "transport_error" && result.cause.startsWith("Failed to decode JSON response:")).toBe(true);
  });

  it("classifies a 200 body with the wrong shape as a transport error", () => {
    const result = classifyCompletion(200, JSON.stringify({ choices: "nope" }), "m");

    expect(result.kind === "transport_error" && result.cause.startsWith("Unexpected response shape at choices:")).toBe(
      true,
    );
  });
});

describe("classifyModels", () => {
  it("lists models in order, skipping entries without an id", () => {
    const body = JSON.stringify({
      data: [{ id: "a", name: "Model A", owned_by: "ollama" }, { name: "no id" }, { id: "b" }, { id: "" }],
    });

    expect(classifyModels(200, body)).toEqual({
      ok: true,
      value: [
        { id: "a", displayName: "Model A", ownedBy: "ollama" },
        { id: "b", displayName: "b" },
      ],
    });
  });

  it("returns an empty list when data is missing", () => {
    expect(classifyModels(200, "{}")).toEqual({ ok: true, value: [] });
  });

  it("reports provider errors", () => {
    expect(classifyModels(401, "Unauthorized")).toEqual({
      ok: false,
      error: { kind: "provider_error", statusCode: 401, body: "Unauthorized" },
    });
  });
});

describe("toModelInfo", () => {
  it("uses the id when the name is blank", () => {
    expect(toModelInfo({ id: "x", name: "  " })).toEqual({ id: "x", displayName: "x" });
  });
});
