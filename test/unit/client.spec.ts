import { describe, expect, it, vi } from "vitest";
import { WebUIClient } from "../../llm/client.js";
import { HttpTransport, type FetchLike } from "../../llm/transport.js";
import type { WebUIConfig } from "../../src/config.js";
import { captureLogger, jsonResponse } from "../helpers.js";

const config: WebUIConfig = {
  baseUrl: "http://webui.test",
  apiKey: "test-secret",
  defaultModel: "test-default",
  systemPrompt: "You are a test assistant.",
  systemPromptFile: "config/system_prompt.txt",
};

function clientWith(fetchImpl: FetchLike) {
  const captured = captureLogger();
  const client = new WebUIClient(config, captured.logger, new HttpTransport(captured.logger, fetchImpl));
  return { client, ...captured };
}

const completion = {
  model: "llama3",
  choices: [{ message: { content: "pong" } }],
  usage: { total_tokens: 1234 },
};

describe("WebUIClient.generate", () => {
  it("posts the built payload and classifies the answer", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, completion));
    const { client } = clientWith(fetchImpl);

    const outcome = await client.generate("ping", { params: { temperature: 0.2, timeout: 5 } });

    expect(outcome).toEqual({
      ok: true,
      value: { kind: "success", content: "pong", model: "llama3", tokenCount: 1234 },
    });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://webui.test/api/chat/completions");
    expect(init.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init.body))).toEqual({
      model: "test-default",
      messages: [
        { role: "system", content: "You are a test assistant." },
        { role: "user", content: "ping" },
      ],
      temperature: 0.2,
    });
  });

  it("never sends an invalid request", async () => {
    const fetchImpl = vi.fn<FetchLike>();
    const { client, messages } = clientWith(fetchImpl);

    await expect(client.generate("   ")).resolves.toEqual({ ok: false, error: { kind: "EmptyPrompt" } });
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(messages("error")).toEqual(["Prompt cannot be empty or whitespace only"]);
  });

  it("logs parameter warnings", async () => {
    const { client, messages } = clientWith(vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, completion)));

    await client.generate("ping", { params: { temperature: 5, max_tokens: 100 } });

    expect(messages("warn")).toEqual(["Parameter temperature=5 must be a number in [0, 2], ignoring"]);
  });

  it("returns provider errors as values", async () => {
    const { client } = clientWith(vi.fn<FetchLike>().mockResolvedValue(jsonResponse(404, "Not found")));

    await expect(client.generate("ping")).resolves.toEqual({
      ok: true,
      value: { kind: "provider_error", statusCode: 404, body: "Not found" },
    });
  });

  it("returns transport failures as values", async () => {
    const refused = new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED") });
    const { client } = clientWith(vi.fn<FetchLike>().mockRejectedValue(refused));

    await expect(client.generate("ping")).resolves.toEqual({
      ok: true,
      value: { kind: "transport_error", cause: "fetch failed: connect ECONNREFUSED" },
    });
  });

  it("sends a structured conversation as a transcript", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, completion));
    const { client } = clientWith(fetchImpl);

    await client.generateChat([
      { role: "system", content: "Be terse" },
      { role: "user", content: "Hi" },
    ]);

    const payload = JSON.parse(String(fetchImpl.mock.calls[0][1].body));
    expect(payload.messages[1]).toEqual({ role: "user", content: "System: Be terse\nUser: Hi\nAssistant:" });
  });
});

describe("WebUIClient models", () => {
  const models = { data: [{ id: "llama3", name: "Llama 3" }, { id: "mistral" }] };

  it("lists models from the models endpoint", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, models));
    const { client } = clientWith(fetchImpl);

    await expect(client.listModels()).resolves.toEqual({
      ok: true,
      value: [
        { id: "llama3", displayName: "Llama 3" },
        { id: "mistral", displayName: "mistral" },
      ],
    });
    expect(fetchImpl.mock.calls[0][0]).toBe("http://webui.test/api/v1/models");
    expect(fetchImpl.mock.calls[0][1].method).toBe("GET");
  });

  it("checks whether a model is offered", async () => {
    const { client } = clientWith(vi.fn<FetchLike>().mockImplementation(async () => jsonResponse(200, models)));

    await expect(client.checkModel("mistral")).resolves.toMatchObject({ check: "found" });
    await expect(client.checkModel("gpt-x")).resolves.toMatchObject({ check: "missing" });
  });

  it("cannot tell when the listing fails", async () => {
    const { client } = clientWith(vi.fn<FetchLike>().mockResolvedValue(jsonResponse(500, "boom")));

    await expect(client.checkModel("mistral")).resolves.toMatchObject({ check: "unknown" });
  });
});
