import { WebUIClient } from "../../llm/index.js";
import type { HttpTransport, ModelInfo, ModelListResult } from "../../llm/index.js";
import { DEFAULT_SYSTEM_PROMPT } from "../../prompt.js";
import { DEFAULT_MODEL, DEFAULT_SYSTEM_PROMPT_FILE, normalizeBaseUrl } from "../config.js";
import type { Logger } from "../logger.js";

export type ModelFetcher = (baseUrl: string, apiKey?: string) => Promise<ModelListResult>;

// The wizard lists models before any configuration exists, so it builds a throwaway client.
export function endpointModelFetcher(logger: Logger, transport?: HttpTransport): ModelFetcher {
  return (baseUrl, apiKey) => {
    const client = new WebUIClient(
      {
        baseUrl: normalizeBaseUrl(baseUrl),
        apiKey,
        defaultModel: DEFAULT_MODEL,
        systemPrompt: DEFAULT_SYSTEM_PROMPT,
        systemPromptFile: DEFAULT_SYSTEM_PROMPT_FILE,
      },
      logger,
      transport,
    );
    return client.listModels();
  };
}

export function modelIds(models: readonly ModelInfo[]): string[] {
  return models.map((m) => m.id);
}

export function modelLabel(model: ModelInfo): string {
  return model.displayName !== model.id ? `${model.id} (${model.displayName})` : model.id;
}

// Picker rows show the display name next to the id when they differ.
export function modelDescriber(models: readonly ModelInfo[]): (id: string) => string {
  const byId = new Map(models.map((m) => [m.id, m]));
  return (id) => {
    const model = byId.get(id);
    return model ? modelLabel(model) : id;
  };
}
