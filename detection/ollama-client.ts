/**
 * Ollama client through its OpenAI-compatible endpoint
 */

import OpenAI from "openai";
import type { OllamaConfig } from "../config.js";
import type { DetectorClient } from "./types.js";

// Ollama ignores the key, the SDK requires one
const OLLAMA_API_KEY = "ollama";

export function ollamaBaseUrl(host: string): string {
  return `${host.replace(/\/+$/, "")}/v1`;
}

export function createOllamaClient(config: Pick<OllamaConfig, "host">): DetectorClient {
  const client = new OpenAI({
    baseURL: ollamaBaseUrl(config.host),
    apiKey: OLLAMA_API_KEY,
  });

  return {
    async complete(prompt, { model, signal }) {
      const response = await client.chat.completions.create(
        {
          model,
          messages: [{ role: "user", content: prompt }],
          temperature: 0.1,
        },
        { signal },
      );
      return response.choices[0]?.message?.content ?? null;
    },
  };
}
