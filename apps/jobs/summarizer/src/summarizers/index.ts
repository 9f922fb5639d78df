import OpenAI from "openai";
import type { AppConfig } from "../config";
import { ConfigError } from "../errors";
import type { Summarizer } from "../types";
import { BasicSummarizer } from "./basic";
import { OllamaSummarizer } from "./ollama";
import { OpenAISummarizer } from "./openai";

export { BasicSummarizer } from "./basic";
export { EnhancedSummarizer } from "./enhanced";
export { OllamaSummarizer } from "./ollama";
export { OpenAISummarizer } from "./openai";

/** Resolves the configured mode to its summarizer, once per run. */
export function buildSummarizer(config: AppConfig): Summarizer {
  switch (config.mode) {
    case "basic":
      return new BasicSummarizer(config.basic);
    case "local-model":
      return new OllamaSummarizer(config.ollama);
    case "cloud-model": {
      if (!config.openAi.apiKey) {
        throw new ConfigError("Missing OPENAI_API_KEY (required for cloud-model mode)");
      }
      const client = new OpenAI({
        apiKey: config.openAi.apiKey,
        timeout: config.openAi.timeoutMs,
        maxRetries: config.openAi.maxRetries,
      });
      return new OpenAISummarizer({
        client,
        model: config.openAi.model,
        maxTokens: config.openAi.maxTokens,
        temperature: config.openAi.temperature,
      });
    }
    default:
      throw new ConfigError(`Unsupported summarizer mode: ${String(config.mode)}`);
  }
}
