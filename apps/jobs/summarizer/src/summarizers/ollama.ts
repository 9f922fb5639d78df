import { z } from "zod";
import { BackendUnavailableError, errorMessage } from "../errors";
import { logger } from "../logger";
import type { SummarizerMode } from "../types";
import { fetchWithTimeout } from "../utils";
import { EnhancedSummarizer } from "./enhanced";

export interface OllamaSummarizerConfig {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

const GenerateResponseSchema = z.object({
  response: z.string().optional(),
});

/** Local model served by Ollama's non-streaming `/api/generate`. */
export class OllamaSummarizer extends EnhancedSummarizer {
  readonly mode: SummarizerMode = "local-model";
  protected readonly backend = "ollama";

  constructor(private readonly config: OllamaSummarizerConfig) {
    super();
  }

  protected async complete(prompt: string): Promise<string> {
    let response: Response;
    let raw: string;
    try {
      response = await fetchWithTimeout(
        `${this.config.baseUrl}/api/generate`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            model: this.config.model,
            prompt,
            stream: false,
            options: { temperature: 0.7, num_predict: 800 },
          }),
        },
        this.config.timeoutMs
      );
      raw = await response.text();
    } catch (error) {
      throw new BackendUnavailableError(
        this.backend,
        `Ollama request failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new BackendUnavailableError(
        this.backend,
        `Ollama API error: ${response.status} ${response.statusText}`
      );
    }

    const parsed = GenerateResponseSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      logger.warn("summarizer.ollama.unexpected_body", { model: this.config.model });
      return "";
    }
    return parsed.data.response?.trim() ?? "";
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
