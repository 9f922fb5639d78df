import type OpenAI from "openai";
import { performance } from "node:perf_hooks";
import { logger } from "../logger";
import type { SummarizerMode } from "../types";
import { EnhancedSummarizer } from "./enhanced";

export interface OpenAISummarizerDeps {
  client: OpenAI;
  model: string;
  maxTokens: number;
  temperature: number;
}

const SYSTEM_PROMPT = [
  "You are a concise technology news summarizer.",
  "Preserve factual accuracy; avoid speculation.",
  "Follow the requested section layout exactly.",
].join(" ");

export class OpenAISummarizer extends EnhancedSummarizer {
  readonly mode: SummarizerMode = "cloud-model";
  protected readonly backend = "openai";

  constructor(private readonly deps: OpenAISummarizerDeps) {
    super();
  }

  protected async complete(prompt: string): Promise<string> {
    const start = performance.now();

    const completion = await this.deps.client.chat.completions.create({
      model: this.deps.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      temperature: this.deps.temperature,
      max_tokens: this.deps.maxTokens,
    });

    logger.debug("summarizer.openai.completed", {
      model: this.deps.model,
      tokensUsed: completion.usage?.total_tokens,
      durationMs: Math.round(performance.now() - start),
    });

    return completion.choices[0]?.message?.content?.trim() ?? "";
  }
}
