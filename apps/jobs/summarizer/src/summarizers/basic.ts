import type { ArticleContent, PlainSummary, Summarizer, SummarizerMode } from "../types";
import { collapseWhitespace, fitToLength, truncate } from "../utils";

export const PLACEHOLDER_LINE = "No further content available";
export const CONTENT_UNAVAILABLE_LINE = "Content not available for summarization.";

export interface BasicSummarizerOptions {
  summaryLines: number;
  minSentenceLength: number;
  maxLineLength: number;
}

/** Extractive summary: the first few sentence-like units of the article. */
export class BasicSummarizer implements Summarizer {
  readonly mode: SummarizerMode = "basic";
  readonly needsComments = false;

  constructor(private readonly options: BasicSummarizerOptions) {}

  async summarize(article: ArticleContent): Promise<PlainSummary> {
    return { kind: "plain", lines: basicSummaryLines(article.text, this.options) };
  }
}

export function basicSummaryLines(text: string, options: BasicSummarizerOptions): string[] {
  const cleaned = collapseWhitespace(text);
  if (!cleaned) {
    return fitToLength([CONTENT_UNAVAILABLE_LINE], options.summaryLines, () => PLACEHOLDER_LINE);
  }

  const lines = splitSentences(cleaned, options.minSentenceLength)
    .slice(0, options.summaryLines)
    .map((sentence) => truncate(sentence, options.maxLineLength));
  return fitToLength(lines, options.summaryLines, () => PLACEHOLDER_LINE);
}

export function splitSentences(text: string, minLength: number): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length >= minLength);
}
