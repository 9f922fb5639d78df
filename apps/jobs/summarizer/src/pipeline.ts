import { performance } from "node:perf_hooks";
import { BackendUnavailableError, errorMessage } from "./errors";
import { logger } from "./logger";
import type {
  ArticleContent,
  CommentSet,
  ContentProvider,
  ErrorDescriptor,
  PipelineOutcome,
  PipelineReport,
  RunCounts,
  SkippedOutcome,
  Story,
  StoryState,
  SummarizedOutcome,
  Summarizer,
  SummaryResult,
} from "./types";
import { sleep as defaultSleep } from "./utils";

export interface PipelineOptions {
  storyCount: number;
  fallbackEnabled: boolean;
  maxComments: number;
  delayMs: number;
}

export interface PipelineDeps {
  provider: ContentProvider;
  summarizer: Summarizer;
  /** Used when the main summarizer's backend is unavailable and fallback is on. */
  fallback: Summarizer;
  options: PipelineOptions;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sequential per-story state machine:
 * pending → metadataFetched → contentExtracted → [errorFallback] → summarized → reported.
 *
 * Only a failed story listing, or an unavailable backend with fallback
 * disabled, aborts the run. Everything else is recorded on the outcome.
 */
export class SummaryPipeline {
  private readonly provider: ContentProvider;
  private readonly summarizer: Summarizer;
  private readonly fallback: Summarizer;
  private readonly options: PipelineOptions;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: PipelineDeps) {
    this.provider = deps.provider;
    this.summarizer = deps.summarizer;
    this.fallback = deps.fallback;
    this.options = deps.options;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(): Promise<PipelineReport> {
    const ids = await this.provider.listTopStoryIds(this.options.storyCount);
    logger.info("pipeline.listed", { requested: this.options.storyCount, received: ids.length });

    const outcomes: PipelineOutcome[] = [];
    for (const [index, id] of ids.entries()) {
      if (index > 0 && this.options.delayMs > 0) {
        await this.sleep(this.options.delayMs);
      }
      logger.info("pipeline.story.start", { rank: index + 1, total: ids.length, id });
      const outcome = await this.processStory(id, index + 1);
      outcomes.push(Object.freeze(outcome));
    }

    const counts = countOutcomes(outcomes);
    logger.info("pipeline.done", { ...counts });
    return { outcomes, counts };
  }

  private async processStory(id: number, rank: number): Promise<PipelineOutcome> {
    const started = performance.now();
    const states: StoryState[] = ["pending"];
    const elapsed = () => Math.round(performance.now() - started);
    const enter = (state: StoryState) => {
      states.push(state);
      logger.debug("pipeline.story.state", { id, state });
    };

    let story: Story | null;
    try {
      story = await this.provider.getStory(id);
    } catch (error) {
      return skipped(id, rank, states, elapsed(), {
        kind: "MetadataFetchFailed",
        message: errorMessage(error),
      });
    }
    if (!story) {
      return skipped(id, rank, states, elapsed(), {
        kind: "StoryNotFound",
        message: `Story ${id} not found`,
      });
    }
    enter("metadataFetched");

    const degradations: ErrorDescriptor[] = [];
    const article = await this.loadArticle(story, degradations);
    const comments = await this.loadComments(story, degradations);
    enter("contentExtracted");

    let summary: SummaryResult;
    let summarizerUsed = this.summarizer;
    try {
      summary = await this.summarizer.summarize(article, comments);
    } catch (error) {
      if (!(error instanceof BackendUnavailableError) || !this.options.fallbackEnabled) {
        throw error;
      }
      enter("errorFallback");
      logger.warn("pipeline.story.fallback", {
        id,
        mode: this.summarizer.mode,
        fallbackMode: this.fallback.mode,
        error: error.message,
      });
      degradations.push({ kind: "BackendUnavailable", message: error.message });
      summarizerUsed = this.fallback;
      summary = await this.fallback.summarize(article, comments);
    }
    enter("summarized");
    enter("reported");

    const outcome: SummarizedOutcome = {
      status: "summarized",
      rank,
      story,
      summary,
      requestedMode: this.summarizer.mode,
      modeUsed: summarizerUsed.mode,
      fallbackUsed: summarizerUsed !== this.summarizer,
      contentExtracted: article.extracted,
      commentCount: comments?.length ?? 0,
      degradations,
      states,
      durationMs: elapsed(),
    };
    return outcome;
  }

  private async loadArticle(story: Story, degradations: ErrorDescriptor[]): Promise<ArticleContent> {
    if (!story.url) {
      return { url: "", text: "", extracted: false, error: "No URL available" };
    }

    let article: ArticleContent;
    try {
      article = await this.provider.extractContent(story.url);
    } catch (error) {
      article = { url: story.url, text: "", extracted: false, error: errorMessage(error) };
    }

    if (!article.extracted) {
      const message = article.error ?? "Extraction failed";
      logger.warn("pipeline.story.extract_failed", { id: story.id, url: story.url, error: message });
      degradations.push({ kind: "ContentExtractionFailed", message });
      // Whatever text came back is discarded; summarizers handle empty input.
      return { ...article, text: "" };
    }
    return article;
  }

  private async loadComments(
    story: Story,
    degradations: ErrorDescriptor[]
  ): Promise<CommentSet | undefined> {
    if (!this.summarizer.needsComments) return undefined;
    if (story.commentIds.length === 0) return [];

    try {
      const comments = await this.provider.getComments(story.commentIds, this.options.maxComments);
      return comments.slice(0, this.options.maxComments);
    } catch (error) {
      const message = errorMessage(error);
      logger.warn("pipeline.story.comments_failed", { id: story.id, error: message });
      degradations.push({ kind: "CommentFetchFailed", message });
      return [];
    }
  }
}

function skipped(
  storyId: number,
  rank: number,
  states: StoryState[],
  durationMs: number,
  error: ErrorDescriptor
): SkippedOutcome {
  logger.warn("pipeline.story.skipped", { id: storyId, kind: error.kind, error: error.message });
  return { status: "skipped", rank, storyId, error, states, durationMs };
}

export function countOutcomes(outcomes: PipelineOutcome[]): RunCounts {
  let summarized = 0;
  let skippedCount = 0;
  let fallbacks = 0;
  for (const outcome of outcomes) {
    if (outcome.status === "skipped") {
      skippedCount += 1;
      continue;
    }
    summarized += 1;
    if (outcome.fallbackUsed) fallbacks += 1;
  }
  return { listed: outcomes.length, summarized, skipped: skippedCount, fallbacks };
}
