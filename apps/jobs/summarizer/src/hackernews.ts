import { parse } from "node-html-parser";
import { z } from "zod";
import { extractContent, type ExtractOptions } from "./article";
import type { AppConfig } from "./config";
import { CommentFetchFailedError, ProviderUnavailableError, errorMessage } from "./errors";
import { logger } from "./logger";
import type { ArticleContent, CommentSet, ContentProvider, Story } from "./types";
import { collapseWhitespace, fetchWithTimeout } from "./utils";

const TopStoriesSchema = z.array(z.number().int());

export const HackerNewsItemSchema = z.object({
  id: z.number().int(),
  type: z.string().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  score: z.number().optional(),
  by: z.string().optional(),
  time: z.number().optional(),
  descendants: z.number().optional(),
  kids: z.array(z.number().int()).optional(),
  text: z.string().optional(),
  deleted: z.boolean().optional(),
  dead: z.boolean().optional(),
});

export type HackerNewsItem = z.infer<typeof HackerNewsItemSchema>;

export class HackerNewsProvider implements ContentProvider {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly commentFetchLimit: number;
  private readonly extractOptions: ExtractOptions;

  constructor(config: AppConfig) {
    this.baseUrl = config.hackerNews.baseUrl;
    this.userAgent = config.hackerNews.userAgent;
    this.timeoutMs = config.fetchTimeoutMs;
    this.commentFetchLimit = config.commentFetchLimit;
    this.extractOptions = {
      timeoutMs: config.fetchTimeoutMs,
      maxContentLength: config.maxContentLength,
      selectors: config.contentSelectors,
      userAgent: config.hackerNews.userAgent,
    };
  }

  async listTopStoryIds(limit: number): Promise<number[]> {
    try {
      const body = await this.getJson(`${this.baseUrl}/topstories.json`);
      return TopStoriesSchema.parse(body).slice(0, limit);
    } catch (error) {
      throw new ProviderUnavailableError(
        `Failed to fetch top stories: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async getStory(id: number): Promise<Story | null> {
    const item = await this.getItem(id);
    if (!item || item.deleted || item.dead) return null;
    return toStory(item);
  }

  /**
   * Fetches up to `commentFetchLimit` comment ids in order and keeps the
   * first `maxCount` live ones. Individual failures are skipped; only a
   * run where every fetch failed raises.
   */
  async getComments(ids: number[], maxCount: number): Promise<CommentSet> {
    const comments: CommentSet = [];
    const candidates = ids.slice(0, this.commentFetchLimit);
    let failures = 0;
    let lastError: unknown = null;

    for (const id of candidates) {
      if (comments.length >= maxCount) break;
      try {
        const item = await this.getItem(id);
        if (!item || item.deleted || item.dead || !item.text) continue;
        const text = commentHtmlToText(item.text);
        if (text) comments.push(text);
      } catch (error) {
        failures += 1;
        lastError = error;
        logger.debug("hn.comment.failed", { id, error: errorMessage(error) });
      }
    }

    if (candidates.length > 0 && failures === candidates.length) {
      throw new CommentFetchFailedError(
        `Failed to fetch comments: ${errorMessage(lastError)}`,
        { cause: lastError }
      );
    }
    return comments;
  }

  extractContent(url: string): Promise<ArticleContent> {
    return extractContent(url, this.extractOptions);
  }

  private async getItem(id: number): Promise<HackerNewsItem | null> {
    const body = await this.getJson(`${this.baseUrl}/item/${id}.json`);
    if (body === null) return null;
    return HackerNewsItemSchema.parse(body);
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await fetchWithTimeout(
      url,
      { headers: { "User-Agent": this.userAgent, Accept: "application/json" } },
      this.timeoutMs
    );
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} for ${url}`);
    }
    return response.json();
  }
}

export function toStory(item: HackerNewsItem): Story {
  return {
    id: item.id,
    title: item.title || "No title",
    url: item.url || undefined,
    score: item.score ?? 0,
    by: item.by,
    time: item.time,
    descendants: item.descendants,
    commentIds: item.kids ?? [],
  };
}

/** HN comment bodies are HTML with bare `<p>` paragraph separators. */
export function commentHtmlToText(html: string): string {
  const spaced = html.replace(/<p>/gi, " ");
  return collapseWhitespace(parse(spaced).text);
}
