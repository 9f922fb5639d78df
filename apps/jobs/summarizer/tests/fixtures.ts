import { vi } from "vitest";
import type { ContentProvider, Story } from "../src/types";

export const ARTICLE_TEXT =
  "The first sentence is long enough to keep. " +
  "The second sentence also passes the length filter. " +
  "The third sentence closes the summary. " +
  "A fourth sentence is never shown.";

export const ARTICLE_LINES = [
  "The first sentence is long enough to keep.",
  "The second sentence also passes the length filter.",
  "The third sentence closes the summary.",
];

export const BASIC_OPTIONS = { summaryLines: 3, minSentenceLength: 20, maxLineLength: 120 };

export function makeStory(id: number, extra: Partial<Story> = {}): Story {
  return {
    id,
    title: `Story ${id}`,
    url: `https://example.com/${id}`,
    score: id * 10,
    commentIds: [],
    ...extra,
  };
}

export function fakeProvider(
  stories: Story[],
  overrides: Partial<ContentProvider> = {}
): ContentProvider {
  const byId = new Map(stories.map((story) => [story.id, story]));
  return {
    listTopStoryIds: vi.fn(async (limit: number) => stories.map((s) => s.id).slice(0, limit)),
    getStory: vi.fn(async (id: number) => byId.get(id) ?? null),
    getComments: vi.fn(async (_ids: number[], maxCount: number) =>
      ["First comment", "Second comment", "Third comment"].slice(0, maxCount)
    ),
    extractContent: vi.fn(async (url: string) => ({ url, text: ARTICLE_TEXT, extracted: true })),
    ...overrides,
  };
}

/**
 * A fetch stand-in that sends headers and a first chunk, then never finishes
 * the body. The stream errors once the request's signal aborts, as undici does.
 */
export function stalledFetch(contentType: string, firstChunk: string) {
  return vi.fn(async (_url: unknown, init?: RequestInit) => {
    const signal = init?.signal;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode(firstChunk));
        signal?.addEventListener("abort", () => controller.error(signal.reason));
      },
    });
    return new Response(body, { status: 200, headers: { "content-type": contentType } });
  });
}
