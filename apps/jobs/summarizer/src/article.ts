import { parse, type HTMLElement } from "node-html-parser";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import type { ArticleContent } from "./types";
import { collapseWhitespace, fetchWithTimeout } from "./utils";

export interface ExtractOptions {
  timeoutMs: number;
  maxContentLength: number;
  selectors: readonly string[];
  userAgent: string;
}

const STRIPPED_ELEMENTS = "script,style,noscript";

/**
 * Fetches a page and returns its main text. Never throws: any failure
 * yields empty text with `extracted: false` and the reason in `error`.
 */
export async function extractContent(
  url: string,
  options: ExtractOptions
): Promise<ArticleContent> {
  if (!url) {
    return { url: "", text: "", extracted: false, error: "No URL available" };
  }

  try {
    const response = await fetchWithTimeout(
      url,
      {
        redirect: "follow",
        headers: {
          "User-Agent": options.userAgent,
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        },
      },
      options.timeoutMs
    );
    if (!response.ok) {
      return failed(url, `HTTP ${response.status}`);
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (contentType && !/html|xml|text\/plain/i.test(contentType)) {
      return failed(url, `Unsupported content type: ${contentType}`);
    }

    const html = await response.text();
    const text = extractMainText(html, options.selectors).slice(
      0,
      options.maxContentLength
    );
    return { url, text, extracted: true };
  } catch (error) {
    return failed(url, errorMessage(error));
  }
}

export function extractMainText(html: string, selectors: readonly string[]): string {
  const root = parse(html);
  root.querySelectorAll(STRIPPED_ELEMENTS).forEach((node: HTMLElement) => node.remove());

  for (const selector of selectors) {
    const match = root.querySelector(selector);
    const text = match ? collapseWhitespace(match.text) : "";
    if (text) return text;
  }

  const body = root.querySelector("body");
  return collapseWhitespace((body ?? root).text);
}

function failed(url: string, reason: string): ArticleContent {
  logger.warn("article.extract.failed", { url, reason });
  return { url, text: "", extracted: false, error: reason };
}
