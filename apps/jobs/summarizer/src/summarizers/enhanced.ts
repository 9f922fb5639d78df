import { BackendUnavailableError, errorMessage } from "../errors";
import { logger } from "../logger";
import type {
  ArticleContent,
  CommentSet,
  EnhancedSummary,
  Summarizer,
  SummarizerMode,
  SummaryField,
} from "../types";
import { collapseWhitespace, fitToLength, truncate } from "../utils";

export const SECTION_NAMES = ["articleSummary", "commentSummary", "keyPoints", "relatedLinks"] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export type Compliance = "empty" | "unstructured" | "partial" | "full";

export interface EnhancedDiagnostics {
  responseChars: number;
  compliance: Compliance;
  sectionsFound: SectionName[];
  defaultedFields: SectionName[];
  paddedKeyPoints: number;
  discardedLinks: number;
}

export const ARTICLE_SUMMARY_LINES = 3;
export const COMMENT_SUMMARY_LINES = 3;
export const KEY_POINTS_COUNT = 3;
export const RELATED_LINKS_COUNT = 3;

const PROMPT_CONTENT_CHARS = 3000;
const PROMPT_COMMENT_CHARS = 400;
const PROMPT_DIGEST_CHARS = 3000;

export const ARTICLE_SUMMARY_DEFAULTS = [
  "Summary not available from the model.",
  "Additional details are available in the full article.",
  "See the source for more information.",
];
export const COMMENT_SUMMARY_DEFAULT = "No discussion summary was provided.";
export const KEY_POINT_DEFAULTS = [
  "No key points were identified.",
  "See the full article for details.",
  "Refer to the discussion for additional context.",
];

// Checked in order; "comment summary" must win over the bare "summary" label.
const SECTION_LABELS: Array<[SectionName, RegExp]> = [
  ["commentSummary", /^(?:comments?|discussion|community|thread)(?:\s+(?:summary|highlights))?$/],
  ["articleSummary", /^(?:article(?:\s+summary)?|summary|tl;?dr)$/],
  ["keyPoints", /^(?:key\s+(?:points|takeaways|insights)|takeaways|highlights)$/],
  ["relatedLinks", /^(?:related\s+(?:links|resources|urls|reading)|links|references|resources)$/],
];

const BULLET = /^(?:[-*•+]|\d{1,2}[.)]|\(\d{1,2}\))\s+/;

export interface ParsedSections {
  sections: Partial<Record<SectionName, string[]>>;
  preamble: string[];
}

/** Splits a free-form model response into labelled sections. Never throws. */
export function parseSections(raw: string): ParsedSections {
  const sections: Partial<Record<SectionName, string[]>> = {};
  const preamble: string[] = [];
  let current: SectionName | null = null;

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("```")) continue;

    const unbulleted = trimmed.replace(BULLET, "").trim();
    const header = matchHeader(unbulleted);
    // A bulleted line is a header only when it carries no item text
    // ("1. **Key Points:**") or is decorated as one ("- **Summary:** ...").
    const bulleted = unbulleted !== trimmed;
    if (header && (!bulleted || !header.rest || /^(?:#|\*\*|__)/.test(unbulleted))) {
      current = header.section;
      const bucket = sections[current] ?? [];
      sections[current] = bucket;
      if (header.rest) bucket.push(header.rest);
      continue;
    }

    const content = unbulleted.replace(/\*\*|__/g, "").trim();
    if (!content) continue;
    if (current) {
      sections[current]?.push(content);
    } else {
      preamble.push(content);
    }
  }

  return { sections, preamble };
}

function matchHeader(line: string): { section: SectionName; rest: string } | null {
  const stripped = line
    .replace(/^#{1,6}\s*/, "")
    .replace(/\*\*|__/g, "")
    .trim();
  const colon = stripped.indexOf(":");
  const label = (colon >= 0 ? stripped.slice(0, colon) : stripped)
    .replace(/\(.*?\)/g, "")
    .trim()
    .toLowerCase();
  const rest = colon >= 0 ? stripped.slice(colon + 1).trim() : "";

  for (const [section, pattern] of SECTION_LABELS) {
    if (pattern.test(label)) return { section, rest };
  }
  return null;
}

/**
 * Pulls http(s) URLs out of link lines. Accepts bare URLs and markdown
 * `[text](url)`; anything else is dropped.
 */
export function extractLinks(lines: string[]): { links: string[]; discarded: number } {
  const links: string[] = [];
  let discarded = 0;

  for (const line of lines) {
    const markdown = line.match(/\[[^\]]*\]\((\S+)\)/);
    const bare = line.match(/https?:\/\/\S+/i);
    const url = validUrl(trimUrl(markdown?.[1] ?? bare?.[0] ?? ""));
    if (!url) {
      discarded += 1;
      continue;
    }
    if (!links.includes(url)) links.push(url);
  }

  return { links, discarded };
}

/** Drops trailing punctuation; a closing paren stays when it balances one in the URL. */
function trimUrl(candidate: string): string {
  let url = candidate;
  for (;;) {
    if (/[.,;:!?\]>"']$/.test(url)) {
      url = url.slice(0, -1);
    } else if (url.endsWith(")") && countOf(url, "(") < countOf(url, ")")) {
      url = url.slice(0, -1);
    } else {
      return url;
    }
  }
}

function countOf(text: string, char: string): number {
  return text.split(char).length - 1;
}

function validUrl(candidate: string): string | null {
  if (!candidate) return null;
  try {
    const parsed = new URL(candidate);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;
    if (!parsed.hostname.includes(".")) return null;
    return parsed.toString();
  } catch {
    return null;
  }
}

/**
 * Turns a raw model response into a fully populated EnhancedSummary.
 * Each field is validated on its own; anything missing is replaced by
 * generic text and flagged with `usedDefault`.
 */
export function parseEnhancedResponse(
  raw: string,
  options: { commentsSupplied: boolean }
): { summary: EnhancedSummary; diagnostics: EnhancedDiagnostics } {
  const { sections, preamble } = parseSections(raw);
  const sectionsFound = SECTION_NAMES.filter((name) => (sections[name] ?? []).length > 0);

  const parsedArticle = sections.articleSummary?.length ? sections.articleSummary : preamble;
  const articleSummary: SummaryField<string[]> =
    parsedArticle.length > 0
      ? {
          value: fitToLength(parsedArticle, ARTICLE_SUMMARY_LINES, (i) => articleDefault(i)),
          usedDefault: false,
        }
      : {
          value: fitToLength([], ARTICLE_SUMMARY_LINES, (i) => articleDefault(i)),
          usedDefault: true,
        };

  const parsedComments = sections.commentSummary ?? [];
  let commentSummary: SummaryField<string[]>;
  if (!options.commentsSupplied) {
    commentSummary = { value: [], usedDefault: false };
  } else if (parsedComments.length === 0) {
    commentSummary = { value: [COMMENT_SUMMARY_DEFAULT], usedDefault: true };
  } else {
    commentSummary = { value: parsedComments.slice(0, COMMENT_SUMMARY_LINES), usedDefault: false };
  }

  const parsedKeyPoints = (sections.keyPoints ?? []).slice(0, KEY_POINTS_COUNT);
  const paddedKeyPoints = KEY_POINTS_COUNT - parsedKeyPoints.length;
  const keyPoints: SummaryField<string[]> = {
    value: fitToLength(parsedKeyPoints, KEY_POINTS_COUNT, (i) => keyPointDefault(i)),
    usedDefault: paddedKeyPoints > 0,
  };

  const { links, discarded } = extractLinks(sections.relatedLinks ?? []);
  const relatedLinks: SummaryField<string[]> = {
    value: links.slice(0, RELATED_LINKS_COUNT),
    usedDefault: false,
  };

  const summary: EnhancedSummary = {
    kind: "enhanced",
    articleSummary,
    commentSummary,
    keyPoints,
    relatedLinks,
  };

  const defaultedFields = SECTION_NAMES.filter((name) => summary[name].usedDefault);

  return {
    summary,
    diagnostics: {
      responseChars: raw.length,
      compliance: classifyCompliance(raw, sectionsFound, defaultedFields, options.commentsSupplied),
      sectionsFound,
      defaultedFields,
      paddedKeyPoints,
      discardedLinks: discarded,
    },
  };
}

function classifyCompliance(
  raw: string,
  sectionsFound: SectionName[],
  defaultedFields: SectionName[],
  commentsSupplied: boolean
): Compliance {
  if (!raw.trim()) return "empty";
  if (sectionsFound.length === 0) return "unstructured";
  const expected: SectionName[] = commentsSupplied
    ? ["articleSummary", "commentSummary", "keyPoints", "relatedLinks"]
    : ["articleSummary", "keyPoints", "relatedLinks"];
  const complete = expected.every((name) => sectionsFound.includes(name));
  return complete && defaultedFields.length === 0 ? "full" : "partial";
}

function articleDefault(index: number): string {
  return ARTICLE_SUMMARY_DEFAULTS[index] ?? ARTICLE_SUMMARY_DEFAULTS[ARTICLE_SUMMARY_DEFAULTS.length - 1];
}

function keyPointDefault(index: number): string {
  return KEY_POINT_DEFAULTS[index] ?? KEY_POINT_DEFAULTS[KEY_POINT_DEFAULTS.length - 1];
}

export function buildEnhancedPrompt(article: ArticleContent, comments: CommentSet): string {
  const content = collapseWhitespace(article.text).slice(0, PROMPT_CONTENT_CHARS);
  const digest = buildCommentDigest(comments);

  return [
    "Summarize the following Hacker News story and its discussion.",
    article.url ? `URL: ${article.url}` : "",
    "",
    "Article content:",
    content || "(article content unavailable)",
    "",
    digest ? `Top comments:\n${digest}` : "Top comments: (none)",
    "",
    "Respond using exactly these sections, one item per line:",
    "ARTICLE SUMMARY:",
    "1. <first line>",
    "2. <second line>",
    "3. <third line>",
    "COMMENT SUMMARY:",
    "- <up to 3 lines on what commenters said, omit if there are no comments>",
    "KEY POINTS:",
    "- <3 short key points>",
    "RELATED LINKS:",
    "- <up to 3 relevant URLs mentioned in the article or comments>",
  ]
    .filter((line, index, all) => line !== "" || all[index - 1] !== "")
    .join("\n");
}

export function buildCommentDigest(comments: CommentSet): string {
  const lines: string[] = [];
  let total = 0;
  for (const comment of comments) {
    const line = `- ${truncate(collapseWhitespace(comment), PROMPT_COMMENT_CHARS)}`;
    if (total + line.length > PROMPT_DIGEST_CHARS) break;
    lines.push(line);
    total += line.length + 1;
  }
  return lines.join("\n");
}

/**
 * Shared behaviour for model-backed summarizers. Subclasses only provide
 * the raw completion call; prompt building, parsing, normalization and
 * diagnostics live here.
 */
export abstract class EnhancedSummarizer implements Summarizer {
  abstract readonly mode: SummarizerMode;
  readonly needsComments = true;

  protected abstract readonly backend: string;

  protected abstract complete(prompt: string): Promise<string>;

  async summarize(article: ArticleContent, comments: CommentSet = []): Promise<EnhancedSummary> {
    if (!collapseWhitespace(article.text) && comments.length === 0) {
      const { summary, diagnostics } = parseEnhancedResponse("", { commentsSupplied: false });
      logger.debug("summarizer.enhanced.diagnostics", {
        mode: this.mode,
        url: article.url,
        skippedCall: true,
        ...diagnostics,
      });
      return summary;
    }

    const prompt = buildEnhancedPrompt(article, comments);
    let raw: string;
    try {
      raw = await this.complete(prompt);
    } catch (error) {
      if (error instanceof BackendUnavailableError) throw error;
      throw new BackendUnavailableError(this.backend, errorMessage(error), { cause: error });
    }

    const { summary, diagnostics } = parseEnhancedResponse(raw, {
      commentsSupplied: comments.length > 0,
    });
    logger.debug("summarizer.enhanced.diagnostics", {
      mode: this.mode,
      url: article.url,
      skippedCall: false,
      ...diagnostics,
    });
    return summary;
  }
}
