import { ConfigError } from "./errors";
import { isLogThreshold, type LogThreshold } from "./logger";
import type { SummarizerMode } from "./types";

export type AppConfig = Readonly<{
  storyCount: number;
  mode: SummarizerMode;
  fallbackEnabled: boolean;
  maxComments: number;
  commentFetchLimit: number;
  delayMs: number;
  fetchTimeoutMs: number;
  maxContentLength: number;
  logLevel: LogThreshold;
  basic: Readonly<{
    summaryLines: number;
    minSentenceLength: number;
    maxLineLength: number;
  }>;
  hackerNews: Readonly<{
    baseUrl: string;
    userAgent: string;
  }>;
  contentSelectors: readonly string[];
  ollama: Readonly<{
    baseUrl: string;
    model: string;
    timeoutMs: number;
  }>;
  openAi: Readonly<{
    apiKey?: string;
    model: string;
    timeoutMs: number;
    maxRetries: number;
    maxTokens: number;
    temperature: number;
  }>;
}>;

export type CliOptions = {
  count?: number;
  mode?: SummarizerMode;
  fallback?: boolean;
  model?: string;
  maxComments?: number;
  delayMs?: number;
  logLevel?: LogThreshold;
};

export const MIN_STORY_COUNT = 1;
export const MAX_STORY_COUNT = 100;

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36";

export const DEFAULT_CONTENT_SELECTORS = [
  "article",
  '[role="main"]',
  ".content",
  ".post-content",
  ".entry-content",
  ".article-content",
  "main",
  ".story-body",
] as const;

const MODE_ALIASES = new Map<string, SummarizerMode>([
  ["basic", "basic"],
  ["local-model", "local-model"],
  ["local", "local-model"],
  ["ollama", "local-model"],
  ["cloud-model", "cloud-model"],
  ["cloud", "cloud-model"],
  ["llmapi", "cloud-model"],
  ["openai", "cloud-model"],
]);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const storyCount = parsePositiveInt(env.STORY_COUNT, 20);
  if (storyCount > MAX_STORY_COUNT) {
    throw new ConfigError(
      `STORY_COUNT must be between ${MIN_STORY_COUNT} and ${MAX_STORY_COUNT}.`
    );
  }

  const mode = env.SUMMARIZER_MODE ? parseMode(env.SUMMARIZER_MODE) : "basic";

  const logLevel = (env.LOG_LEVEL || "info").trim().toLowerCase();
  if (!isLogThreshold(logLevel)) {
    throw new ConfigError("LOG_LEVEL must be one of debug, info, warn, error, silent.");
  }

  return Object.freeze({
    storyCount,
    mode,
    fallbackEnabled: parseBoolean(env.FALLBACK_ENABLED, false),
    maxComments: parsePositiveInt(env.MAX_COMMENTS, 10),
    commentFetchLimit: parsePositiveInt(env.COMMENT_FETCH_LIMIT, 15),
    delayMs: parseNonNegativeInt(env.REQUEST_DELAY_MS, 1000),
    fetchTimeoutMs: parsePositiveInt(env.FETCH_TIMEOUT_MS, 10000),
    maxContentLength: parsePositiveInt(env.MAX_CONTENT_LENGTH, 5000),
    logLevel,
    basic: {
      summaryLines: 3,
      minSentenceLength: parsePositiveInt(env.MIN_SENTENCE_LENGTH, 20),
      maxLineLength: parsePositiveInt(env.MAX_LINE_LENGTH, 120),
    },
    hackerNews: {
      baseUrl: stripTrailingSlash(
        env.HN_API_BASE_URL || "https://hacker-news.firebaseio.com/v0"
      ),
      userAgent: env.HTTP_USER_AGENT || DEFAULT_USER_AGENT,
    },
    contentSelectors: DEFAULT_CONTENT_SELECTORS,
    ollama: {
      baseUrl: stripTrailingSlash(env.OLLAMA_BASE_URL || "http://localhost:11434"),
      model: env.OLLAMA_MODEL || "mistral:7b",
      timeoutMs: parsePositiveInt(env.OLLAMA_TIMEOUT_MS, 30000),
    },
    openAi: {
      apiKey: env.OPENAI_API_KEY || undefined,
      model: env.OPENAI_MODEL || "gpt-4o-mini",
      timeoutMs: parsePositiveInt(env.OPENAI_TIMEOUT_MS, 30000),
      maxRetries: parseNonNegativeInt(env.OPENAI_MAX_RETRIES, 1),
      maxTokens: 1000,
      temperature: 0.7,
    },
  });
}

/** CLI flags take precedence over environment values. */
export function applyCliOptions(config: AppConfig, options: CliOptions): AppConfig {
  return Object.freeze({
    ...config,
    storyCount: options.count ?? config.storyCount,
    mode: options.mode ?? config.mode,
    fallbackEnabled: options.fallback ?? config.fallbackEnabled,
    maxComments: options.maxComments ?? config.maxComments,
    delayMs: options.delayMs ?? config.delayMs,
    logLevel: options.logLevel ?? config.logLevel,
    ollama: {
      ...config.ollama,
      model: options.model ?? config.ollama.model,
    },
  });
}

export function parseMode(value: string): SummarizerMode {
  const mode = MODE_ALIASES.get(value.trim().toLowerCase());
  if (!mode) {
    throw new ConfigError(
      `Unsupported summarizer mode: ${value} (expected basic, local-model or cloud-model)`
    );
  }
  return mode;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.floor(parsed);
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return Math.floor(parsed);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  const lower = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(lower)) return true;
  if (["0", "false", "no", "off"].includes(lower)) return false;
  return fallback;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
