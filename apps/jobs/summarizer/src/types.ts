export type SummarizerMode = "basic" | "local-model" | "cloud-model";

export interface Story {
  id: number;
  title: string;
  url?: string;
  score: number;
  by?: string;
  time?: number;
  descendants?: number;
  commentIds: number[];
}

export interface ArticleContent {
  url: string;
  text: string;
  extracted: boolean;
  error?: string;
}

export type CommentSet = string[];

export interface PlainSummary {
  kind: "plain";
  lines: string[];
}

export interface SummaryField<T> {
  value: T;
  usedDefault: boolean;
}

export interface EnhancedSummary {
  kind: "enhanced";
  articleSummary: SummaryField<string[]>;
  commentSummary: SummaryField<string[]>;
  keyPoints: SummaryField<string[]>;
  relatedLinks: SummaryField<string[]>;
}

export type SummaryResult = PlainSummary | EnhancedSummary;

export interface Summarizer {
  readonly mode: SummarizerMode;
  readonly needsComments: boolean;
  summarize(article: ArticleContent, comments?: CommentSet): Promise<SummaryResult>;
}

export interface ContentProvider {
  listTopStoryIds(limit: number): Promise<number[]>;
  getStory(id: number): Promise<Story | null>;
  getComments(ids: number[], maxCount: number): Promise<CommentSet>;
  extractContent(url: string): Promise<ArticleContent>;
}

export type ErrorKind =
  | "StoryNotFound"
  | "MetadataFetchFailed"
  | "ContentExtractionFailed"
  | "CommentFetchFailed"
  | "BackendUnavailable";

export interface ErrorDescriptor {
  kind: ErrorKind;
  message: string;
}

export type StoryState =
  | "pending"
  | "metadataFetched"
  | "contentExtracted"
  | "errorFallback"
  | "summarized"
  | "reported";

export interface SummarizedOutcome {
  status: "summarized";
  rank: number;
  story: Story;
  summary: SummaryResult;
  requestedMode: SummarizerMode;
  modeUsed: SummarizerMode;
  fallbackUsed: boolean;
  contentExtracted: boolean;
  commentCount: number;
  degradations: ErrorDescriptor[];
  states: StoryState[];
  durationMs: number;
}

export interface SkippedOutcome {
  status: "skipped";
  rank: number;
  storyId: number;
  error: ErrorDescriptor;
  states: StoryState[];
  durationMs: number;
}

export type PipelineOutcome = SummarizedOutcome | SkippedOutcome;

export interface RunCounts {
  listed: number;
  summarized: number;
  skipped: number;
  fallbacks: number;
}

export interface PipelineReport {
  outcomes: PipelineOutcome[];
  counts: RunCounts;
}
