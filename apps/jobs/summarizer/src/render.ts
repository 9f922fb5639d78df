import type { PipelineOutcome, PipelineReport, RunCounts } from "./types";

const RULE = "=".repeat(60);

export function renderReport(report: PipelineReport): string {
  const out: string[] = [RULE];
  if (report.outcomes.length === 0) {
    out.push("No articles found.");
    return `${out.join("\n")}\n`;
  }

  for (const outcome of report.outcomes) {
    out.push("", ...renderOutcome(outcome));
  }
  out.push("", RULE, renderCounts(report.counts), "Summary generation complete!");
  return `${out.join("\n")}\n`;
}

export function renderOutcome(outcome: PipelineOutcome): string[] {
  if (outcome.status === "skipped") {
    return [
      `--- Article ${outcome.rank} skipped (${outcome.error.kind}: ${outcome.error.message}) ---`,
    ];
  }

  const { story, summary } = outcome;
  const marker = outcome.fallbackUsed ? ` [fallback: ${outcome.modeUsed}]` : "";
  const lines = [
    `--- Article ${outcome.rank} (Score: ${story.score})${marker} ---`,
    story.title,
    `URL: ${story.url ?? "(none)"}`,
  ];

  if (summary.kind === "plain") {
    return [...lines, ...summary.lines];
  }

  lines.push(...summary.articleSummary.value);
  if (summary.commentSummary.value.length > 0) {
    lines.push("Discussion:", ...bullets(summary.commentSummary.value));
  }
  lines.push("Key points:", ...bullets(summary.keyPoints.value));
  if (summary.relatedLinks.value.length > 0) {
    lines.push("Related links:", ...bullets(summary.relatedLinks.value));
  }
  return lines;
}

export function renderCounts(counts: RunCounts): string {
  return `Summarized: ${counts.summarized}/${counts.listed}, skipped: ${counts.skipped}, fallbacks: ${counts.fallbacks}`;
}

/** Non-zero when stories were listed but none could be summarized. */
export function exitCodeFor(counts: RunCounts): number {
  return counts.listed > 0 && counts.summarized === 0 ? 1 : 0;
}

function bullets(items: string[]): string[] {
  return items.map((item) => `  - ${item}`);
}
