import pc from "picocolors";
import {
  ComparisonStatus,
  type ComparisonResult,
  type ComparisonSummary,
  type Snippet,
  type SnippetCollection
} from "../types.js";

type Colors = ReturnType<typeof pc.createColors>;

export interface ComparisonReportContext {
  threshold: number;
  old?: SnippetCollection;
  new?: SnippetCollection;
  /** Wall time of the comparison; shown in the text header when given. */
  durationMs?: number;
  /** Defaults to picocolors' own terminal detection. */
  color?: boolean;
}

const STATUS_LABELS: Record<ComparisonStatus, string> = {
  needs_review: "NEEDS REVIEW",
  not_found: "NOT FOUND",
  added: "ADDED",
  reviewed: "REVIEWED"
};

// Attention-worthy statuses first.
const STATUS_ORDER: ComparisonStatus[] = [
  ComparisonStatus.NeedsReview,
  ComparisonStatus.NotFound,
  ComparisonStatus.Added,
  ComparisonStatus.Reviewed
];

const LABEL_WIDTH = Math.max(...Object.values(STATUS_LABELS).map((label) => label.length));

function statusLabel(colors: Colors, status: ComparisonStatus): string {
  const label = STATUS_LABELS[status].padEnd(LABEL_WIDTH);
  switch (status) {
    case "needs_review":
      return colors.yellow(label);
    case "not_found":
      return colors.red(label);
    case "added":
      return colors.cyan(label);
    case "reviewed":
    default:
      return colors.green(label);
  }
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) return "0.0s";
  const totalSeconds = durationMs / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.floor(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}

function snippetLocation(snippet?: Snippet): string | null {
  if (!snippet?.filepath) return null;
  return typeof snippet.startLine === "number" ? `${snippet.filepath}:${snippet.startLine}` : snippet.filepath;
}

function resolveLocation(result: ComparisonResult, context: ComparisonReportContext): string | null {
  const newSnippet = result.newId !== undefined ? context.new?.get(result.newId) : undefined;
  const oldSnippet = result.oldId !== undefined ? context.old?.get(result.oldId) : undefined;
  return snippetLocation(newSnippet) ?? snippetLocation(oldSnippet);
}

function formatResult(colors: Colors, result: ComparisonResult, context: ComparisonReportContext): string {
  let ids: string;
  switch (result.status) {
    case "not_found":
      ids = result.oldId;
      break;
    case "added":
      ids = result.newId;
      break;
    default:
      ids = result.oldId === result.newId ? result.oldId : `${result.oldId} -> ${result.newId}`;
  }
  const scoreLabel = result.score !== undefined ? ` (score ${result.score})` : "";
  const location = resolveLocation(result, context);
  return `${statusLabel(colors, result.status)} ${ids}${scoreLabel}${location ? colors.dim(` at ${location}`) : ""}`;
}

export function summarizeComparison(results: readonly ComparisonResult[]): ComparisonSummary {
  const summary: ComparisonSummary = {
    reviewed: 0,
    needs_review: 0,
    not_found: 0,
    added: 0,
    total: results.length
  };
  for (const result of results) {
    summary[result.status] += 1;
  }
  return summary;
}

/** Whether any finding still needs a human: a changed snippet or one that disappeared. */
export function needsAttention(summary: ComparisonSummary): boolean {
  return summary.needs_review > 0 || summary.not_found > 0;
}

export function formatComparisonText(
  results: readonly ComparisonResult[],
  context: ComparisonReportContext
): string {
  const colors = pc.createColors(context.color ?? pc.isColorSupported);
  const summary = summarizeComparison(results);
  const header = [
    "SNIPCHECK SUMMARY",
    "-----------------",
    `- Findings: ${summary.total} total (reviewed ${summary.reviewed}, needs review ${summary.needs_review}, not found ${summary.not_found}, added ${summary.added})`,
    `- Threshold: ${context.threshold}`
  ];
  if (context.durationMs !== undefined) {
    header.push(`- Duration: ${formatDuration(context.durationMs)}`);
  }
  if (!results.length) {
    return `${header.join("\n")}\n\nNo findings.`;
  }

  const ordered = STATUS_ORDER.flatMap((status) => results.filter((result) => result.status === status));
  const body = ordered.map((result) => formatResult(colors, result, context)).join("\n");
  return `${header.join("\n")}\n\n${body}`;
}

export function formatComparisonJson(
  results: readonly ComparisonResult[],
  context: Pick<ComparisonReportContext, "threshold">
): string {
  return JSON.stringify(
    {
      threshold: context.threshold,
      summary: summarizeComparison(results),
      results
    },
    null,
    2
  );
}
