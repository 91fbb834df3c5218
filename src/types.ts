export interface Snippet {
  id: string;
  code: string;
  filepath?: string | null;
  startLine?: number | null;
}

export type SnippetCollection = ReadonlyMap<string, Snippet>;

export const ComparisonStatus = {
  Reviewed: "reviewed",
  NeedsReview: "needs_review",
  NotFound: "not_found",
  Added: "added"
} as const;

export type ComparisonStatus = (typeof ComparisonStatus)[keyof typeof ComparisonStatus];

export type ComparisonResult =
  | {
      oldId: string;
      newId: string;
      score: number;
      status: typeof ComparisonStatus.Reviewed | typeof ComparisonStatus.NeedsReview;
    }
  | {
      oldId: string;
      newId?: undefined;
      score?: undefined;
      status: typeof ComparisonStatus.NotFound;
    }
  | {
      oldId?: undefined;
      newId: string;
      score?: undefined;
      status: typeof ComparisonStatus.Added;
    };

export type ComparisonSummary = Record<ComparisonStatus, number> & { total: number };
