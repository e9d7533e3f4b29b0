/**
 * Shared types for paper-digest
 */

export interface PaperLinks {
  abstract: string;
  pdf: string;
}

/**
 * One catalog entry as fetched. Never mutated after the source yields it.
 */
export interface PaperRecord {
  readonly id: string;
  readonly title: string;
  readonly authors: readonly string[];
  readonly abstract: string;
  readonly categories: readonly string[];
  readonly publishedAt: Date;
  readonly links: PaperLinks;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface SourceRequest {
  categories: string[];
  window: TimeWindow;
}

export type Difficulty = 'low' | 'medium' | 'high';

export const DIFFICULTIES: readonly Difficulty[] = ['low', 'medium', 'high'];

export interface AnalysisFields {
  significance: number;
  novelty: number;
  summary: string;
  keyInsights: string[];
  businessRelevance: string;
  implementationDifficulty: Difficulty;
  tags: string[];
}

export interface AnalyzedPaper extends AnalysisFields {
  paper: PaperRecord;
}

export interface ScoredPaper {
  paper: PaperRecord;
  relevance: number;
  matchedKeywords: string[];
}

export type DigestKind = 'daily' | 'weekly' | 'manual';

export const DIGEST_KINDS: readonly DigestKind[] = ['daily', 'weekly', 'manual'];

export interface TagCount {
  tag: string;
  count: number;
}

export interface DigestStats {
  analyzedCount: number;
  highSignificanceCount: number;
  meanSignificance: number;
  meanNovelty: number;
  topTags: TagCount[];
}

/**
 * Cross-paper reading of a weekly digest, written by the analysis model.
 */
export interface TrendSummary {
  text: string;
  /** Number of digest papers the summary was written from. */
  paperCount: number;
}

export interface Digest {
  kind: DigestKind;
  generatedAt: Date;
  papers: AnalyzedPaper[];
  stats: DigestStats;
  trends?: TrendSummary;
}

export type OutputFormat = 'html' | 'markdown' | 'json' | 'email';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['html', 'markdown', 'json', 'email'];

export interface Artifact {
  format: OutputFormat;
  filename: string;
  contentType: string;
  content: string;
  /** Only set for the email format. */
  subject?: string;
}

export type RunStatus = 'success' | 'partial' | 'failed';

export type WarningKind = 'analysis' | 'trends' | 'render' | 'delivery' | 'filter';

export interface RunWarning {
  kind: WarningKind;
  message: string;
  paperId?: string;
  format?: OutputFormat;
  sink?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface RunCounts {
  fetched: number;
  kept: number;
  analyzed: number;
  inDigest: number;
}

export interface RunResult {
  readonly runId: string;
  readonly kind: DigestKind;
  readonly status: RunStatus;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly dryRun: boolean;
  readonly counts: RunCounts;
  readonly usage: TokenUsage;
  readonly warnings: readonly RunWarning[];
  readonly artifacts: readonly string[];
  /** Generation timestamp of the digest this run produced, if any. */
  readonly digestGeneratedAt?: Date;
  readonly error?: string;
}
