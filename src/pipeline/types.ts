import type { AnalysisError, ExtractionError, RunError } from '../agents/errors';

export interface PaperMetadata {
  title?: string;
  authors?: string[];
  year?: number;
}

/** One input PDF. `index` is its slot in folder enumeration order. */
export interface Document {
  readonly index: number;
  readonly id: string;
  readonly path: string;
  readonly text: string;
  readonly metadata?: PaperMetadata;
}

export interface ExtractedText {
  text: string;
  metadata?: PaperMetadata;
}

export type TextExtractor = (filePath: string) => Promise<ExtractedText>;

export interface PaperSummary {
  readonly index: number;
  readonly documentId: string;
  readonly summary: string;
  readonly metadata?: PaperMetadata;
}

export interface Citation {
  readonly index: number;
  readonly documentId: string;
  readonly text: string;
  /** True when authors, year or title came from a placeholder. */
  readonly degraded: boolean;
}

export interface ReviewResult {
  readonly summaries: readonly PaperSummary[];
  readonly narrative: string;
  readonly citations: readonly Citation[];
}

export type DocumentOutcome =
  | {
      status: 'included';
      index: number;
      documentId: string;
      summary: PaperSummary;
      citation: Citation;
    }
  | {
      status: 'excluded';
      index: number;
      documentId: string;
      error: ExtractionError | AnalysisError;
    };

export interface ExcludedDocument {
  documentId: string;
  reason: string;
  errorName: string;
}

export interface RunReport {
  runId: string;
  included: string[];
  excluded: ExcludedDocument[];
  degradedCitations: string[];
  synthesisCalls: number;
  outputPath?: string;
  failure?: string;
  durationMs: number;
}

export type PipelineResult =
  | { success: true; review: ReviewResult; outputPath: string; report: RunReport }
  | { success: false; error: RunError; report: RunReport };
