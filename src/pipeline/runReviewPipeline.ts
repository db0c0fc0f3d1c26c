import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { ReviewConfig } from '../agents/config';
import {
  AnalysisError,
  ExtractionError,
  RunCancelledError,
  SynthesisError,
  toError,
  type RunError,
} from '../agents/errors';
import type { AgentDeps } from '../agents/runAgent';
import type { TextGenerationService, TextServices } from '../agents/textService';
import { createLimiter, type LaneLimiter } from '../utils/limiter';
import { createConsoleLogger, type Logger } from '../utils/logger';
import { listPdfFiles, reviewFileName, writeFileAtomic } from '../utils/pdfFolder';
import { analyzePaper } from './analyzePaper';
import { assembleReview } from './assembleReview';
import { buildCitation } from './buildCitation';
import { synthesizeReview } from './synthesizeReview';
import type {
  Document,
  DocumentOutcome,
  PaperSummary,
  PipelineResult,
  ReviewResult,
  RunReport,
  TextExtractor,
} from './types';

export interface PipelineInput {
  inputDir: string;
  /** Exact output file. Takes precedence over `outputDir`. */
  outputPath?: string;
  /** Directory for a timestamped review file; defaults to the working directory. */
  outputDir?: string;
}

export interface PipelineDeps {
  services: TextServices;
  extractText: TextExtractor;
  logger?: Logger;
  signal?: AbortSignal;
  now?: () => Date;
}

const defaultLogger = createConsoleLogger('Pipeline');

function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RunCancelledError(stage);
  }
}

async function processDocument(
  filePath: string,
  index: number,
  config: ReviewConfig,
  deps: PipelineDeps,
  limiter: LaneLimiter,
  logger: Logger
): Promise<DocumentOutcome> {
  const documentId = path.basename(filePath);
  const agentDeps = (service: TextGenerationService): AgentDeps => ({
    service,
    limiter,
    retry: config.retry,
    logger,
    signal: deps.signal,
  });

  throwIfCancelled(deps.signal, `extraction of ${documentId}`);
  let document: Document;
  try {
    const extracted = await deps.extractText(filePath);
    document = {
      index,
      id: documentId,
      path: filePath,
      text: extracted.text,
      ...(extracted.metadata ? { metadata: extracted.metadata } : {}),
    };
  } catch (error) {
    const cause = toError(error);
    return {
      status: 'excluded',
      index,
      documentId,
      error: new ExtractionError(documentId, cause.message, { cause }),
    };
  }

  if (!document.text.trim()) {
    return {
      status: 'excluded',
      index,
      documentId,
      error: new ExtractionError(documentId, 'no extractable text'),
    };
  }

  let summary: PaperSummary;
  try {
    summary = await analyzePaper(
      document,
      { config: config.analysis, maxChars: config.analysisMaxChars },
      agentDeps(deps.services.analysis)
    );
  } catch (error) {
    if (error instanceof AnalysisError) {
      return { status: 'excluded', index, documentId, error };
    }
    throw error;
  }

  const built = await buildCitation(
    document,
    { config: config.citation, maxChars: config.citationMaxChars },
    agentDeps(deps.services.citation)
  );
  if (built.error) {
    logger.warn(`Using fallback citation for ${documentId}`, { error: built.error.message });
  }

  const hasMetadata = Object.keys(built.metadata).length > 0;
  return {
    status: 'included',
    index,
    documentId,
    summary: hasMetadata ? { ...summary, metadata: built.metadata } : summary,
    citation: built.citation,
  };
}

function buildReport(
  runId: string,
  outcomes: readonly DocumentOutcome[],
  startedAt: number
): RunReport {
  const report: RunReport = {
    runId,
    included: [],
    excluded: [],
    degradedCitations: [],
    synthesisCalls: 0,
    durationMs: Date.now() - startedAt,
  };
  for (const outcome of outcomes) {
    if (outcome.status === 'included') {
      report.included.push(outcome.documentId);
      if (outcome.citation.degraded) report.degradedCitations.push(outcome.documentId);
    } else {
      report.excluded.push({
        documentId: outcome.documentId,
        errorName: outcome.error.name,
        reason: outcome.error.message,
      });
    }
  }
  return report;
}

/**
 * Turns every PDF in `input.inputDir` into one cited literature review.
 *
 * Documents are extracted, analyzed and cited concurrently (bounded by the
 * `documents` and `text_generation` lanes) and re-sequenced by folder order.
 * Synthesis starts only once every document has an outcome. A failed
 * document is left out of both the summaries and the citations; a failed
 * synthesis or a cancellation ends the run without writing anything.
 */
export async function runReviewPipeline(
  input: PipelineInput,
  config: ReviewConfig,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const logger = deps.logger ?? defaultLogger;
  const runId = uuidv4();
  const startedAt = Date.now();
  const limiter = createLimiter({
    documents: config.documentConcurrency,
    text_generation: config.llmConcurrency,
  });

  const fail = (error: RunError, report: RunReport): PipelineResult => {
    logger.error(`Run ${runId} failed`, { error: error.message });
    return {
      success: false,
      error,
      report: { ...report, failure: error.message, durationMs: Date.now() - startedAt },
    };
  };

  const files = await listPdfFiles(input.inputDir);
  logger.info(`Run ${runId}: ${files.length} PDF file(s) in ${input.inputDir}`);
  if (files.length === 0) {
    return fail(
      new SynthesisError(`No PDF files found in ${input.inputDir}`),
      buildReport(runId, [], startedAt)
    );
  }

  let completed = 0;
  const settled = await Promise.allSettled(
    files.map((filePath, index) =>
      limiter.limit('documents', async () => {
        const outcome = await processDocument(filePath, index, config, deps, limiter, logger);
        completed++;
        if (outcome.status === 'included') {
          logger.info(`Analyzed ${completed}/${files.length}: ${outcome.documentId}`);
        } else {
          logger.warn(`Excluded ${completed}/${files.length}: ${outcome.documentId}`, {
            error: outcome.error.message,
          });
        }
        return outcome;
      }, deps.signal)
    )
  );

  const outcomes: DocumentOutcome[] = [];
  for (const result of settled) {
    if (result.status === 'rejected') {
      if (result.reason instanceof RunCancelledError) {
        return fail(result.reason, buildReport(runId, outcomes, startedAt));
      }
      throw result.reason;
    }
    outcomes.push(result.value);
  }
  outcomes.sort((a, b) => a.index - b.index);

  const report = buildReport(runId, outcomes, startedAt);
  const included = outcomes.flatMap((outcome) => (outcome.status === 'included' ? [outcome] : []));
  logger.info(`Run ${runId}: ${included.length} included, ${report.excluded.length} excluded`);

  if (included.length === 0) {
    return fail(new SynthesisError('No documents were analyzed successfully'), report);
  }

  let narrative: string;
  try {
    throwIfCancelled(deps.signal, 'synthesis');
    const synthesis = await synthesizeReview(
      included.map((outcome) => outcome.summary),
      {
        config: config.synthesis,
        maxInputChars: config.synthesisMaxInputChars,
        wordLimit: config.reviewWordLimit,
      },
      {
        service: deps.services.synthesis,
        limiter,
        retry: config.retry,
        logger,
        signal: deps.signal,
      }
    );
    narrative = synthesis.narrative;
    report.synthesisCalls = synthesis.calls;
  } catch (error) {
    if (error instanceof SynthesisError || error instanceof RunCancelledError) {
      return fail(error, report);
    }
    throw error;
  }

  const review: ReviewResult = {
    summaries: included.map((outcome) => outcome.summary),
    narrative,
    citations: included.map((outcome) => outcome.citation),
  };
  const content = assembleReview(review);

  const outputPath = path.resolve(
    input.outputPath ??
      path.join(input.outputDir ?? process.cwd(), reviewFileName(deps.now ? deps.now() : new Date()))
  );
  try {
    await writeFileAtomic(outputPath, content, () => throwIfCancelled(deps.signal, 'output write'));
  } catch (error) {
    if (error instanceof RunCancelledError) {
      return fail(error, report);
    }
    throw error;
  }

  logger.info(`Run ${runId}: literature review saved to ${outputPath}`);
  return {
    success: true,
    review,
    outputPath,
    report: { ...report, outputPath, durationMs: Date.now() - startedAt },
  };
}
