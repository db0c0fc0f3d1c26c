import type { AgentConfig } from '../agents/config';
import { AnalysisError, RunCancelledError, toError } from '../agents/errors';
import { ANALYSIS_PROMPT } from '../agents/prompts';
import { runTextAgent, type AgentDeps } from '../agents/runAgent';
import { truncate } from '../utils/text';
import type { Document, PaperSummary } from './types';

export interface AnalyzeOptions {
  config: AgentConfig;
  maxChars: number;
}

export function buildAnalysisMessage(document: Document, maxChars: number): string {
  return `Filename: ${document.id}\n\nText:\n${truncate(document.text, maxChars)}`;
}

/**
 * Summarizes one document with a single text-generation request. Failures
 * surface as AnalysisError so the caller can exclude just this document;
 * cancellation passes through untouched.
 */
export async function analyzePaper(
  document: Document,
  options: AnalyzeOptions,
  deps: AgentDeps
): Promise<PaperSummary> {
  if (!document.text.trim()) {
    throw new AnalysisError(document.id, new Error('Document text is empty'));
  }

  try {
    const summary = await runTextAgent(
      'PaperAnalysis',
      ANALYSIS_PROMPT,
      buildAnalysisMessage(document, options.maxChars),
      options.config,
      deps
    );
    return {
      index: document.index,
      documentId: document.id,
      summary,
      ...(document.metadata ? { metadata: document.metadata } : {}),
    };
  } catch (error) {
    if (error instanceof RunCancelledError) throw error;
    throw new AnalysisError(document.id, toError(error));
  }
}
