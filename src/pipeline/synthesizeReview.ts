import type { AgentConfig } from '../agents/config';
import { RunCancelledError, SynthesisError, toError } from '../agents/errors';
import { buildReductionPrompt, buildSynthesisPrompt } from '../agents/prompts';
import { runTextAgent, type AgentDeps } from '../agents/runAgent';
import { createConsoleLogger } from '../utils/logger';
import { truncate } from '../utils/text';
import type { PaperMetadata, PaperSummary } from './types';

export const BLOCK_SEPARATOR = '\n\n';

export interface SynthesisOptions {
  config: AgentConfig;
  /** Largest user input, in characters, one synthesis call may carry. */
  maxInputChars: number;
  wordLimit: number;
}

export interface SynthesisOutcome {
  narrative: string;
  /** Number of text-generation requests issued, first pass and reductions. */
  calls: number;
  /** Batch count of each level; level 0 is the pass over paper summaries. */
  levels: number[];
}

const defaultLogger = createConsoleLogger('Synthesizer');

function describeMetadata(metadata: PaperMetadata | undefined): string {
  if (!metadata) return '';
  const parts: string[] = [];
  if (metadata.title) parts.push(`Title: ${metadata.title}`);
  if (metadata.authors && metadata.authors.length > 0) {
    parts.push(`Authors: ${metadata.authors.join(', ')}`);
  }
  if (metadata.year !== undefined) parts.push(`Year: ${metadata.year}`);
  return parts.join(' | ');
}

/** `position` is 1-based and is the number the review cites the paper by. */
export function renderSummaryBlock(summary: PaperSummary, position: number): string {
  const lines = [`[${position}] ${summary.documentId}`];
  const meta = describeMetadata(summary.metadata);
  if (meta) lines.push(meta);
  lines.push(summary.summary);
  return lines.join('\n');
}

export function joinedLength(blocks: string[]): number {
  if (blocks.length === 0) return 0;
  return blocks.reduce((sum, block) => sum + block.length, 0) + BLOCK_SEPARATOR.length * (blocks.length - 1);
}

/**
 * Greedy in-order packing of blocks into batches whose joined length stays
 * within `maxChars`. A block longer than `maxChars` is truncated and sits
 * alone. When packing cannot merge anything (every batch holds one block),
 * blocks are paired and cut to half the limit so each reduction level
 * shrinks.
 */
export function packBatches(blocks: string[], maxChars: number): string[][] {
  const batches: string[][] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const raw of blocks) {
    const block = truncate(raw, maxChars);
    const added = current.length === 0 ? block.length : currentLength + BLOCK_SEPARATOR.length + block.length;
    if (current.length > 0 && added > maxChars) {
      batches.push(current);
      current = [block];
      currentLength = block.length;
    } else {
      current.push(block);
      currentLength = added;
    }
  }
  if (current.length > 0) batches.push(current);

  if (batches.length > 1 && batches.length === blocks.length) {
    const half = Math.max(1, Math.floor((maxChars - BLOCK_SEPARATOR.length) / 2));
    const paired: string[][] = [];
    for (let i = 0; i < blocks.length; i += 2) {
      paired.push(blocks.slice(i, i + 2).map((block) => truncate(block, half)));
    }
    return paired;
  }
  return batches;
}

async function settleInOrder<T>(tasks: Array<Promise<T>>): Promise<T[]> {
  const settled = await Promise.allSettled(tasks);
  const values: T[] = [];
  for (const result of settled) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
    values.push(result.value);
  }
  return values;
}

/**
 * Produces one narrative over every summary. Input that fits the limit is a
 * single request; otherwise summaries are synthesized per batch and the
 * batch narratives are reduced, level by level, until one request covers
 * them all.
 */
export async function synthesizeReview(
  summaries: readonly PaperSummary[],
  options: SynthesisOptions,
  deps: AgentDeps
): Promise<SynthesisOutcome> {
  const logger = deps.logger ?? defaultLogger;
  if (summaries.length === 0) {
    throw new SynthesisError('No paper summaries to synthesize');
  }

  const synthesisPrompt = buildSynthesisPrompt(options.wordLimit);
  const reductionPrompt = buildReductionPrompt(options.wordLimit);
  let calls = 0;
  const levels: number[] = [];

  const request = (agentName: string, systemPrompt: string, batch: string[]): Promise<string> => {
    calls++;
    return runTextAgent(agentName, systemPrompt, batch.join(BLOCK_SEPARATOR), options.config, deps);
  };

  try {
    const blocks = summaries.map((summary, i) => renderSummaryBlock(summary, i + 1));
    let batches = packBatches(blocks, options.maxInputChars);
    levels.push(batches.length);
    logger.info(
      `Synthesizing ${summaries.length} summaries in ${batches.length} batch(es) (limit ${options.maxInputChars} chars)`
    );

    let narratives = await settleInOrder(
      batches.map((batch) => request('ReviewSynthesis', synthesisPrompt, batch))
    );

    while (narratives.length > 1) {
      const partials = narratives.map((narrative, i) => `Partial review ${i + 1}:\n${narrative}`);
      batches = packBatches(partials, options.maxInputChars);
      levels.push(batches.length);
      logger.info(`Reducing ${partials.length} partial reviews in ${batches.length} batch(es)`);
      narratives = await settleInOrder(
        batches.map((batch) => request('ReviewReduction', reductionPrompt, batch))
      );
    }

    const narrative = narratives[0];
    if (narrative === undefined) {
      throw new Error('Synthesis produced no narrative');
    }
    return { narrative, calls, levels };
  } catch (error) {
    if (error instanceof RunCancelledError || error instanceof SynthesisError) throw error;
    throw new SynthesisError(`Review synthesis failed: ${toError(error).message}`, { cause: error });
  }
}
