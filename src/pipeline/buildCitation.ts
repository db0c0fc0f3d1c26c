import type { AgentConfig } from '../agents/config';
import { CitationError, RunCancelledError, toError } from '../agents/errors';
import { CITATION_PROMPT } from '../agents/prompts';
import { runJsonAgent, type AgentDeps } from '../agents/runAgent';
import { CitationMetadataSchema, type CitationMetadataOutput } from '../agents/schemas';
import { formatApaCitation } from '../utils/apa';
import { cleanText, truncate } from '../utils/text';
import type { Citation, Document, PaperMetadata } from './types';

export interface CitationOptions {
  config: AgentConfig;
  maxChars: number;
}

export interface CitationBuild {
  citation: Citation;
  metadata: PaperMetadata;
  error?: CitationError;
}

function fromModel(output: CitationMetadataOutput): PaperMetadata {
  const title = output.title ? cleanText(output.title) : '';
  const authors = output.authors.map((author) => cleanText(author)).filter(Boolean);
  return {
    ...(title ? { title } : {}),
    ...(authors.length > 0 ? { authors } : {}),
    ...(output.year !== null ? { year: output.year } : {}),
  };
}

/** Field-wise merge; earlier sources win. */
export function mergeMetadata(...sources: Array<PaperMetadata | undefined>): PaperMetadata {
  const merged: PaperMetadata = {};
  for (const source of sources) {
    if (!source) continue;
    if (merged.title === undefined && source.title) merged.title = source.title;
    if (merged.authors === undefined && source.authors && source.authors.length > 0) {
      merged.authors = source.authors;
    }
    if (merged.year === undefined && source.year !== undefined) merged.year = source.year;
  }
  return merged;
}

/**
 * Builds the APA citation for one document. Metadata comes from the model
 * first and the PDF info dictionary second; whatever is still missing is
 * filled by placeholders. A failed metadata request is returned as `error`
 * alongside a degraded citation, never thrown.
 */
export async function buildCitation(
  document: Document,
  options: CitationOptions,
  deps: AgentDeps
): Promise<CitationBuild> {
  let modelMetadata: PaperMetadata | undefined;
  let citationError: CitationError | undefined;

  if (document.text.trim()) {
    try {
      const output = await runJsonAgent(
        'CitationMetadata',
        CITATION_PROMPT,
        `Filename: ${document.id}\n\nOpening text:\n${truncate(document.text, options.maxChars)}`,
        CitationMetadataSchema,
        options.config,
        deps
      );
      modelMetadata = fromModel(output);
    } catch (error) {
      if (error instanceof RunCancelledError) throw error;
      citationError = new CitationError(document.id, toError(error));
    }
  }

  const metadata = mergeMetadata(modelMetadata, document.metadata);
  const apa = formatApaCitation(metadata, document.id);
  return {
    citation: {
      index: document.index,
      documentId: document.id,
      text: apa.text,
      degraded: apa.degraded,
    },
    metadata,
    ...(citationError ? { error: citationError } : {}),
  };
}
