import type { ReviewResult } from './types';

export const CITATIONS_HEADER = '## List of Reviewed Papers';

/**
 * Final document: the narrative, then one bullet per citation in review
 * order. Summaries and citations must pair up slot for slot.
 */
export function assembleReview(result: ReviewResult): string {
  if (result.summaries.length !== result.citations.length) {
    throw new Error(
      `Review has ${result.summaries.length} summaries but ${result.citations.length} citations`
    );
  }
  result.summaries.forEach((summary, i) => {
    const citation = result.citations[i];
    if (!citation || citation.documentId !== summary.documentId) {
      throw new Error(`Citation ${i} does not belong to ${summary.documentId}`);
    }
  });

  const lines = result.citations.map((citation) => `- ${citation.text}`);
  return `${result.narrative.trim()}\n\n${CITATIONS_HEADER}\n\n${lines.join('\n')}\n`;
}
