import type { RunReport } from './types';

/** Plain-text end-of-run summary for the operator. */
export function formatRunReport(report: RunReport): string {
  const lines: string[] = [];
  if (report.outputPath) {
    lines.push(`Literature review saved to ${report.outputPath}`);
  } else {
    lines.push(`Review aborted: ${report.failure ?? 'unknown failure'}`);
  }

  lines.push('', `Included papers (${report.included.length}):`);
  for (const documentId of report.included) {
    const note = report.degradedCitations.includes(documentId) ? ' (incomplete citation metadata)' : '';
    lines.push(`  - ${documentId}${note}`);
  }

  lines.push('', `Excluded papers (${report.excluded.length}):`);
  for (const excluded of report.excluded) {
    lines.push(`  - ${excluded.documentId}: [${excluded.errorName}] ${excluded.reason}`);
  }

  lines.push('', `Synthesis requests: ${report.synthesisCalls}`, `Duration: ${(report.durationMs / 1000).toFixed(1)}s`);
  return lines.join('\n');
}
