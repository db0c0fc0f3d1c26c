import { describe, it, expect } from '@jest/globals';
import { AnalysisError, ServiceError } from '../src/agents/errors';
import { analyzePaper, buildAnalysisMessage } from '../src/pipeline/analyzePaper';
import type { Document } from '../src/pipeline/types';
import { agentDeps, FakeTextService, testAgentConfig } from './utils/testHelpers';

const document: Document = {
  index: 2,
  id: 'sleep.pdf',
  path: '/papers/sleep.pdf',
  text: 'We study the effect of sleep on memory consolidation in 40 adults.',
};

describe('analyzePaper', () => {
  it('returns the trimmed summary for its document', async () => {
    const service = new FakeTextService(() => '\nResearch Question: Does sleep help memory?\n');

    const summary = await analyzePaper(document, { config: testAgentConfig, maxChars: 1000 }, agentDeps(service));

    expect(summary).toEqual({
      index: 2,
      documentId: 'sleep.pdf',
      summary: 'Research Question: Does sleep help memory?',
    });
    expect(service.requests[0]?.prompt).toContain('Filename: sleep.pdf');
    expect(service.requests[0]?.prompt).toContain(document.text);
  });

  it('truncates long document text', () => {
    expect(buildAnalysisMessage(document, 8)).toBe('Filename: sleep.pdf\n\nText:\nWe study');
  });

  it('carries PDF metadata onto the summary', async () => {
    const service = new FakeTextService(() => 'summary');
    const withMetadata: Document = { ...document, metadata: { year: 2019 } };

    const summary = await analyzePaper(withMetadata, { config: testAgentConfig, maxChars: 1000 }, agentDeps(service));

    expect(summary.metadata).toEqual({ year: 2019 });
  });

  it('refuses empty text without calling the service', async () => {
    const service = new FakeTextService(() => 'unused');

    await expect(
      analyzePaper({ ...document, text: '  ' }, { config: testAgentConfig, maxChars: 1000 }, agentDeps(service))
    ).rejects.toBeInstanceOf(AnalysisError);
    expect(service.calls).toBe(0);
  });

  it('reports service failures as AnalysisError for the document', async () => {
    const service = new FakeTextService(() => {
      throw new ServiceError('unavailable', 503);
    });

    const failure = analyzePaper(document, { config: testAgentConfig, maxChars: 1000 }, agentDeps(service));

    await expect(failure).rejects.toBeInstanceOf(AnalysisError);
    await expect(failure).rejects.toMatchObject({ documentId: 'sleep.pdf' });
    expect(service.calls).toBe(3);
  });
});
