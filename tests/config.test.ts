import { describe, it, expect } from '@jest/globals';
import { loadReviewConfig } from '../src/agents/config';

describe('loadReviewConfig', () => {
  it('applies defaults', () => {
    const config = loadReviewConfig({ GOOGLE_API_KEY: 'test-key' });

    expect(config.apiKey).toBe('test-key');
    expect(config.models).toEqual({
      analysis: 'gemini-2.5-flash',
      citation: 'gemini-2.5-flash',
      synthesis: 'gemini-2.5-pro',
    });
    expect(config.analysis).toEqual({ maxAttempts: 3, timeoutMs: 60000, maxTokens: 2000 });
    expect(config.synthesis.timeoutMs).toBe(120000);
    expect(config.documentConcurrency).toBe(4);
    expect(config.llmConcurrency).toBe(2);
    expect(config.synthesisMaxInputChars).toBe(60000);
  });

  it('reads overrides from the environment', () => {
    const config = loadReviewConfig({
      GOOGLE_API_KEY: 'test-key',
      SYNTHESIS_MODEL: 'gemini-2.5-flash',
      LLM_MAX_ATTEMPTS: '5',
      GEMINI_LLM_CONCURRENCY: '1',
      SYNTHESIS_MAX_INPUT_CHARS: '2000',
    });

    expect(config.models.synthesis).toBe('gemini-2.5-flash');
    expect(config.citation.maxAttempts).toBe(5);
    expect(config.llmConcurrency).toBe(1);
    expect(config.synthesisMaxInputChars).toBe(2000);
  });

  it('requires an API key', () => {
    expect(() => loadReviewConfig({})).toThrow('GOOGLE_API_KEY environment variable is not set');
  });

  it('rejects non-numeric limits', () => {
    expect(() => loadReviewConfig({ GOOGLE_API_KEY: 'test-key', LLM_TIMEOUT_MS: 'soon' })).toThrow(
      'LLM_TIMEOUT_MS must be a positive number, got "soon"'
    );
  });
});
