export type AgentConfig = {
  maxAttempts: number;
  timeoutMs: number;
  maxTokens: number;
};

export type AgentModels = {
  analysis: string;
  citation: string;
  synthesis: string;
};

export type RetryConfig = {
  baseMs: number;
  maxMs: number;
};

export interface ReviewConfig {
  apiKey: string;
  models: AgentModels;
  analysis: AgentConfig;
  citation: AgentConfig;
  synthesis: AgentConfig;
  retry: RetryConfig;
  documentConcurrency: number;
  llmConcurrency: number;
  analysisMaxChars: number;
  citationMaxChars: number;
  synthesisMaxInputChars: number;
  reviewWordLimit: number;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: string): number {
  const value = Number(env[key] || fallback);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${key} must be a positive number, got "${env[key]}"`);
  }
  return value;
}

export function loadReviewConfig(env: Env = process.env): ReviewConfig {
  const apiKey = env.GOOGLE_API_KEY || '';
  if (!apiKey) {
    throw new Error('GOOGLE_API_KEY environment variable is not set');
  }

  const maxAttempts = Math.floor(readNumber(env, 'LLM_MAX_ATTEMPTS', '3'));
  const timeoutMs = readNumber(env, 'LLM_TIMEOUT_MS', '60000');

  return {
    apiKey,
    models: {
      analysis: env.ANALYSIS_MODEL || 'gemini-2.5-flash',
      citation: env.CITATION_MODEL || 'gemini-2.5-flash',
      synthesis: env.SYNTHESIS_MODEL || 'gemini-2.5-pro',
    },
    analysis: { maxAttempts, timeoutMs, maxTokens: 2000 },
    citation: { maxAttempts, timeoutMs, maxTokens: 512 },
    synthesis: { maxAttempts, timeoutMs: timeoutMs * 2, maxTokens: 8000 },
    retry: {
      baseMs: readNumber(env, 'LLM_RETRY_BASE_MS', '1000'),
      maxMs: readNumber(env, 'LLM_RETRY_MAX_MS', '60000'),
    },
    documentConcurrency: Math.floor(readNumber(env, 'REVIEW_DOCUMENT_CONCURRENCY', '4')),
    llmConcurrency: Math.floor(readNumber(env, 'GEMINI_LLM_CONCURRENCY', '2')),
    analysisMaxChars: Math.floor(readNumber(env, 'ANALYSIS_MAX_CHARS', '12000')),
    citationMaxChars: Math.floor(readNumber(env, 'CITATION_MAX_CHARS', '4000')),
    synthesisMaxInputChars: Math.floor(readNumber(env, 'SYNTHESIS_MAX_INPUT_CHARS', '60000')),
    reviewWordLimit: Math.floor(readNumber(env, 'REVIEW_WORD_LIMIT', '2500')),
  };
}
