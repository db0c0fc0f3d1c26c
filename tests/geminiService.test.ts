import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import {
  GoogleGenerativeAIAbortError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import {
  classifyError,
  EmptyResponseError,
  RateLimitError,
  RunCancelledError,
  ServiceError,
  TimeoutError,
} from '../src/agents/errors';
import { GeminiTextService, translateGeminiError } from '../src/services/geminiService';

type GenerateOptions = { signal?: AbortSignal };
type GenerateResult = { response: { text: () => string } };

const mockGenerateContent = jest.fn<(request: unknown, options?: GenerateOptions) => Promise<GenerateResult>>();

jest.mock('@google/generative-ai', () => {
  const actual = jest.requireActual<typeof import('@google/generative-ai')>('@google/generative-ai');
  class GoogleGenerativeAI {
    getGenerativeModel() {
      return {
        generateContent: (request: unknown, options?: GenerateOptions) => mockGenerateContent(request, options),
      };
    }
  }
  return { ...actual, GoogleGenerativeAI };
});

function respondWith(text: string): GenerateResult {
  return { response: { text: () => text } };
}

describe('translateGeminiError', () => {
  it('maps 429 to a rate limit carrying the server retry delay', () => {
    const error = translateGeminiError(
      new GoogleGenerativeAIFetchError('quota exceeded', 429, 'Too Many Requests', [
        { '@type': 'type.googleapis.com/google.rpc.RetryInfo', retryDelay: '7s' },
      ])
    );

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error instanceof RateLimitError ? error.retryAfterMs : undefined).toBe(7000);
  });

  it('leaves the retry delay unset when the server gives none', () => {
    const error = translateGeminiError(new GoogleGenerativeAIFetchError('quota exceeded', 429));
    expect(error instanceof RateLimitError ? error.retryAfterMs : 'not a rate limit').toBeUndefined();
  });

  it('keeps server errors transient and client errors permanent', () => {
    const unavailable = translateGeminiError(new GoogleGenerativeAIFetchError('unavailable', 503));
    expect(unavailable).toBeInstanceOf(ServiceError);
    expect(classifyError(unavailable)).toBe('transient');

    const badRequest = translateGeminiError(new GoogleGenerativeAIFetchError('API key not valid', 400));
    expect(badRequest).toBeInstanceOf(ServiceError);
    expect(classifyError(badRequest)).toBe('permanent');
  });

  it('treats blocked responses as permanent', () => {
    const error = translateGeminiError(new GoogleGenerativeAIResponseError('Candidate was blocked due to SAFETY'));
    expect(error).toBeInstanceOf(ServiceError);
    expect(classifyError(error)).toBe('permanent');
  });

  it('maps aborted requests to cancellation', () => {
    expect(translateGeminiError(new GoogleGenerativeAIAbortError('aborted'))).toBeInstanceOf(RunCancelledError);
  });
});

describe('GeminiTextService', () => {
  beforeEach(() => {
    mockGenerateContent.mockReset();
  });

  it('returns the response text', async () => {
    mockGenerateContent.mockResolvedValue(respondWith('A summary'));
    const service = new GeminiTextService('test-key', 'gemini-test');

    await expect(service.generate({ prompt: 'Summarize', maxOutputTokens: 100, timeoutMs: 1000 })).resolves.toBe(
      'A summary'
    );
  });

  it('rejects a blank response', async () => {
    mockGenerateContent.mockResolvedValue(respondWith('  \n'));
    const service = new GeminiTextService('test-key', 'gemini-test');

    await expect(
      service.generate({ prompt: 'Summarize', maxOutputTokens: 100, timeoutMs: 1000 })
    ).rejects.toBeInstanceOf(EmptyResponseError);
  });

  it('times out and aborts the pending request', async () => {
    mockGenerateContent.mockImplementation(
      (_request, options) =>
        new Promise((_, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new GoogleGenerativeAIAbortError('aborted')));
        })
    );
    const service = new GeminiTextService('test-key', 'gemini-test');

    await expect(
      service.generate({ prompt: 'Summarize', maxOutputTokens: 100, timeoutMs: 20 })
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(mockGenerateContent.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);
  });

  it('reports cancellation when the run is aborted mid-request', async () => {
    mockGenerateContent.mockImplementation(
      (_request, options) =>
        new Promise((_, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new GoogleGenerativeAIAbortError('aborted')));
        })
    );
    const controller = new AbortController();
    const service = new GeminiTextService('test-key', 'gemini-test');
    const pending = service.generate({
      prompt: 'Summarize',
      maxOutputTokens: 100,
      timeoutMs: 1000,
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });
});
