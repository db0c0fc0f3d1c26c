import {
  GoogleGenerativeAI,
  GoogleGenerativeAIAbortError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
  type GenerativeModel,
} from '@google/generative-ai';
import {
  EmptyResponseError,
  RateLimitError,
  RunCancelledError,
  ServiceError,
  TimeoutError,
} from '../agents/errors';
import type { AgentModels } from '../agents/config';
import type { GenerationRequest, TextGenerationService, TextServices } from '../agents/textService';

function parseRetryDelay(error: GoogleGenerativeAIFetchError): number | undefined {
  for (const detail of error.errorDetails ?? []) {
    const delay = 'retryDelay' in detail ? detail.retryDelay : undefined;
    if (typeof delay === 'string') {
      const seconds = parseFloat(delay);
      if (Number.isFinite(seconds)) return Math.ceil(seconds * 1000);
    }
  }
  return undefined;
}

export function translateGeminiError(error: unknown): Error {
  if (error instanceof GoogleGenerativeAIAbortError) {
    return new RunCancelledError('text generation');
  }
  if (error instanceof GoogleGenerativeAIFetchError) {
    if (error.status === 429) {
      return new RateLimitError(error.message, parseRetryDelay(error));
    }
    return new ServiceError(error.message, error.status, { cause: error });
  }
  if (error instanceof GoogleGenerativeAIResponseError) {
    // Blocked or malformed candidates do not improve on retry.
    return new ServiceError(error.message, 400, { cause: error });
  }
  if (error instanceof Error) {
    return error;
  }
  return new ServiceError(String(error));
}

export class GeminiTextService implements TextGenerationService {
  private ai: GoogleGenerativeAI;
  private generativeModel: GenerativeModel;

  constructor(
    apiKey: string,
    public readonly model: string
  ) {
    this.ai = new GoogleGenerativeAI(apiKey);
    this.generativeModel = this.ai.getGenerativeModel({ model });
  }

  async generate(request: GenerationRequest): Promise<string> {
    // Aborted on timeout and on run cancellation.
    const controller = new AbortController();
    const onRunAbort = () => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener('abort', onRunAbort, { once: true });
    }

    const apiCall = this.generativeModel.generateContent(
      {
        contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
        generationConfig: {
          maxOutputTokens: request.maxOutputTokens,
          temperature: request.json ? 0.0 : 0.4,
          ...(request.json ? { responseMimeType: 'application/json' } : {}),
        },
      },
      { signal: controller.signal }
    );

    let timeoutHandle: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        reject(new TimeoutError(this.model, request.timeoutMs));
        controller.abort();
      }, request.timeoutMs);
    });

    try {
      const result = await Promise.race([apiCall, timeoutPromise]);
      const text = result.response.text();
      if (!text.trim()) {
        throw new EmptyResponseError(this.model);
      }
      return text;
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof EmptyResponseError) {
        throw error;
      }
      throw translateGeminiError(error);
    } finally {
      clearTimeout(timeoutHandle);
      request.signal?.removeEventListener('abort', onRunAbort);
      // The aborted SDK call still rejects after the race is settled.
      apiCall.catch(() => undefined);
    }
  }
}

export function createTextServices(apiKey: string, models: AgentModels): TextServices {
  return {
    analysis: new GeminiTextService(apiKey, models.analysis),
    citation: new GeminiTextService(apiKey, models.citation),
    synthesis: new GeminiTextService(apiKey, models.synthesis),
  };
}
