export interface GenerationRequest {
  prompt: string;
  maxOutputTokens: number;
  timeoutMs: number;
  /** Ask the service for a JSON-only response. */
  json?: boolean;
  signal?: AbortSignal;
}

/**
 * Remote text generation. Implementations throw RateLimitError, ServiceError
 * or TimeoutError so the retry policy can classify the failure.
 */
export interface TextGenerationService {
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}

/** One service per agent, so each can run against its own model. */
export type TextServices = {
  analysis: TextGenerationService;
  citation: TextGenerationService;
  synthesis: TextGenerationService;
};
