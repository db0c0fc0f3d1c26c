import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { AgentConfig, RetryConfig } from './config';
import {
  AgentExecutionError,
  EmptyResponseError,
  MalformedResponseError,
  RunCancelledError,
  SchemaValidationError,
  toError,
} from './errors';
import type { TextGenerationService } from './textService';
import type { LaneLimiter } from '../utils/limiter';
import { createConsoleLogger, type Logger } from '../utils/logger';
import { withRetry } from '../utils/retry';

export interface AgentDeps {
  service: TextGenerationService;
  limiter: LaneLimiter;
  retry: RetryConfig;
  logger?: Logger;
  signal?: AbortSignal;
}

const defaultLogger = createConsoleLogger('Agent');

function formatValidationErrors(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `- ${path}: ${issue.message}`;
  });
  return `Schema validation errors:\n${issues.join('\n')}`;
}

async function callService<R>(
  agentName: string,
  deps: AgentDeps,
  config: AgentConfig,
  buildPrompt: (attempt: number) => string,
  handleResponse: (text: string) => R,
  json: boolean
): Promise<R> {
  const logger = deps.logger ?? defaultLogger;
  let attempts = 0;
  let responseLength = 0;

  const result = await withRetry(
    async (attempt) => {
      attempts = attempt;
      logger.info(
        `[${agentName}] Attempt ${attempt}/${config.maxAttempts} (model: ${deps.service.model}, maxOutputTokens: ${config.maxTokens}, timeoutMs: ${config.timeoutMs})`
      );
      const responseText = await deps.limiter.limit('text_generation', () =>
        deps.service.generate({
          prompt: buildPrompt(attempt),
          maxOutputTokens: config.maxTokens,
          timeoutMs: config.timeoutMs,
          json,
          signal: deps.signal,
        }),
        deps.signal
      );
      const trimmed = responseText.trim();
      if (!trimmed) {
        throw new EmptyResponseError(agentName);
      }
      responseLength = trimmed.length;
      return handleResponse(trimmed);
    },
    {
      tries: config.maxAttempts,
      baseMs: deps.retry.baseMs,
      maxMs: deps.retry.maxMs,
      label: agentName,
      signal: deps.signal,
      limiter: deps.limiter,
      lane: 'text_generation',
      onRetry: ({ attempt, delayMs, error }) => {
        logger.warn(`[${agentName}] Error on attempt ${attempt} (retrying in ${delayMs}ms)`, {
          error: toError(error).message,
        });
      },
    }
  );

  logger.info(`[${agentName}] Success on attempt ${attempts} (${responseLength} chars)`);
  return result;
}

function wrapFailure(agentName: string, error: unknown, attempts: number): Error {
  if (error instanceof RunCancelledError) {
    return error;
  }
  if (error instanceof MalformedResponseError && error.validationErrors) {
    return new SchemaValidationError(agentName, error.validationErrors, attempts);
  }
  return new AgentExecutionError(agentName, toError(error), Math.max(attempts, 1));
}

/**
 * Single free-text request. Returns the trimmed response; never an empty
 * string.
 */
export async function runTextAgent(
  agentName: string,
  systemPrompt: string,
  userMessage: string,
  config: AgentConfig,
  deps: AgentDeps
): Promise<string> {
  const fullPrompt = `${systemPrompt}\n\nUser input:\n${userMessage}`;
  let attempts = 0;
  try {
    return await callService(
      agentName,
      deps,
      config,
      (attempt) => {
        attempts = attempt;
        return fullPrompt;
      },
      (text) => text,
      false
    );
  } catch (error) {
    throw wrapFailure(agentName, error, attempts);
  }
}

/**
 * JSON request validated against `schema`. Parse and validation failures
 * are retried inside the same attempt budget, with the previous errors fed
 * back into the prompt.
 */
export async function runJsonAgent<T>(
  agentName: string,
  systemPrompt: string,
  userMessage: string,
  schema: z.ZodType<T>,
  config: AgentConfig,
  deps: AgentDeps
): Promise<T> {
  const jsonSchema = JSON.stringify(zodToJsonSchema(schema, { target: 'openApi3' }));
  let lastError: MalformedResponseError | null = null;
  let attempts = 0;

  const buildPrompt = (attempt: number): string => {
    attempts = attempt;
    let enhancedUserMessage = `${userMessage}\n\nRespond with JSON matching this schema:\n${jsonSchema}`;
    if (attempt > 1 && lastError) {
      const feedback = lastError.validationErrors
        ? formatValidationErrors(lastError.validationErrors)
        : 'Previous response could not be parsed (likely truncation or invalid JSON).';
      enhancedUserMessage = `${enhancedUserMessage}\n\n${feedback}\n\nPlease fix these errors and return valid JSON only.`;
    }
    return `${systemPrompt}\n\nUser input:\n${enhancedUserMessage}`;
  };

  const handleResponse = (text: string): T => {
    let jsonData: unknown;
    try {
      jsonData = JSON.parse(stripCodeFence(text));
    } catch (parseError) {
      lastError = new MalformedResponseError(agentName, toError(parseError).message);
      throw lastError;
    }
    const validationResult = schema.safeParse(jsonData);
    if (!validationResult.success) {
      lastError = new MalformedResponseError(
        agentName,
        'schema validation failed',
        validationResult.error
      );
      throw lastError;
    }
    return validationResult.data;
  };

  try {
    return await callService(agentName, deps, config, buildPrompt, handleResponse, true);
  } catch (error) {
    throw wrapFailure(agentName, error, attempts);
  }
}

function stripCodeFence(text: string): string {
  const fenced = text.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return fenced?.[1] ?? text;
}
