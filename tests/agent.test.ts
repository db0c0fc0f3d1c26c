import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import {
  AgentExecutionError,
  RunCancelledError,
  SchemaValidationError,
  ServiceError,
} from '../src/agents/errors';
import { runJsonAgent, runTextAgent } from '../src/agents/runAgent';
import { CitationMetadataSchema } from '../src/agents/schemas';
import { agentDeps, FakeTextService, testAgentConfig } from './utils/testHelpers';

describe('runTextAgent', () => {
  it('sends the system prompt and user input and trims the response', async () => {
    const service = new FakeTextService(() => '\n  A summary.  \n');

    const text = await runTextAgent('PaperAnalysis', 'SYSTEM', 'paper text', testAgentConfig, agentDeps(service));

    expect(text).toBe('A summary.');
    expect(service.requests).toHaveLength(1);
    expect(service.requests[0]?.prompt).toBe('SYSTEM\n\nUser input:\npaper text');
    expect(service.requests[0]?.json).toBe(false);
    expect(service.requests[0]?.maxOutputTokens).toBe(500);
  });

  it('retries an empty response', async () => {
    const service = new FakeTextService((_, call) => (call === 1 ? '   ' : 'second try'));

    const text = await runTextAgent('PaperAnalysis', 'SYSTEM', 'paper text', testAgentConfig, agentDeps(service));

    expect(text).toBe('second try');
    expect(service.calls).toBe(2);
  });

  it('wraps a permanent failure without retrying', async () => {
    const service = new FakeTextService(() => {
      throw new ServiceError('API key not valid', 400);
    });

    const failure = runTextAgent('PaperAnalysis', 'SYSTEM', 'paper text', testAgentConfig, agentDeps(service));

    await expect(failure).rejects.toBeInstanceOf(AgentExecutionError);
    await expect(failure).rejects.toMatchObject({ agent: 'PaperAnalysis', attempts: 1 });
    expect(service.calls).toBe(1);
  });

  it('gives up after the configured attempts', async () => {
    const service = new FakeTextService(() => {
      throw new ServiceError('unavailable', 503);
    });

    const failure = runTextAgent('PaperAnalysis', 'SYSTEM', 'paper text', testAgentConfig, agentDeps(service));

    await expect(failure).rejects.toMatchObject({ name: 'AgentExecutionError', attempts: 3 });
    expect(service.calls).toBe(3);
  });

  it('passes cancellation through unwrapped', async () => {
    const controller = new AbortController();
    controller.abort();
    const service = new FakeTextService(() => 'unused');

    const failure = runTextAgent(
      'PaperAnalysis',
      'SYSTEM',
      'paper text',
      testAgentConfig,
      agentDeps(service, controller.signal)
    );

    await expect(failure).rejects.toBeInstanceOf(RunCancelledError);
    expect(service.calls).toBe(0);
  });
});

describe('runJsonAgent', () => {
  it('parses and validates JSON, including fenced output', async () => {
    const service = new FakeTextService(
      () => '```json\n{"title": "Sleep and memory", "authors": ["Jane Doe"], "year": 2019}\n```'
    );

    const result = await runJsonAgent(
      'CitationMetadata',
      'SYSTEM',
      'front matter',
      CitationMetadataSchema,
      testAgentConfig,
      agentDeps(service)
    );

    expect(result).toEqual({ title: 'Sleep and memory', authors: ['Jane Doe'], year: 2019 });
    expect(service.requests[0]?.json).toBe(true);
    expect(service.requests[0]?.prompt).toContain('Respond with JSON matching this schema:');
  });

  it('feeds validation errors back into the next attempt', async () => {
    const service = new FakeTextService((_, call) =>
      call === 1 ? '{"title": 5, "authors": [], "year": null}' : '{"title": null, "authors": [], "year": null}'
    );

    const result = await runJsonAgent(
      'CitationMetadata',
      'SYSTEM',
      'front matter',
      CitationMetadataSchema,
      testAgentConfig,
      agentDeps(service)
    );

    expect(result).toEqual({ title: null, authors: [], year: null });
    expect(service.calls).toBe(2);
    expect(service.requests[1]?.prompt).toContain('Schema validation errors:\n- title:');
  });

  it('tells the model when the previous response was not JSON', async () => {
    const service = new FakeTextService((_, call) => (call === 1 ? 'Sure! Here it is' : '{"ok": true}'));

    const result = await runJsonAgent(
      'Check',
      'SYSTEM',
      'input',
      z.object({ ok: z.boolean() }),
      testAgentConfig,
      agentDeps(service)
    );

    expect(result).toEqual({ ok: true });
    expect(service.requests[1]?.prompt).toContain('Previous response could not be parsed');
  });

  it('raises SchemaValidationError when every attempt is invalid', async () => {
    const service = new FakeTextService(() => '{"title": 5}');

    const failure = runJsonAgent(
      'CitationMetadata',
      'SYSTEM',
      'front matter',
      CitationMetadataSchema,
      testAgentConfig,
      agentDeps(service)
    );

    await expect(failure).rejects.toBeInstanceOf(SchemaValidationError);
    await expect(failure).rejects.toMatchObject({ attempts: 3 });
    expect(service.calls).toBe(3);
  });
});
