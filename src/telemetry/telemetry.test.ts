import { describe, it, expect, vi } from 'vitest';
import { ProcessingStep, summarizeSteps } from './processing-step.js';
import { buildUsageRecord, countWords, estimateCost } from './usage.js';
import { PostgresTelemetrySink } from './postgres.sink.js';
import { LogTelemetrySink } from './log.sink.js';
import type { Queryable } from '../db/postgres.js';
import type { AgentResponse } from '../types/index.js';

function clock(...isoTimes: string[]): () => Date {
  const times = isoTimes.map((iso) => new Date(iso));
  let index = 0;
  return () => times[Math.min(index++, times.length - 1)] ?? new Date(0);
}

function response(overrides: Partial<AgentResponse> = {}): AgentResponse {
  return {
    content: 'Try a short walk today',
    citations: [],
    medicalImages: [],
    reasoningSteps: [],
    confidenceLevel: 0.7,
    safetyWarnings: [],
    medicalDisclaimer: 'Not medical advice',
    metadata: { modelUsed: 'gemini-test' },
    ...overrides,
  };
}

describe('ProcessingStep', () => {
  it('should time a completed step', () => {
    const step = new ProcessingStep(
      'input_analysis',
      'Analyze input',
      clock('2026-01-01T00:00:00.000Z', '2026-01-01T00:00:00.250Z')
    ).start();

    expect(step.isOpen).toBe(true);
    step.complete(true, undefined, { intent: 'crisis' });

    expect(step.isOpen).toBe(false);
    expect(step.toRecord()).toEqual({
      name: 'input_analysis',
      description: 'Analyze input',
      startTime: '2026-01-01T00:00:00.000Z',
      endTime: '2026-01-01T00:00:00.250Z',
      durationMs: 250,
      success: true,
      metadata: { intent: 'crisis' },
    });
  });

  it('should only complete once', () => {
    const step = new ProcessingStep('safety_assessment', 'Assess', clock('2026-01-01T00:00:00.000Z')).start();

    step.complete(false, 'boom');
    step.complete(true);

    expect(step.success).toBe(false);
    expect(step.error).toBe('boom');
  });

  it('should report zero duration before it ends', () => {
    const step = new ProcessingStep('image_search', 'Images');

    expect(step.durationMs).toBe(0);
    expect(step.isOpen).toBe(false);
  });
});

describe('summarizeSteps', () => {
  it('should count completed and successful steps', () => {
    const ok = new ProcessingStep('input_validation', 'Validate').start();
    ok.complete(true);
    const failed = new ProcessingStep('input_analysis', 'Analyze').start();
    failed.complete(false, 'bad');
    const open = new ProcessingStep('context_retrieval', 'Context').start();

    const summary = summarizeSteps('trace-1', [ok, failed, open], 42, 'aborted');

    expect(summary).toMatchObject({
      traceId: 'trace-1',
      outcome: 'aborted',
      totalDurationMs: 42,
      stepsCompleted: 2,
      stepsSuccessful: 1,
      successRate: 0.5,
    });
    expect(summary.steps.map((step) => step.name)).toEqual(['input_validation', 'input_analysis', 'context_retrieval']);
  });

  it('should report a zero success rate when nothing ran', () => {
    expect(summarizeSteps('trace-2', [], 0, 'completed').successRate).toBe(0);
  });
});

describe('usage', () => {
  it('should count whitespace separated words', () => {
    expect(countWords('  one two\nthree  ')).toBe(3);
    expect(countWords('')).toBe(0);
  });

  it('should estimate cost per thousand tokens', () => {
    expect(estimateCost(2000)).toBeCloseTo(0.002, 10);
  });

  it('should build a usage record from the response', () => {
    const record = buildUsageRecord({
      traceId: 't',
      userId: 'u',
      sessionId: 's',
      inputText: 'I feel low',
      response: response(),
      responseTimeMs: 120,
      intent: 'emotional_support',
    });

    expect(record).toEqual({
      traceId: 't',
      userId: 'u',
      sessionId: 's',
      modelUsed: 'gemini-test',
      tokensUsed: 8,
      responseTimeMs: 120,
      costEstimateUsd: estimateCost(8),
      intent: 'emotional_support',
      safetyLevel: null,
      confidenceLevel: 0.7,
    });
  });
});

describe('PostgresTelemetrySink', () => {
  it('should insert usage and trace rows', async () => {
    const query = vi.fn<Parameters<Queryable['query']>, ReturnType<Queryable['query']>>(async () => ({ rows: [] }));
    const sink = new PostgresTelemetrySink({ query });
    const step = new ProcessingStep('input_validation', 'Validate').start();
    step.complete(true);
    const metadata = summarizeSteps('trace-9', [step], 5, 'completed');

    await sink.recordUsage(
      buildUsageRecord({
        traceId: 'trace-9',
        userId: 'u',
        sessionId: 's',
        inputText: 'hi',
        response: response(),
        responseTimeMs: 5,
      })
    );
    await sink.recordTrace({ userId: 'u', sessionId: 's', metadata });

    expect(query).toHaveBeenCalledTimes(2);
    const [usageSql, usageParams] = query.mock.calls[0] ?? [];
    expect(usageSql).toContain('INSERT INTO usage_metrics');
    expect(usageParams).toEqual(['trace-9', 'u', 's', 'gemini-test', 6, 5, estimateCost(6), null, null, 0.7]);

    const [traceSql, traceParams] = query.mock.calls[1] ?? [];
    expect(traceSql).toContain('ON CONFLICT (trace_id) DO NOTHING');
    expect(traceParams?.slice(0, 8)).toEqual(['trace-9', 'u', 's', 'completed', 5, 1, 1, 1]);
    expect(traceParams?.[8]).toBe(JSON.stringify(metadata.steps));
  });

  it('should propagate database errors', async () => {
    const sink = new PostgresTelemetrySink({ query: async () => Promise.reject(new Error('db down')) });

    await expect(
      sink.recordTrace({ userId: 'u', sessionId: 's', metadata: summarizeSteps('t', [], 0, 'completed') })
    ).rejects.toThrow('db down');
  });
});

describe('LogTelemetrySink', () => {
  it('should resolve after logging a trace', async () => {
    const sink = new LogTelemetrySink(false);

    await expect(sink.recordTrace({ userId: 'u', sessionId: 's', metadata: summarizeSteps('t', [], 0, 'blocked') })).resolves.toBeUndefined();
  });
});
