import { describe, it, expect, vi } from 'vitest';
import { runStage, isCancellation } from './stage-runner.js';
import { ProcessingStep } from '../telemetry/processing-step.js';
import { AnalysisError, StageCancelledError, StageTimeoutError } from '../errors/index.js';

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

describe('runStage', () => {
  it('should record success with described metadata', async () => {
    const step = new ProcessingStep('input_analysis', 'Analyze').start();

    const result = await runStage(step, async () => 'done', {
      timeoutMs: 1000,
      describe: (value) => ({ length: value.length }),
    });

    expect(result).toEqual({ ok: true, value: 'done' });
    expect(step.success).toBe(true);
    expect(step.metadata).toEqual({ length: 4 });
  });

  it('should accept synchronous work', async () => {
    const step = new ProcessingStep('input_validation', 'Validate').start();

    expect(await runStage(step, () => 7, { timeoutMs: 1000 })).toEqual({ ok: true, value: 7 });
  });

  it('should record thrown errors with their code', async () => {
    const step = new ProcessingStep('input_analysis', 'Analyze').start();

    const result = await runStage(
      step,
      () => {
        throw new AnalysisError('cannot analyze');
      },
      { timeoutMs: 1000 }
    );

    expect(result.ok).toBe(false);
    expect(step.error).toBe('cannot analyze');
    expect(step.metadata).toEqual({ errorCode: 'ANALYSIS_ERROR' });
  });

  it('should wrap non-Error rejections', async () => {
    const step = new ProcessingStep('image_search', 'Images').start();

    const result = await runStage(step, () => Promise.reject('plain'), { timeoutMs: 1000 });

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.message).toBe('plain');
  });

  it('should time out and abort the work', async () => {
    const step = new ProcessingStep('reasoning_generation', 'Reason').start();
    let workSignal: AbortSignal | undefined;

    const result = await runStage(
      step,
      (signal) => {
        workSignal = signal;
        return untilAborted(signal);
      },
      { timeoutMs: 10 }
    );

    expect(result.ok ? undefined : result.error).toBeInstanceOf(StageTimeoutError);
    expect(step.error).toBe('Stage reasoning_generation timed out after 10ms');
    expect(step.metadata).toEqual({ errorCode: 'STAGE_TIMEOUT', timedOut: true });
    expect(workSignal?.aborted).toBe(true);
  });

  it('should cancel when the caller aborts mid-stage', async () => {
    const step = new ProcessingStep('knowledge_retrieval', 'Search').start();
    const controller = new AbortController();

    const result = await runStage(
      step,
      (signal) => {
        controller.abort();
        return untilAborted(signal);
      },
      { timeoutMs: 1000, signal: controller.signal }
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StageCancelledError);
      expect(isCancellation(result.error)).toBe(true);
    }
    expect(step.metadata).toMatchObject({ cancelled: true, errorCode: 'STAGE_CANCELLED' });
  });

  it('should not start work for an already aborted request', async () => {
    const step = new ProcessingStep('context_retrieval', 'Context').start();
    const controller = new AbortController();
    controller.abort();
    const work = vi.fn(() => 'never');

    const result = await runStage(step, work, { timeoutMs: 1000, signal: controller.signal });

    expect(work).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
    expect(step.metadata).toEqual({ cancelled: true });
    expect(isCancellation(new Error('other'))).toBe(false);
  });
});
