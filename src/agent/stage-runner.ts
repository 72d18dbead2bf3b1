/**
 * Runs one stage against its timeout and the request's abort signal.
 * The stage's ProcessingStep is always completed, never left open.
 */

import type { ProcessingStep } from '../telemetry/processing-step.js';
import type { StageResult } from './agent.types.js';
import { StageCancelledError, StageTimeoutError, errorMessage, isAgentError } from '../errors/index.js';

export interface StageRunOptions<T> {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Step metadata recorded on success */
  describe?: (value: T) => Record<string, unknown>;
}

export type StageWork<T> = (signal: AbortSignal) => Promise<T> | T;

function abortReason(signal: AbortSignal): string | undefined {
  const { reason } = signal;
  if (reason === undefined) return undefined;
  return errorMessage(reason);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isCancellation(error: Error): boolean {
  return error instanceof StageCancelledError;
}

export async function runStage<T>(
  step: ProcessingStep,
  work: StageWork<T>,
  options: StageRunOptions<T>
): Promise<StageResult<T>> {
  const { timeoutMs, signal: parent } = options;

  if (parent?.aborted) {
    const error = new StageCancelledError(step.name, abortReason(parent));
    step.complete(false, error.message, { cancelled: true });
    return { ok: false, error };
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const outcome = new Promise<T>((resolve, reject) => {
    let settled = false;
    const settle = (finish: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (onAbort) parent?.removeEventListener('abort', onAbort);
      finish();
    };

    timer = setTimeout(() => {
      const error = new StageTimeoutError(step.name, timeoutMs);
      controller.abort(error);
      settle(() => reject(error));
    }, timeoutMs);

    if (parent) {
      onAbort = () => {
        const error = new StageCancelledError(step.name, abortReason(parent));
        controller.abort(error);
        settle(() => reject(error));
      };
      parent.addEventListener('abort', onAbort, { once: true });
    }

    Promise.resolve()
      .then(() => work(controller.signal))
      .then(
        (value) => settle(() => resolve(value)),
        (error: unknown) => settle(() => reject(error))
      );
  });

  try {
    const value = await outcome;
    step.complete(true, undefined, options.describe?.(value) ?? {});
    return { ok: true, value };
  } catch (caught) {
    const error = toError(caught);
    step.complete(false, error.message, {
      ...(isAgentError(error) ? { errorCode: error.code } : {}),
      ...(error instanceof StageCancelledError ? { cancelled: true } : {}),
      ...(error instanceof StageTimeoutError ? { timedOut: true } : {}),
    });
    return { ok: false, error };
  }
}
