import type { TelemetrySink, TraceRecord, UsageRecord } from './telemetry.types.js';
import logger from '../utils/logger.js';

/**
 * Writes telemetry to the application log.
 */
export class LogTelemetrySink implements TelemetrySink {
  constructor(private readonly detailed: boolean = true) {}

  async recordUsage(record: UsageRecord): Promise<void> {
    logger.info('Usage metrics', { ...record });
  }

  async recordTrace({ userId, sessionId, metadata }: TraceRecord): Promise<void> {
    logger.info('Pipeline trace', {
      traceId: metadata.traceId,
      userId,
      sessionId,
      outcome: metadata.outcome,
      totalDurationMs: metadata.totalDurationMs,
      stepsCompleted: metadata.stepsCompleted,
      successRate: metadata.successRate,
      ...(this.detailed
        ? { steps: metadata.steps.map((step) => ({ name: step.name, success: step.success, durationMs: step.durationMs, error: step.error })) }
        : {}),
    });
  }
}

export default LogTelemetrySink;
