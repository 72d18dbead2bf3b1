import type { Queryable } from '../db/postgres.js';
import type { TelemetrySink, TraceRecord, UsageRecord } from './telemetry.types.js';

/**
 * Persists usage metrics and processing traces (see db/migrations/002_telemetry.sql).
 */
export class PostgresTelemetrySink implements TelemetrySink {
  constructor(private readonly db: Queryable) {}

  async recordUsage(record: UsageRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO usage_metrics
         (trace_id, user_id, session_id, model_used, tokens_used, response_time_ms,
          cost_estimate, intent, safety_level, confidence_level)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        record.traceId,
        record.userId,
        record.sessionId,
        record.modelUsed,
        record.tokensUsed,
        record.responseTimeMs,
        record.costEstimateUsd,
        record.intent,
        record.safetyLevel,
        record.confidenceLevel,
      ]
    );
  }

  async recordTrace({ userId, sessionId, metadata }: TraceRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO processing_traces
         (trace_id, user_id, session_id, outcome, total_duration_ms, steps_completed,
          steps_successful, success_rate, steps)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (trace_id) DO NOTHING`,
      [
        metadata.traceId,
        userId,
        sessionId,
        metadata.outcome,
        metadata.totalDurationMs,
        metadata.stepsCompleted,
        metadata.stepsSuccessful,
        metadata.successRate,
        JSON.stringify(metadata.steps),
      ]
    );
  }
}

export default PostgresTelemetrySink;
