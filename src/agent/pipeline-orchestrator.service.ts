/**
 * Pipeline Orchestrator
 *
 * Drives the ten stages of one request strictly in order:
 * input_validation -> input_analysis -> context_retrieval -> safety_assessment ->
 * knowledge_retrieval -> image_search -> reasoning_generation -> safety_validation ->
 * response_formatting -> context_update
 *
 * - Hard stages (validation, analysis, safety assessment, reasoning, formatting) abort with an error response
 * - Soft stages fall back to an empty value and the request continues
 * - A BLOCKED verdict returns the crisis response and skips everything after stage 4
 * - Cancellation is always a hard abort
 *
 * process() never throws.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AgentResponse,
  AnalyzedInput,
  ComplianceSummary,
  ConversationTurn,
  MedicalImage,
  ProviderId,
  RetrievalResult,
  SafetyVerdict,
  StageName,
  UserInput,
} from '../types/index.js';
import { EMPTY_RETRIEVAL_RESULT, PIPELINE_STAGES } from '../types/index.js';
import type { PolicyConfig } from '../config/policy.js';
import type { AgentErrorCode } from '../errors/index.js';
import { ValidationError, errorMessage, isAgentError } from '../errors/index.js';
import type { InputAnalyzer } from '../analysis/input-analysis.service.js';
import type { SafetyGate } from '../safety/safety-gate.service.js';
import type { Reasoner } from '../reasoning/reasoning.types.js';
import type { KnowledgeSource } from '../retrieval/retrieval.types.js';
import type { ImageSource } from '../images/image-search.service.js';
import type { ContextStore } from '../context/context.types.js';
import { ConversationCompressor } from '../context/conversation-compressor.js';
import type { PipelineOutcome, ProcessingMetadata, TelemetrySink } from '../telemetry/telemetry.types.js';
import { ProcessingStep, summarizeSteps } from '../telemetry/processing-step.js';
import { buildUsageRecord } from '../telemetry/usage.js';
import type {
  Capability,
  PipelineHooks,
  PipelineStatus,
  ProcessOptions,
  ProcessResult,
  StageResult,
} from './agent.types.js';
import { absent } from './agent.types.js';
import { isCancellation, runStage, type StageWork } from './stage-runner.js';
import { errorResponse } from './responses.js';
import { validateInput } from './input-validation.js';
import logger from '../utils/logger.js';

const STAGE_DESCRIPTIONS: Record<StageName, string> = {
  input_validation: 'Validate user input',
  input_analysis: 'Analyze intent, entities and urgency',
  context_retrieval: 'Load conversation history',
  safety_assessment: 'Assess input safety',
  knowledge_retrieval: 'Search medical knowledge base',
  image_search: 'Find relevant medical images',
  reasoning_generation: 'Generate reasoned response',
  safety_validation: 'Validate and enhance response safety',
  response_formatting: 'Attach processing metadata',
  context_update: 'Store conversation turn',
};

export interface PipelineDeps {
  policy: PolicyConfig;
  analyzer: InputAnalyzer;
  safetyGate: SafetyGate;
  reasoner: Reasoner;
  knowledge?: Capability<KnowledgeSource>;
  images?: Capability<ImageSource>;
  context?: Capability<ContextStore>;
  telemetry?: Capability<TelemetrySink>;
  compressor?: ConversationCompressor;
  /** Providers reported by status() */
  providers?: () => ProviderId[];
  hooks?: PipelineHooks;
  now?: () => Date;
  newTraceId?: () => string;
}

/**
 * Per-request state. Never shared between requests.
 */
interface RequestRun {
  traceId: string;
  input: UserInput;
  startedAt: number;
  steps: ProcessingStep[];
  signal?: AbortSignal;
  analyzed?: AnalyzedInput;
  verdict?: SafetyVerdict;
}

interface ValidatedResponse {
  response: AgentResponse;
  summary?: ComplianceSummary;
}

/** Hard-stage failure carried to the top-level handler */
class PipelineAbort {
  constructor(
    readonly stage: StageName,
    readonly error: Error
  ) {}
}

export class PipelineOrchestrator {
  private readonly knowledge: Capability<KnowledgeSource>;
  private readonly images: Capability<ImageSource>;
  private readonly context: Capability<ContextStore>;
  private readonly telemetry: Capability<TelemetrySink>;
  private readonly compressor: ConversationCompressor;
  private readonly now: () => Date;
  private readonly newTraceId: () => string;

  constructor(private readonly deps: PipelineDeps) {
    this.knowledge = deps.knowledge ?? absent();
    this.images = deps.images ?? absent();
    this.context = deps.context ?? absent();
    this.telemetry = deps.telemetry ?? absent();
    this.compressor = deps.compressor ?? new ConversationCompressor();
    this.now = deps.now ?? (() => new Date());
    this.newTraceId = deps.newTraceId ?? uuidv4;
  }

  async process(input: UserInput, options: ProcessOptions = {}): Promise<ProcessResult> {
    const run: RequestRun = {
      traceId: this.newTraceId(),
      input,
      startedAt: this.now().getTime(),
      steps: [],
      signal: options.signal,
    };

    logger.info('Pipeline started', {
      traceId: run.traceId,
      userId: input.userId,
      sessionId: input.sessionId,
    });

    try {
      return await this.execute(run);
    } catch (caught) {
      if (caught instanceof PipelineAbort) {
        return this.abort(run, caught);
      }

      logger.error('Unexpected pipeline failure', { traceId: run.traceId, error: errorMessage(caught) });
      for (const step of run.steps) {
        if (step.isOpen) step.complete(false, errorMessage(caught));
      }
      return this.finish(run, this.failure(run, 'INTERNAL_ERROR'), 'aborted');
    }
  }

  status(): PipelineStatus {
    return {
      stages: [...PIPELINE_STAGES],
      capabilities: {
        knowledge: this.knowledge.present,
        images: this.images.present,
        context: this.context.present,
        telemetry: this.telemetry.present,
      },
      providers: this.deps.providers?.() ?? [],
    };
  }

  private async execute(run: RequestRun): Promise<ProcessResult> {
    const { policy, analyzer, safetyGate, reasoner } = this.deps;
    const { input } = run;

    // 1. input_validation
    await this.hard(run, 'input_validation', () => {
      const errors = validateInput(input, policy.pipeline.maxInputLength);
      if (errors.length > 0) {
        throw new ValidationError(errors);
      }
      return input;
    });

    // 2. input_analysis
    const analyzed = await this.hard(run, 'input_analysis', () => analyzer.analyze(input), (value) => ({
      intent: value.intent,
      urgencyLevel: value.urgencyLevel,
      entityCount: value.medicalEntities.length,
      confidence: value.confidence,
    }));
    run.analyzed = analyzed;

    // 3. context_retrieval
    const context = this.context;
    const compressedHistory = context.present
      ? await this.soft(run, 'context_retrieval', '', async () => {
          const turns = await context.value.get(input.userId, input.sessionId);
          return this.compressor.compress(turns);
        }, (history) => ({ historyLength: history.length }))
      : this.skip(run, 'context_retrieval', '');

    // 4. safety_assessment
    const verdict = await this.hard(run, 'safety_assessment', () => safetyGate.assessInput(input, analyzed), (value) => ({
      safetyLevel: value.level,
      concernCount: value.concerns.length,
    }));
    run.verdict = verdict;

    if (verdict.level === 'BLOCKED') {
      logger.warn('Request blocked by safety assessment', {
        traceId: run.traceId,
        userId: input.userId,
        concerns: verdict.concerns,
      });
      return this.finish(run, safetyGate.crisisResponse(verdict.concerns, run.traceId), 'blocked');
    }

    // 5. knowledge_retrieval
    const knowledge = this.knowledge;
    const retrieval: RetrievalResult = knowledge.present
      ? await this.soft(run, 'knowledge_retrieval', EMPTY_RETRIEVAL_RESULT, (signal) =>
          knowledge.value.search(analyzed.text, { signal }), (value) => ({
          documentCount: value.documents.length,
          citationCount: value.citations.length,
        }))
      : this.skip(run, 'knowledge_retrieval', EMPTY_RETRIEVAL_RESULT);

    // 6. image_search
    const images = this.images;
    const medicalImages: MedicalImage[] = images.present
      ? await this.soft<MedicalImage[]>(run, 'image_search', [], (signal) => this.searchImages(images.value, analyzed, signal), (value) => ({
          imageCount: value.length,
        }))
      : this.skip(run, 'image_search', []);

    // 7. reasoning_generation
    const reasoning = await this.hard(run, 'reasoning_generation', (signal) =>
      reasoner.generate({
        traceId: run.traceId,
        input,
        analyzedInput: analyzed,
        retrieval,
        medicalImages,
        compressedHistory,
        signal,
      }), (value) => ({
      provider: value.selection.provider,
      model: value.selection.model,
      complexity: value.selection.complexity,
      reasoningSteps: value.steps.length,
      providerAttempts: value.attempts.length,
    }));

    // 8. safety_validation
    const enhanced = safetyGate.enhance(reasoning.response, verdict.level);
    const validated = await this.soft<ValidatedResponse>(
      run,
      'safety_validation',
      { response: enhanced },
      () => {
        const checks = safetyGate.validateResponse(reasoning.response, verdict.level);
        const summary = safetyGate.summarize(checks);
        if (!summary.overallSafe) {
          logger.warn('Response failed compliance checks', {
            traceId: run.traceId,
            failedChecks: summary.failedChecks,
          });
        }
        return { response: enhanced, summary };
      },
      (value) => ({
        overallSafe: value.summary?.overallSafe,
        complianceRate: value.summary?.complianceRate,
      })
    );

    // 9. response_formatting
    const response = await this.hard(run, 'response_formatting', (): AgentResponse => ({
      ...validated.response,
      metadata: {
        ...validated.response.metadata,
        traceId: run.traceId,
        processingTimeMs: this.elapsed(run),
        safetyLevel: verdict.level,
        ...(validated.summary ? { complianceSummary: validated.summary } : {}),
      },
    }));

    // 10. context_update
    if (context.present) {
      await this.soft<void>(run, 'context_update', undefined, async () => {
        const timestamp = this.now().toISOString();
        const userTurn: ConversationTurn = {
          role: 'user',
          content: input.content,
          timestamp,
          intent: analyzed.intent,
          safetyLevel: verdict.level,
        };
        const assistantTurn: ConversationTurn = {
          role: 'assistant',
          content: response.content,
          timestamp,
        };
        await context.value.put(input.userId, input.sessionId, userTurn);
        await context.value.put(input.userId, input.sessionId, assistantTurn);
      });
    } else {
      this.skip(run, 'context_update', undefined);
    }

    return this.finish(run, response, 'completed');
  }

  private async searchImages(
    source: ImageSource,
    analyzed: AnalyzedInput,
    signal: AbortSignal
  ): Promise<MedicalImage[]> {
    const { imageQueryEntities, imageMaxResults, imageMinRelevance } = this.deps.policy.pipeline;
    const found = new Map<string, MedicalImage>();

    for (const entity of analyzed.medicalEntities.slice(0, imageQueryEntities)) {
      const images = await source.search(entity, {
        maxResults: imageMaxResults,
        minRelevance: imageMinRelevance,
        signal,
      });
      for (const image of images) {
        if (!found.has(image.url)) found.set(image.url, image);
      }
    }

    return [...found.values()];
  }

  private startStep(run: RequestRun, stage: StageName): ProcessingStep {
    const step = new ProcessingStep(stage, STAGE_DESCRIPTIONS[stage], this.now).start();
    run.steps.push(step);
    this.deps.hooks?.onStageStart?.(stage, run.traceId);
    return step;
  }

  private async runStep<T>(
    run: RequestRun,
    stage: StageName,
    work: StageWork<T>,
    describe?: (value: T) => Record<string, unknown>
  ): Promise<StageResult<T>> {
    const step = this.startStep(run, stage);
    const result = await runStage(step, work, {
      timeoutMs: this.deps.policy.pipeline.stageTimeoutsMs[stage],
      signal: run.signal,
      describe,
    });
    this.deps.hooks?.onStageEnd?.(stage, run.traceId, result.ok, step.durationMs);
    return result;
  }

  private async hard<T>(
    run: RequestRun,
    stage: StageName,
    work: StageWork<T>,
    describe?: (value: T) => Record<string, unknown>
  ): Promise<T> {
    const result = await this.runStep(run, stage, work, describe);
    if (!result.ok) {
      throw new PipelineAbort(stage, result.error);
    }
    return result.value;
  }

  private async soft<T>(
    run: RequestRun,
    stage: StageName,
    fallback: T,
    work: StageWork<T>,
    describe?: (value: T) => Record<string, unknown>
  ): Promise<T> {
    const result = await this.runStep(run, stage, work, describe);
    if (result.ok) {
      return result.value;
    }

    if (isCancellation(result.error)) {
      throw new PipelineAbort(stage, result.error);
    }

    logger.warn('Stage degraded, continuing', {
      traceId: run.traceId,
      stage,
      error: result.error.message,
    });
    return fallback;
  }

  /**
   * Records a stage whose capability is absent as a successful no-op.
   */
  private skip<T>(run: RequestRun, stage: StageName, value: T): T {
    const step = this.startStep(run, stage);
    step.complete(true, undefined, { skipped: true });
    this.deps.hooks?.onStageEnd?.(stage, run.traceId, true, step.durationMs);
    return value;
  }

  private abort(run: RequestRun, { stage, error }: PipelineAbort): ProcessResult {
    const code: AgentErrorCode = isAgentError(error) ? error.code : 'INTERNAL_ERROR';

    logger.error('Pipeline aborted', {
      traceId: run.traceId,
      stage,
      code,
      error: error.message,
    });

    const errors = error instanceof ValidationError ? error.errors : undefined;
    return this.finish(run, this.failure(run, code, errors), 'aborted');
  }

  private failure(run: RequestRun, code: AgentErrorCode, errors?: readonly string[]): AgentResponse {
    return errorResponse({
      code,
      traceId: run.traceId,
      medicalDisclaimer: this.deps.safetyGate.medicalDisclaimer,
      processingTimeMs: this.elapsed(run),
      errors,
    });
  }

  private finish(run: RequestRun, response: AgentResponse, outcome: PipelineOutcome): ProcessResult {
    const totalDurationMs = this.elapsed(run);
    const metadata = summarizeSteps(run.traceId, run.steps, totalDurationMs, outcome);

    logger.info('Pipeline finished', {
      traceId: run.traceId,
      outcome,
      totalDurationMs,
      stepsCompleted: metadata.stepsCompleted,
      stepsSuccessful: metadata.stepsSuccessful,
      confidence: response.confidenceLevel,
    });

    this.emitTelemetry(run, response, metadata);
    return { response, metadata };
  }

  private emitTelemetry(run: RequestRun, response: AgentResponse, metadata: ProcessingMetadata): void {
    if (!this.telemetry.present) {
      return;
    }
    const sink = this.telemetry.value;
    const { input, traceId } = run;

    const usage = buildUsageRecord({
      traceId,
      userId: input.userId,
      sessionId: input.sessionId,
      inputText: typeof input.content === 'string' ? input.content : '',
      response,
      responseTimeMs: metadata.totalDurationMs,
      intent: run.analyzed?.intent,
      safetyLevel: run.verdict?.level,
    });

    sink.recordUsage(usage).catch((error: unknown) => {
      logger.warn('Failed to record usage', { traceId, error: errorMessage(error) });
    });
    sink.recordTrace({ userId: input.userId, sessionId: input.sessionId, metadata }).catch((error: unknown) => {
      logger.warn('Failed to record processing trace', { traceId, error: errorMessage(error) });
    });
  }

  private elapsed(run: RequestRun): number {
    return this.now().getTime() - run.startedAt;
  }
}

export default PipelineOrchestrator;
