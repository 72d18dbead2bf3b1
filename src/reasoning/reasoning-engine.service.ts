/**
 * Reasoning Engine
 *
 * Builds the prompts, calls the model chosen by ModelRouter and parses the
 * text into reasoning steps and an answer. A provider that reports itself
 * unavailable is excluded and the router is asked again; any other failure,
 * or running out of providers, is a ReasoningFailure.
 */

import type { AgentResponse, ProviderId } from '../types/index.js';
import type { RoutingPolicy, SafetyPolicy } from '../config/policy.js';
import type { ChatMessage, CompletionResult, ProviderRegistry } from '../llm/types.js';
import type { ModelRouter, ModelSelection } from '../llm/model-router.service.js';
import type {
  ProviderAttempt,
  ReasoningContext,
  ReasoningOutput,
  Reasoner,
  ResponseParser,
} from './reasoning.types.js';
import { createCompletion } from '../llm/router.js';
import {
  NoModelAvailableError,
  ProviderUnavailableError,
  ReasoningFailure,
  errorMessage,
} from '../errors/index.js';
import { buildSystemPrompt, buildUserPrompt } from './prompt-builder.js';
import { HeuristicResponseParser } from './response-parser.js';
import { aggregateConfidence } from './confidence.js';
import { extractSafetyWarnings } from './safety-warnings.js';
import logger from '../utils/logger.js';

export interface ReasoningEngineDeps {
  router: ModelRouter;
  providers: ProviderRegistry;
  routing: RoutingPolicy;
  safety: SafetyPolicy;
  parser?: ResponseParser;
}

export class ReasoningEngine implements Reasoner {
  private readonly parser: ResponseParser;

  constructor(private readonly deps: ReasoningEngineDeps) {
    this.parser = deps.parser ?? new HeuristicResponseParser();
  }

  async generate(context: ReasoningContext): Promise<ReasoningOutput> {
    const { router, routing, safety } = this.deps;
    const { analyzedInput, retrieval, traceId } = context;

    const complexity = router.assessComplexity({
      analyzedInput,
      documentCount: retrieval.documents.length,
    });

    const messages: ChatMessage[] = [
      { role: 'system', content: buildSystemPrompt(analyzedInput, routing.criticalUrgency) },
      { role: 'user', content: buildUserPrompt(context) },
    ];

    const attempts: ProviderAttempt[] = [];
    const { selection, result } = await this.complete(complexity, messages, attempts, context);

    if (!result.content.trim()) {
      throw new ReasoningFailure(`Empty response from ${selection.provider}/${selection.model}`);
    }

    const parsed = this.parser.parse(result.content, retrieval.documents);
    const confidenceLevel = aggregateConfidence(
      parsed.steps,
      retrieval.documents,
      analyzedInput.confidence
    );

    const response: AgentResponse = {
      content: parsed.answer,
      citations: retrieval.citations,
      medicalImages: context.medicalImages,
      reasoningSteps: parsed.steps,
      confidenceLevel,
      safetyWarnings: extractSafetyWarnings(parsed.answer, safety.safetyWarningIndicators),
      medicalDisclaimer: safety.medicalDisclaimer,
      metadata: {
        traceId,
        modelProvider: selection.provider,
        modelUsed: result.model,
        complexity,
        temperature: routing.temperature,
        usage: {
          inputTokens: result.inputTokens,
          outputTokens: result.outputTokens,
          totalTokens: result.tokensUsed,
        },
        reasoningStepsCount: parsed.steps.length,
        generatedAt: new Date().toISOString(),
      },
    };

    logger.info('Reasoning generated', {
      traceId,
      provider: selection.provider,
      model: result.model,
      complexity,
      steps: parsed.steps.length,
      confidence: confidenceLevel,
      attempts: attempts.length,
    });

    return { response, steps: parsed.steps, selection, attempts };
  }

  private async complete(
    complexity: ModelSelection['complexity'],
    messages: ChatMessage[],
    attempts: ProviderAttempt[],
    context: ReasoningContext
  ): Promise<{ selection: ModelSelection; result: CompletionResult }> {
    const { router, providers, routing } = this.deps;
    const excluded: ProviderId[] = [];
    let lastFailure: unknown;

    for (;;) {
      let selection: ModelSelection;
      try {
        selection = router.select(complexity, { exclude: excluded });
      } catch (error) {
        if (error instanceof NoModelAvailableError && lastFailure !== undefined) {
          throw new ReasoningFailure('All LLM providers failed', { cause: lastFailure });
        }
        throw new ReasoningFailure(errorMessage(error), { cause: error });
      }

      try {
        const result = await createCompletion(providers, selection.provider, selection.model, messages, {
          temperature: routing.temperature,
          maxTokens: routing.maxTokens,
          signal: context.signal,
        });
        attempts.push({ provider: selection.provider, model: selection.model, success: true });
        return { selection, result };
      } catch (error) {
        attempts.push({
          provider: selection.provider,
          model: selection.model,
          success: false,
          error: errorMessage(error),
        });

        if (context.signal?.aborted) {
          throw error;
        }
        if (!(error instanceof ProviderUnavailableError)) {
          throw new ReasoningFailure(`Completion failed on ${selection.provider}`, { cause: error });
        }

        logger.warn('Provider unavailable, trying fallback', {
          traceId: context.traceId,
          provider: selection.provider,
          model: selection.model,
          error: error.message,
        });
        excluded.push(selection.provider);
        lastFailure = error;
      }
    }
  }
}

export default ReasoningEngine;
