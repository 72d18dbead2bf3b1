/**
 * Model Router
 *
 * Maps a complexity tier to a (provider, model) pair. The preferred provider
 * is tried first, then the alternate. Selection depends only on the tier,
 * the availability table and the exclusion list, so repeated calls agree.
 */

import type { AnalyzedInput, Complexity, ProviderId } from '../types/index.js';
import type { RoutingPolicy } from '../config/policy.js';
import { NoModelAvailableError } from '../errors/index.js';
import { PROVIDER_IDS } from './types.js';
import { findPhrases, toMatchable } from '../utils/text-normalizer.js';
import logger from '../utils/logger.js';

export interface ModelSelection {
  provider: ProviderId;
  model: string;
  complexity: Complexity;
}

export interface ComplexityInputs {
  analyzedInput: AnalyzedInput;
  documentCount: number;
}

export interface SelectOptions {
  /** Providers that already failed for this request */
  exclude?: readonly ProviderId[];
}

export class ModelRouter {
  private readonly availability = new Map<ProviderId, boolean>();

  constructor(
    private readonly policy: RoutingPolicy,
    availability: Partial<Record<ProviderId, boolean>> = {}
  ) {
    for (const provider of PROVIDER_IDS) {
      this.availability.set(provider, availability[provider] ?? false);
    }
  }

  /**
   * Critical conditions are checked first, then complex, else simple.
   */
  assessComplexity({ analyzedInput, documentCount }: ComplexityInputs): Complexity {
    if (analyzedInput.urgencyLevel >= this.policy.criticalUrgency) {
      return 'critical';
    }

    if (findPhrases(toMatchable(analyzedInput.text), this.policy.complexityCrisisKeywords).length > 0) {
      return 'critical';
    }

    if (
      analyzedInput.medicalEntities.length > this.policy.complexEntityCount ||
      documentCount > this.policy.complexDocumentCount
    ) {
      return 'complex';
    }

    return 'simple';
  }

  select(complexity: Complexity, options: SelectOptions = {}): ModelSelection {
    const exclude = options.exclude ?? [];

    for (const provider of this.fallbackChain()) {
      if (!this.isAvailable(provider) || exclude.includes(provider)) {
        continue;
      }
      const model = this.policy.modelTiers[provider][complexity];
      logger.debug('Model selected', { provider, model, complexity });
      return { provider, model, complexity };
    }

    throw new NoModelAvailableError(
      exclude.length > 0
        ? `No LLM provider available after excluding ${exclude.join(', ')}`
        : undefined
    );
  }

  setAvailability(provider: ProviderId, available: boolean): void {
    if (this.availability.get(provider) !== available) {
      logger.info('Provider availability changed', { provider, available });
    }
    this.availability.set(provider, available);
  }

  isAvailable(provider: ProviderId): boolean {
    return this.availability.get(provider) ?? false;
  }

  availableProviders(): ProviderId[] {
    return this.fallbackChain().filter((provider) => this.isAvailable(provider));
  }

  private fallbackChain(): ProviderId[] {
    const preferred = this.policy.preferredProvider;
    return [preferred, ...PROVIDER_IDS.filter((provider) => provider !== preferred)];
  }
}

export default ModelRouter;
