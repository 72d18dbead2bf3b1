import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { Config } from './index.js';
import type { Complexity, ProviderId, StageName } from '../types/index.js';

/**
 * Safety, routing and retrieval policy.
 *
 * Components receive a frozen PolicyConfig at construction time instead of
 * reading shared tables, so tests can build alternates with createPolicyConfig().
 */

const safetyLexiconSchema = z.object({
  crisisKeywords: z.array(z.string()).min(1),
  selfHarmPatterns: z.array(z.string()).min(1),
  imminencePatterns: z.array(z.string()),
  substanceKeywords: z.array(z.string()),
  harmfulResponsePatterns: z.array(z.string()),
  diagnosticPhrases: z.array(z.string()),
  referralPhrases: z.array(z.string()),
  emergencyPhrases: z.array(z.string()),
  disclaimerIndicators: z.array(z.string()),
  complexityCrisisKeywords: z.array(z.string()),
  safetyWarningIndicators: z.array(z.string()),
  crisisResources: z.object({
    crisisHotlines: z.array(z.string()).min(1),
    emergencyServices: z.array(z.string()).min(1),
    professionalHelp: z.array(z.string()).min(1),
  }),
  medicalDisclaimer: z.string().min(1),
});

export type SafetyLexicon = z.infer<typeof safetyLexiconSchema>;

export function dataFilePath(name: string): string {
  return fileURLToPath(new URL(`../../data/${name}`, import.meta.url));
}

export function loadSafetyLexicon(path = dataFilePath('safety-lexicon.json')): SafetyLexicon {
  return safetyLexiconSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

export interface CrisisResources {
  readonly crisisHotlines: readonly string[];
  readonly emergencyServices: readonly string[];
  readonly professionalHelp: readonly string[];
}

export interface SafetyPolicy {
  readonly crisisKeywords: readonly string[];
  readonly selfHarmPatterns: readonly string[];
  readonly imminencePatterns: readonly string[];
  readonly substanceKeywords: readonly string[];
  readonly harmfulResponsePatterns: readonly string[];
  readonly diagnosticPhrases: readonly string[];
  readonly referralPhrases: readonly string[];
  readonly emergencyPhrases: readonly string[];
  readonly disclaimerIndicators: readonly string[];
  readonly safetyWarningIndicators: readonly string[];
  readonly crisisResources: CrisisResources;
  readonly medicalDisclaimer: string;
  /** Urgency at or above this raises a WARNING on input */
  readonly warningUrgency: number;
  /** Upper bound on confidence for WARNING and CRITICAL responses */
  readonly crisisConfidenceCap: number;
  readonly complianceConfidenceRange: { readonly min: number; readonly max: number };
}

export interface RetrievalWeights {
  readonly similarity: number;
  readonly sourceReliability: number;
  readonly documentType: number;
  readonly recency: number;
  readonly queryRelevance: number;
  readonly citationQuality: number;
}

export interface RetrievalPolicy {
  readonly confidenceThreshold: number;
  readonly maxResults: number;
  readonly cacheTtlSeconds: number;
  readonly weights: RetrievalWeights;
  readonly sourceReliability: Readonly<Record<string, number>>;
  readonly defaultSourceReliability: number;
  readonly documentTypeWeights: Readonly<Record<string, number>>;
  readonly defaultDocumentTypeWeight: number;
}

export type ModelTiers = Readonly<Record<ProviderId, Readonly<Record<Complexity, string>>>>;

export interface RoutingPolicy {
  readonly preferredProvider: ProviderId;
  readonly modelTiers: ModelTiers;
  /** Urgency at or above this is routed as critical */
  readonly criticalUrgency: number;
  readonly complexityCrisisKeywords: readonly string[];
  readonly complexEntityCount: number;
  readonly complexDocumentCount: number;
  readonly temperature: number;
  readonly maxTokens: number;
}

export interface PipelinePolicy {
  readonly maxInputLength: number;
  readonly stageTimeoutsMs: Readonly<Record<StageName, number>>;
  readonly imageQueryEntities: number;
  readonly imageMaxResults: number;
  readonly imageMinRelevance: number;
}

export interface PolicyConfig {
  readonly safety: SafetyPolicy;
  readonly retrieval: RetrievalPolicy;
  readonly routing: RoutingPolicy;
  readonly pipeline: PipelinePolicy;
}

export interface PolicyOverrides {
  safety?: Partial<SafetyPolicy>;
  retrieval?: Partial<RetrievalPolicy>;
  routing?: Partial<RoutingPolicy>;
  pipeline?: Partial<Omit<PipelinePolicy, 'stageTimeoutsMs'>> & {
    stageTimeoutsMs?: Partial<Record<StageName, number>>;
  };
}

const DEFAULT_STAGE_TIMEOUTS_MS: Record<StageName, number> = {
  input_validation: 1000,
  input_analysis: 5000,
  context_retrieval: 3000,
  safety_assessment: 5000,
  knowledge_retrieval: 10000,
  image_search: 5000,
  reasoning_generation: 60000,
  safety_validation: 5000,
  response_formatting: 1000,
  context_update: 3000,
};

const DEFAULT_MODEL_TIERS: ModelTiers = {
  google: {
    simple: 'gemini-1.5-flash',
    complex: 'gemini-1.5-pro',
    critical: 'gemini-1.5-pro',
  },
  openai: {
    simple: 'gpt-4o-mini',
    complex: 'gpt-4o-mini',
    critical: 'gpt-4-turbo',
  },
};

function defaultPolicy(lexicon: SafetyLexicon): PolicyConfig {
  return {
    safety: {
      crisisKeywords: lexicon.crisisKeywords,
      selfHarmPatterns: lexicon.selfHarmPatterns,
      imminencePatterns: lexicon.imminencePatterns,
      substanceKeywords: lexicon.substanceKeywords,
      harmfulResponsePatterns: lexicon.harmfulResponsePatterns,
      diagnosticPhrases: lexicon.diagnosticPhrases,
      referralPhrases: lexicon.referralPhrases,
      emergencyPhrases: lexicon.emergencyPhrases,
      disclaimerIndicators: lexicon.disclaimerIndicators,
      safetyWarningIndicators: lexicon.safetyWarningIndicators,
      crisisResources: lexicon.crisisResources,
      medicalDisclaimer: lexicon.medicalDisclaimer,
      warningUrgency: 9,
      crisisConfidenceCap: 0.8,
      complianceConfidenceRange: { min: 0.3, max: 0.9 },
    },
    retrieval: {
      confidenceThreshold: 0.7,
      maxResults: 5,
      cacheTtlSeconds: 3600,
      weights: {
        similarity: 0.4,
        sourceReliability: 0.2,
        documentType: 0.15,
        recency: 0.1,
        queryRelevance: 0.1,
        citationQuality: 0.05,
      },
      sourceReliability: {
        pubmed: 1.0,
        who: 0.95,
        cdc: 0.9,
        nih: 0.9,
        mayo_clinic: 0.8,
        webmd: 0.6,
        manual: 0.5,
        unknown: 0.3,
      },
      defaultSourceReliability: 0.5,
      documentTypeWeights: {
        research_paper: 1.0,
        clinical_guideline: 0.95,
        fact_sheet: 0.8,
        article: 0.7,
        document: 0.6,
      },
      defaultDocumentTypeWeight: 0.8,
    },
    routing: {
      preferredProvider: 'google',
      modelTiers: DEFAULT_MODEL_TIERS,
      criticalUrgency: 8,
      complexityCrisisKeywords: lexicon.complexityCrisisKeywords,
      complexEntityCount: 3,
      complexDocumentCount: 5,
      temperature: 0.3,
      maxTokens: 2000,
    },
    pipeline: {
      maxInputLength: 10000,
      stageTimeoutsMs: DEFAULT_STAGE_TIMEOUTS_MS,
      imageQueryEntities: 3,
      imageMaxResults: 2,
      imageMinRelevance: 0.5,
    },
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

let cachedLexicon: SafetyLexicon | null = null;

function defaultLexicon(): SafetyLexicon {
  if (!cachedLexicon) {
    cachedLexicon = loadSafetyLexicon();
  }
  return cachedLexicon;
}

/**
 * Build an immutable policy. Overrides replace whole fields within a section;
 * stage timeouts merge per stage.
 */
export function createPolicyConfig(
  overrides: PolicyOverrides = {},
  lexicon: SafetyLexicon = defaultLexicon()
): PolicyConfig {
  // structuredClone so freezing never touches the shared lexicon
  const base = defaultPolicy(structuredClone(lexicon));
  const { stageTimeoutsMs, ...pipelineOverrides } = overrides.pipeline ?? {};

  return deepFreeze({
    safety: { ...base.safety, ...overrides.safety },
    retrieval: { ...base.retrieval, ...overrides.retrieval },
    routing: { ...base.routing, ...overrides.routing },
    pipeline: {
      ...base.pipeline,
      ...pipelineOverrides,
      stageTimeoutsMs: { ...base.pipeline.stageTimeoutsMs, ...stageTimeoutsMs },
    },
  });
}

/**
 * Policy overrides carried by environment configuration.
 */
export function policyOverridesFromConfig(config: Config): PolicyOverrides {
  return {
    retrieval: {
      confidenceThreshold: config.agent.confidenceThreshold,
      maxResults: config.agent.maxResults,
      cacheTtlSeconds: config.agent.cacheTtlSeconds,
    },
    routing: {
      preferredProvider: config.agent.preferredProvider,
      temperature: config.agent.temperature,
      maxTokens: config.agent.maxTokens,
    },
  };
}

export default {
  createPolicyConfig,
  policyOverridesFromConfig,
  loadSafetyLexicon,
};
