/**
 * Conversation Context Types
 */

import { z } from 'zod';
import type { ConversationTurn } from '../types/index.js';

/**
 * Session history collaborator. Read at context_retrieval, written at context_update.
 */
export interface ContextStore {
  get(userId: string, sessionId: string): Promise<ConversationTurn[]>;
  put(userId: string, sessionId: string, turn: ConversationTurn): Promise<void>;
}

export const CONTEXT_REDIS_KEYS = {
  SESSION_TURNS: (userId: string, sessionId: string) =>
    `care_agent:${userId}:context:${sessionId}`,
} as const;

export const CONTEXT_LIMITS = {
  MAX_TURNS: 50,
  TTL_SECONDS: 24 * 60 * 60, // 24 hours
} as const;

export const conversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
  intent: z
    .enum(['crisis', 'emotional_support', 'medical_question', 'medication_query', 'symptom_description', 'general_inquiry'])
    .optional(),
  safetyLevel: z.enum(['SAFE', 'CAUTION', 'WARNING', 'CRITICAL', 'BLOCKED']).optional(),
});
