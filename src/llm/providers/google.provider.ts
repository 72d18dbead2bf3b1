import { z } from 'zod';
import { config } from '../../config/index.js';
import { ProviderUnavailableError, errorMessage } from '../../errors/index.js';
import type { ChatMessage, CompletionOptions, CompletionResult, ProviderModule } from '../types.js';
import { isRetryableStatus } from '../types.js';
import logger from '../../utils/logger.js';

const BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

interface GeminiContent {
  role: 'user' | 'model';
  parts: { text: string }[];
}

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

export interface GoogleProviderSettings {
  apiKey: string;
  baseUrl?: string;
}

function convertMessages(messages: ChatMessage[]): { contents: GeminiContent[]; systemInstruction?: { parts: { text: string }[] } } {
  const systemMessages = messages.filter(m => m.role === 'system');
  const chatMessages = messages.filter(m => m.role !== 'system');

  const contents: GeminiContent[] = chatMessages.map(m => ({
    role: m.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: m.content }],
  }));

  const result: { contents: GeminiContent[]; systemInstruction?: { parts: { text: string }[] } } = { contents };

  if (systemMessages.length > 0) {
    result.systemInstruction = {
      parts: [{ text: systemMessages.map(m => m.content).join('\n\n') }],
    };
  }

  return result;
}

/**
 * Gemini generateContent over fetch.
 */
export function createGoogleProvider(
  settings: GoogleProviderSettings = { apiKey: config.google.apiKey }
): ProviderModule {
  const baseUrl = settings.baseUrl ?? BASE_URL;

  async function createCompletion(
    model: string,
    messages: ChatMessage[],
    options: CompletionOptions = {}
  ): Promise<CompletionResult> {
    const { contents, systemInstruction } = convertMessages(messages);

    let response: Response;
    try {
      response = await fetch(
        `${baseUrl}/models/${model}:generateContent?key=${settings.apiKey}`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({
            contents,
            systemInstruction,
            generationConfig: {
              temperature: options.temperature ?? 0.3,
              maxOutputTokens: options.maxTokens,
            },
          }),
          signal: options.signal,
        }
      );
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      logger.error('Google AI request failed', { error: errorMessage(error), model });
      throw new ProviderUnavailableError('google', 'Google AI request failed', { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      logger.error('Google AI completion failed', { status: response.status, model });
      const message = `Google AI completion failed: ${response.status} ${errorText}`;
      if (isRetryableStatus(response.status)) {
        throw new ProviderUnavailableError('google', message);
      }
      throw new Error(message);
    }

    const parsed = geminiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      logger.error('Google AI returned an unexpected response', { model, issues: parsed.error.issues.length });
      throw new Error('Google AI returned an unexpected response');
    }
    const data = parsed.data;
    const parts = data.candidates?.[0]?.content?.parts ?? [];

    return {
      content: parts.map(part => part.text ?? '').join(''),
      tokensUsed: data.usageMetadata?.totalTokenCount ?? 0,
      inputTokens: data.usageMetadata?.promptTokenCount,
      outputTokens: data.usageMetadata?.candidatesTokenCount,
      model,
      provider: 'google',
    };
  }

  return {
    createCompletion,
    isConfigured: () => !!settings.apiKey,
  };
}
