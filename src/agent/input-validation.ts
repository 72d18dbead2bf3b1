import type { UserInput } from '../types/index.js';
import { inputTypeSchema } from '../types/index.js';

/**
 * Problems with the request itself. An empty list means the input is usable.
 */
export function validateInput(input: UserInput, maxLength: number): string[] {
  const errors: string[] = [];

  if (!input.userId?.trim()) {
    errors.push('userId is required');
  }
  if (!input.sessionId?.trim()) {
    errors.push('sessionId is required');
  }
  if (typeof input.content !== 'string' || !input.content.trim()) {
    errors.push('Message content is empty');
  } else if (input.content.length > maxLength) {
    errors.push(`Message exceeds ${maxLength} characters`);
  }
  if (!inputTypeSchema.safeParse(input.inputType).success) {
    errors.push(`Unsupported input type: ${String(input.inputType)}`);
  }

  return errors;
}
