import { describe, it, expect } from 'vitest';
import { ConversationCompressor } from './conversation-compressor.js';
import type { ConversationTurn } from '../types/index.js';

function turn(minute: number, content: string, role: ConversationTurn['role'] = 'user'): ConversationTurn {
  return { role, content, timestamp: `2026-01-01T10:${String(minute).padStart(2, '0')}:00.000Z` };
}

describe('ConversationCompressor', () => {
  const compressor = new ConversationCompressor();

  it('should return an empty string for no history', () => {
    expect(compressor.compress([])).toBe('');
  });

  it('should quote recent turns and summarise older ones', () => {
    const history = [
      turn(4, 'Thanks, that helps.'),
      turn(0, 'I am worried about my job. It is a lot'),
      turn(1, 'I feel hopeless some days', 'user'),
      turn(2, 'That sounds hard.', 'assistant'),
      turn(3, 'Yes it is', 'user'),
    ];

    expect(compressor.compress(history)).toBe(
      [
        'Previous conversation themes: anxiety, work_stress',
        'Key concerns discussed: my job',
        'Crisis situations mentioned: hopeless',
        'Recent conversation:',
        'assistant: That sounds hard. [2026-01-01T10:02:00.000Z]',
        'user: Yes it is [2026-01-01T10:03:00.000Z]',
        'user: Thanks, that helps. [2026-01-01T10:04:00.000Z]',
      ].join('\n')
    );
  });

  it('should truncate long turns and the whole summary', () => {
    const small = new ConversationCompressor({ maxLength: 40, maxTurnLength: 10 });

    const result = small.compress([turn(0, 'a'.repeat(50))]);

    expect(result).toBe(`Recent conversation:\nuser: ${'a'.repeat(10)} [2...`);
    expect(result).toHaveLength(43);
  });
});
