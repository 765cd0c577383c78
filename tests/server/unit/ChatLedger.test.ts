import { describe, it, expect } from 'vitest';
import { ChatLedger } from '../../../src/server/services/analysis/ChatLedger.js';
import type { QuestionAnswerRecord } from '../../../src/server/services/analysis/types.js';

function record(question: string): QuestionAnswerRecord {
  return {
    question,
    answer: `Answer to ${question}`,
    relevant_sections: ['Section 1'],
    confidence_level: 'medium',
    timestamp: '2024-05-01T12:00:00.000Z',
  };
}

describe('ChatLedger', () => {
  it('returns entries oldest first', () => {
    const ledger = new ChatLedger();
    ledger.append(record('first'));
    ledger.append(record('second'));

    expect(ledger.readAll().map(entry => entry.question)).toEqual(['first', 'second']);
    expect(ledger.size).toBe(2);
  });

  it('does not let callers change stored entries', () => {
    const ledger = new ChatLedger();
    const input = record('q');
    ledger.append(input);
    input.relevant_sections.push('mutated');

    const [entry] = ledger.readAll();
    entry.answer = 'changed';
    entry.relevant_sections.push('also mutated');

    expect(ledger.readAll()).toEqual([record('q')]);
  });

  it('is empty after clear', () => {
    const ledger = new ChatLedger();
    ledger.append(record('q'));
    ledger.clear();

    expect(ledger.readAll()).toEqual([]);
    expect(ledger.size).toBe(0);
  });
});
