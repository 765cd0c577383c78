import { describe, it, expect } from 'vitest';
import { normalizeText, DEFAULT_SOFT_LIMIT } from '../../../src/server/services/analysis/TextNormalizer.js';
import { EmptyInputError } from '../../../src/server/types/errors.js';

describe('normalizeText', () => {
  it('strips BOM and NUL characters, folds line endings and trims', () => {
    const result = normalizeText('\uFEFF  First line\r\nSecond\u0000 line\rThird line \n');

    expect(result.text).toBe('First line\nSecond line\nThird line');
    expect(result.characterCount).toBe(33);
    expect(result.exceedsSoftLimit).toBe(false);
  });

  it('keeps the full text when it exceeds the soft limit', () => {
    const result = normalizeText('abcdef', { softLimit: 5 });

    expect(result.text).toBe('abcdef');
    expect(result.exceedsSoftLimit).toBe(true);
    expect(normalizeText('abcde', { softLimit: 5 }).exceedsSoftLimit).toBe(false);
  });

  it('defaults the soft limit to 8000 characters', () => {
    expect(DEFAULT_SOFT_LIMIT).toBe(8000);
    expect(normalizeText('x'.repeat(8001)).exceedsSoftLimit).toBe(true);
  });

  it('rejects whitespace-only input', () => {
    expect(() => normalizeText(' \n\t\r\n ')).toThrow(EmptyInputError);
    expect(() => normalizeText('\uFEFF\u0000')).toThrow('text is required and cannot be blank');
  });

  it('names the field and message in the error', () => {
    try {
      normalizeText('   ', { field: 'question', emptyMessage: 'Question is required' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EmptyInputError);
      if (error instanceof EmptyInputError) {
        expect(error.message).toBe('Question is required');
        expect(error.statusCode).toBe(400);
        expect(error.context).toEqual({ field: 'question' });
      }
    }
  });
});
