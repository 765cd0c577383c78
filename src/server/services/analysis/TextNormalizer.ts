import { EmptyInputError } from '../../types/errors.js';

export const DEFAULT_SOFT_LIMIT = 8000;

export interface NormalizedText {
  text: string;
  characterCount: number;
  /** True when prompts will only carry a prefix of the text */
  exceedsSoftLimit: boolean;
}

/**
 * Canonicalize pasted or extracted document text.
 *
 * Strips a leading BOM and NUL characters, folds CRLF/CR to LF and trims.
 * The full text is kept; truncation happens only when a prompt is composed.
 *
 * @throws EmptyInputError when nothing but whitespace remains
 */
export function normalizeText(
  source: string,
  options: { softLimit?: number; field?: string; emptyMessage?: string } = {}
): NormalizedText {
  const { softLimit = DEFAULT_SOFT_LIMIT, field = 'text', emptyMessage } = options;

  const text = source
    .replace(/^\uFEFF/, '')
    .replace(/\u0000/g, '')
    .replace(/\r\n?/g, '\n')
    .trim();

  if (text.length === 0) {
    throw new EmptyInputError(field, emptyMessage);
  }

  return {
    text,
    characterCount: text.length,
    exceedsSoftLimit: text.length > softLimit,
  };
}
