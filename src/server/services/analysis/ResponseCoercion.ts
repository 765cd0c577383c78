/**
 * Response Coercion Engine
 *
 * Forces free-form completion text into one of the fixed response shapes.
 * Candidates are produced by an ordered list of pure extraction steps; the
 * first candidate that parses to an object and passes the shape's schema wins.
 * When none does, the shape's deterministic fallback is returned, so `coerce`
 * never throws.
 */

import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { CONFIDENCE_LEVELS } from './types.js';
import type { DocumentAnalysis, QuestionAnswer } from './types.js';

export const RAW_EXCERPT_LENGTH = 500;

export type ExtractionMethod = 'direct' | 'balanced_object' | 'stripped_wrappers';
export type CoercionMethod = ExtractionMethod | 'fallback';

export interface ExtractionStep {
  readonly method: ExtractionMethod;
  readonly extract: (raw: string) => string | null;
}

export interface TargetShape<T> {
  readonly kind: 'analysis' | 'qa_answer';
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  readonly fallback: (rawExcerpt: string) => T;
}

export interface CoercionResult<T> {
  value: T;
  method: CoercionMethod;
  /** Top-level fields that were missing or mistyped in the last parsed candidate */
  missingFields: string[];
}

export type ShapeValidation<T> =
  | { ok: true; value: T }
  | { ok: false; missingFields: string[]; issues: string[] };

// ---------------------------------------------------------------------------
// Extraction steps
// ---------------------------------------------------------------------------

/**
 * Step 1: the whole response as JSON.
 */
export function parseDirect(raw: string): string | null {
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Step 2: the first balanced `{...}` object, string-aware. If the braces never
 * balance, the span from the first `{` to the last `}`.
 */
export function extractBalancedObject(raw: string): string | null {
  const start = raw.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escapeNext = false;
  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];
    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (inString) {
      if (ch === '\\') {
        escapeNext = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth += 1;
    } else if (ch === '}') {
      depth -= 1;
      if (depth === 0) {
        return raw.slice(start, i + 1);
      }
    }
  }

  const end = raw.lastIndexOf('}');
  return end > start ? raw.slice(start, end + 1) : null;
}

/**
 * Remove a surrounding markdown code fence, closed or not.
 */
export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(/```(?:json|JSON)?[ \t]*\r?\n?([\s\S]*?)```/);
  if (fenced && typeof fenced[1] === 'string') {
    return fenced[1].trim();
  }
  const opening = trimmed.match(/```(?:json|JSON)?[ \t]*\r?\n?([\s\S]*)$/);
  if (opening && typeof opening[1] === 'string') {
    return opening[1].trim();
  }
  return trimmed;
}

interface TokenState {
  stack: Array<'{' | '['>;
  inString: boolean;
}

/**
 * Walk `text`, calling `visit` for every character outside a JSON string.
 * Returns whether the text ended inside an open string.
 */
function walkStructural(text: string, visit: (ch: string, index: number) => void): boolean {
  let inString = false;
  let escapeNext = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (inString) {
      if (ch === '\\') {
        escapeNext = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
      continue;
    }
    visit(ch, i);
  }
  return inString;
}

function scanTokens(text: string): TokenState {
  const stack: Array<'{' | '['> = [];
  const inString = walkStructural(text, ch => {
    if (ch === '{' || ch === '[') {
      stack.push(ch);
    } else if (ch === '}' || ch === ']') {
      const expected = ch === '}' ? '{' : '[';
      if (stack[stack.length - 1] === expected) stack.pop();
    }
  });
  return { stack, inString };
}

/**
 * Drop commas that directly precede a closing bracket. Commas inside strings
 * are content and stay.
 */
export function dropTrailingCommas(text: string): string {
  const dropped = new Set<number>();
  walkStructural(text, (ch, index) => {
    if (ch === ',' && /^\s*[}\]]/.test(text.slice(index + 1))) {
      dropped.add(index);
    }
  });
  if (dropped.size === 0) return text;
  return text
    .split('')
    .filter((_ch, index) => !dropped.has(index))
    .join('');
}

/**
 * Close what a cut-off response left open: an unterminated string, a dangling
 * key, a trailing comma, then every unclosed bracket in reverse order.
 */
export function repairTruncatedJson(candidate: string): string {
  let text = candidate.trimEnd();

  if (scanTokens(text).inString) {
    text = text.replace(/\\$/, '') + '"';
  }
  text = text.replace(/,?\s*"(?:[^"\\]|\\.)*"\s*:\s*$/, '');
  text = text.replace(/,\s*$/, '');

  const closers = scanTokens(text)
    .stack.slice()
    .reverse()
    .map(token => (token === '{' ? '}' : ']'))
    .join('');

  return dropTrailingCommas(text + closers);
}

/**
 * Step 3: drop code fences, leading prose ("Here is the analysis:") and
 * trailing commentary, then repair truncation.
 */
export function stripWrappers(raw: string): string | null {
  const unfenced = stripCodeFences(raw);
  const start = unfenced.indexOf('{');
  if (start === -1) return null;

  const body = unfenced.slice(start);
  const balanced = extractBalancedObject(body);
  const candidate = balanced !== null && scanTokens(balanced).stack.length === 0 ? balanced : body;
  return repairTruncatedJson(candidate);
}

export const EXTRACTION_STEPS: readonly ExtractionStep[] = [
  { method: 'direct', extract: parseDirect },
  { method: 'balanced_object', extract: extractBalancedObject },
  { method: 'stripped_wrappers', extract: stripWrappers },
];

export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

// ---------------------------------------------------------------------------
// Target shapes
// ---------------------------------------------------------------------------

// Blank counts as missing
const textField = z.string().trim().min(1);

// Lenient on item types and on a lone string, strict on absence
const textListField = z.preprocess(
  value => (typeof value === 'string' ? [value] : value),
  z
    .array(z.union([z.string(), z.number(), z.boolean()]))
    .transform(items => items.map(item => String(item).trim()).filter(item => item.length > 0))
);

const KNOWN_CONFIDENCE_LEVELS: readonly string[] = CONFIDENCE_LEVELS;

export function normalizeConfidence(value: string): string {
  const normalized = value.trim().toLowerCase();
  return KNOWN_CONFIDENCE_LEVELS.includes(normalized) ? normalized : value.trim();
}

export const analysisSchema = z.object({
  summary: textField,
  key_points: textListField,
  risks_and_concerns: textListField,
  recommendations: textListField,
  simplified_explanation: textField,
});

export const questionAnswerSchema = z.object({
  answer: textField,
  relevant_sections: textListField,
  confidence_level: textField.transform(normalizeConfidence),
});

export function excerptRaw(raw: string, maxLength: number = RAW_EXCERPT_LENGTH): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return '(empty response)';
  }
  return trimmed.length > maxLength ? `${trimmed.slice(0, maxLength)}...` : trimmed;
}

export const ANALYSIS_SHAPE: TargetShape<DocumentAnalysis> = {
  kind: 'analysis',
  schema: analysisSchema,
  fallback: (rawExcerpt) => ({
    summary: `The analysis could not be structured automatically. Raw response: "${rawExcerpt}"`,
    key_points: [],
    risks_and_concerns: [],
    recommendations: [],
    simplified_explanation: `The AI service returned a response that could not be parsed: ${rawExcerpt}`,
  }),
};

export const QUESTION_ANSWER_SHAPE: TargetShape<QuestionAnswer> = {
  kind: 'qa_answer',
  schema: questionAnswerSchema,
  fallback: (rawExcerpt) => ({
    answer: `The answer could not be structured automatically. Raw response: "${rawExcerpt}"`,
    relevant_sections: [],
    confidence_level: 'low',
  }),
};

/**
 * Validate a parsed value against a shape, reporting which top-level fields
 * were missing or had the wrong type.
 */
export function validateShape<T>(value: unknown, shape: TargetShape<T>): ShapeValidation<T> {
  const result = shape.schema.safeParse(value);
  if (result.success) {
    return { ok: true, value: result.data };
  }

  const missingFields = new Set<string>();
  const issues = result.error.issues.map(issue => {
    const field = issue.path.length > 0 ? String(issue.path[0]) : '(root)';
    missingFields.add(field);
    return `${issue.path.join('.') || '(root)'}: ${issue.message}`;
  });
  return { ok: false, missingFields: [...missingFields], issues };
}

// ---------------------------------------------------------------------------
// Coercion
// ---------------------------------------------------------------------------

export function coerce<T>(raw: string, shape: TargetShape<T>): CoercionResult<T> {
  let missingFields: string[] = [];
  const tried = new Set<string>();

  for (const step of EXTRACTION_STEPS) {
    const candidate = step.extract(raw);
    if (candidate === null || tried.has(candidate)) continue;
    tried.add(candidate);

    const parsed = tryParseJson(candidate);
    if (!parsed.ok) continue;

    const validation = validateShape(parsed.value, shape);
    if (validation.ok) {
      if (step.method !== 'direct') {
        logger.debug({ shape: shape.kind, method: step.method }, 'AI response needed extraction before parsing');
      }
      return { value: validation.value, method: step.method, missingFields: [] };
    }
    missingFields = validation.missingFields;
  }

  logger.warn(
    { shape: shape.kind, missingFields, rawLength: raw.length, rawExcerpt: excerptRaw(raw, 200) },
    'AI response could not be coerced, using fallback'
  );

  return { value: shape.fallback(excerptRaw(raw)), method: 'fallback', missingFields };
}

export function coerceAnalysis(raw: string): CoercionResult<DocumentAnalysis> {
  return coerce(raw, ANALYSIS_SHAPE);
}

export function coerceQuestionAnswer(raw: string): CoercionResult<QuestionAnswer> {
  return coerce(raw, QUESTION_ANSWER_SHAPE);
}
