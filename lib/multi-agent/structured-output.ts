import { z } from 'zod';

export type StructuredShape = 'array' | 'object';

export type ExtractionFailureReason = 'not-found' | 'invalid';

export interface ExtractionFailure {
  reason: ExtractionFailureReason;
  message: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

const BRACKETS: Record<StructuredShape, { open: string; close: string }> = {
  array: { open: '[', close: ']' },
  object: { open: '{', close: '}' },
};

/**
 * Returns the span from the first opening bracket to the last matching closer.
 * This is a pattern match, not a parser: brackets inside string literals or
 * trailing prose can produce a span that does not parse.
 */
export function findStructuredSpan(text: string, shape: StructuredShape): string | undefined {
  const { open, close } = BRACKETS[shape];
  const start = text.indexOf(open);
  if (start === -1) return undefined;

  const end = text.lastIndexOf(close);
  if (end < start) return undefined;

  return text.slice(start, end + 1);
}

/**
 * Recovers a typed payload from free-form model output (markdown fences,
 * commentary and the like around the JSON).
 *
 * `not-found` means no bracketed span exists at all; `invalid` means a span
 * was found but is not JSON or does not match `schema`. Callers pick their
 * fallback from the reason.
 */
export function parseStructured<T>(
  text: string,
  shape: StructuredShape,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<T, ExtractionFailure> {
  const span = findStructuredSpan(text, shape);
  if (span === undefined) {
    return { ok: false, error: { reason: 'not-found', message: `No JSON ${shape} found in model output` } };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(span);
  } catch (error) {
    return {
      ok: false,
      error: { reason: 'invalid', message: error instanceof Error ? error.message : 'Invalid JSON' },
    };
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const issues = validated.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    });
    return { ok: false, error: { reason: 'invalid', message: `Unexpected shape: ${issues.join('; ')}` } };
  }

  return { ok: true, value: validated.data };
}
