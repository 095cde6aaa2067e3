import { z } from 'zod';
import { Result, ok, err } from '../../utils/result.js';

export interface ParseError {
  kind: 'malformed';
  message: string;
  raw: string;
}

function malformed(message: string, raw: string): { ok: false; error: ParseError } {
  return err({ kind: 'malformed', message, raw });
}

/**
 * Drop markdown heading and emphasis markers the model sometimes adds.
 */
export function stripMarkdown(text: string): string {
  return text.replace(/#+\s*|\*+\s*/g, '').trim();
}

/**
 * Parse `a|b|c` model output. The first `minFields` fields must be non-empty.
 */
export function parseDelimited(text: string, minFields = 2): Result<string[], ParseError> {
  const fields = stripMarkdown(text)
    .split('|')
    .map(field => field.trim().replace(/^["'`]+|["'`]+$/g, '').trim());

  if (fields.length < minFields) {
    return malformed(`Expected at least ${minFields} fields, got ${fields.length}`, text);
  }
  if (fields.slice(0, minFields).some(field => field.length === 0)) {
    return malformed(`One of the first ${minFields} fields is empty`, text);
  }
  return ok(fields);
}

/**
 * Strip code fences, locate the JSON object and validate it against a schema.
 */
export function parseJsonResponse<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T, ParseError> {
  const cleaned = text.replace(/```(?:json)?/gi, '').trim();
  const match = cleaned.match(/\{[\s\S]*\}/);
  if (!match) {
    return malformed('No JSON object in response', text);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(match[0]);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return malformed(`Invalid JSON: ${message}`, text);
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    return malformed(`Unexpected JSON shape: ${validated.error.issues[0]?.message ?? 'invalid'}`, text);
  }
  return ok(validated.data);
}
