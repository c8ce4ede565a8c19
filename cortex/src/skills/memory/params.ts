/**
 * Parameter validation shared by the memory skills
 */

import { z } from 'zod';

export const memoryKindSchema = z.enum(['fact', 'preference', 'skill', 'context']);

export type ParseResult<T> = { ok: true; data: T } | { ok: false; error: string };

export function parseParams<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params: Record<string, unknown>
): ParseResult<T> {
  const result = schema.safeParse(params);
  if (result.success) {
    return { ok: true, data: result.data };
  }

  const issues = result.error.issues.map(issue => {
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });
  return { ok: false, error: `Invalid parameters: ${issues.join('; ')}` };
}
