import { z } from 'zod';
import type { JsonValue } from '../domain/value.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.number(), z.string(), z.boolean(), z.null(), z.array(jsonValueSchema)]),
);

/**
 * Body for PUT /api/v1/variables/:name.
 *
 * `value` is plain JSON: integral numbers become int, other numbers float,
 * `null` nil, arrays lists. Objects are not part of the value domain.
 */
export const variableBodySchema = z.object({
  value: jsonValueSchema,
});

export type VariableBody = z.infer<typeof variableBodySchema>;

/** Variable names are free-form but must be non-empty and single-line. */
export const variableNameSchema = z.string().min(1).max(255).regex(/^[^\s]+$/, 'must not contain whitespace');
