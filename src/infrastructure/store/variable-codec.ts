import { z } from 'zod';
import type { Value } from '../../domain/value.js';
import { formatValue, fromJson, isFiniteValue } from '../../domain/value.js';
import { DecodeError } from '../../domain/errors.js';

/**
 * Tagged form of a Value: the Value object itself, serialized as JSON.
 * Keeps `int` and `float` apart, which plain JSON numbers cannot.
 */
const taggedValueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('int'), value: z.number().int().refine(Number.isSafeInteger) }),
    z.object({ kind: z.literal('float'), value: z.number() }),
    z.object({ kind: z.literal('string'), value: z.string() }),
    z.object({ kind: z.literal('bool'), value: z.boolean() }),
    z.object({ kind: z.literal('list'), items: z.array(taggedValueSchema) }),
    z.object({ kind: z.literal('nil') }),
  ]),
);

/** Stored record: the variable's name lives only in the storage key. */
const recordSchema = z.object({ value: z.unknown() });

/** @throws RangeError for NaN or infinite floats, which JSON would turn into null. */
export function encodeVariable(value: Value): string {
  if (!isFiniteValue(value)) {
    throw new RangeError(`cannot encode non-finite value: ${formatValue(value)}`);
  }
  return JSON.stringify({ value });
}

/**
 * Decodes a stored record.
 *
 * Accepts the tagged form written by `encodeVariable`, and plain JSON
 * payloads (`{"value": 5}`) written by other tools.
 *
 * @throws DecodeError when the text is not a record of a known value shape.
 */
export function decodeVariable(name: string, raw: string): Value {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new DecodeError(name, 'record is not valid JSON', { cause: err });
  }

  const record = recordSchema.safeParse(parsed);
  if (!record.success || !('value' in record.data)) {
    throw new DecodeError(name, 'record has no value field');
  }

  const tagged = taggedValueSchema.safeParse(record.data.value);
  if (tagged.success) return tagged.data;

  const plain = fromJson(record.data.value);
  if (plain === null) {
    throw new DecodeError(name, 'value is outside the supported value domain');
  }
  return plain;
}
