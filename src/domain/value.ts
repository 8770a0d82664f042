/**
 * Value domain shared by variables and rule code.
 *
 * A closed tagged variant so that comparison and serialization are total
 * over a known shape. Functions live only inside the interpreter and are
 * never Values.
 */

export type Value =
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'list'; readonly items: readonly Value[] }
  | { readonly kind: 'nil' };

export type ValueKind = Value['kind'];

/** Plain JSON shape a Value maps to at the HTTP boundary. */
export type JsonValue = number | string | boolean | null | JsonValue[];

export const NIL: Value = { kind: 'nil' };
export const TRUE: Value = { kind: 'bool', value: true };
export const FALSE: Value = { kind: 'bool', value: false };

export function int(value: number): Value {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`integer out of range: ${value}`);
  }
  return { kind: 'int', value };
}

export function float(value: number): Value {
  return { kind: 'float', value };
}

export function str(value: string): Value {
  return { kind: 'string', value };
}

export function bool(value: boolean): Value {
  return value ? TRUE : FALSE;
}

export function list(items: readonly Value[]): Value {
  return { kind: 'list', items };
}

/**
 * Deep, kind-sensitive equality.
 *
 * `int 1` and `float 1` are different shapes and never compare equal.
 * Floats follow IEEE semantics, so NaN is never equal to itself.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'nil':
      return b.kind === 'nil';
    case 'int':
    case 'float':
      return b.kind === a.kind && b.value === a.value;
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'bool':
      return b.kind === 'bool' && b.value === a.value;
    case 'list': {
      if (b.kind !== 'list' || b.items.length !== a.items.length) return false;
      return a.items.every((item, i) => {
        const other = b.items[i];
        return other !== undefined && valuesEqual(item, other);
      });
    }
  }
}

/**
 * False when `v` is, or contains, a NaN or infinite float. Such values have
 * no JSON encoding, and NaN never equals itself, so they are not storable.
 */
export function isFiniteValue(v: Value): boolean {
  if (v.kind === 'float') return Number.isFinite(v.value);
  if (v.kind === 'list') return v.items.every(isFiniteValue);
  return true;
}

/** Human-readable rendering, used in log lines and error messages. */
export function formatValue(v: Value): string {
  switch (v.kind) {
    case 'nil':
      return 'nil';
    case 'int':
      return String(v.value);
    case 'float':
      return Number.isInteger(v.value) ? v.value.toFixed(1) : String(v.value);
    case 'string':
      return JSON.stringify(v.value);
    case 'bool':
      return v.value ? 'true' : 'false';
    case 'list':
      return `(${v.items.map(formatValue).join(' ')})`;
  }
}

/**
 * Maps plain JSON onto the value domain.
 *
 * Integral numbers become `int`, other numbers `float`. Returns `null` for
 * shapes outside the domain (objects, unsafe integers).
 */
export function fromJson(input: unknown): Value | null {
  if (input === null) return NIL;
  switch (typeof input) {
    case 'number':
      if (Number.isInteger(input)) {
        return Number.isSafeInteger(input) ? int(input) : null;
      }
      return float(input);
    case 'string':
      return str(input);
    case 'boolean':
      return bool(input);
    default:
      break;
  }
  if (Array.isArray(input)) {
    const items: Value[] = [];
    for (const element of input) {
      const item = fromJson(element);
      if (item === null) return null;
      items.push(item);
    }
    return list(items);
  }
  return null;
}

export function toJson(v: Value): JsonValue {
  switch (v.kind) {
    case 'nil':
      return null;
    case 'int':
    case 'float':
    case 'string':
    case 'bool':
      return v.value;
    case 'list':
      return v.items.map(toJson);
  }
}
