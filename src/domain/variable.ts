import type { Value } from './value.js';

/**
 * Change event published once per effective variable write.
 *
 * Carries the externally visible name (never the storage key).
 */
export interface VariableChange {
  readonly name: string;
  readonly value: Value;
}

/** Variables written by the built-in clock, in publication order. */
export const CLOCK_VARIABLES = [
  'time:second',
  'time:minute',
  'time:hour',
  'date:day',
  'date:month',
  'date:year',
] as const;

export type ClockVariable = (typeof CLOCK_VARIABLES)[number];
