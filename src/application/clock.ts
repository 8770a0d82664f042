import type { Logger } from 'pino';
import type { Value } from '../domain/value.js';
import { int } from '../domain/value.js';
import type { ClockVariable } from '../domain/variable.js';
import type { VariableManager } from './variable-manager.js';

export interface ClockOptions {
  /** Tick period. Defaults to one second. */
  intervalMs?: number;
  /** Injectable time source for deterministic tests. */
  now?: () => Date;
}

export const DEFAULT_CLOCK_INTERVAL_MS = 1000;

/** The six clock variables for `now`, in local time, months 1-12. */
export function clockValues(now: Date): Array<[ClockVariable, Value]> {
  return [
    ['time:second', int(now.getSeconds())],
    ['time:minute', int(now.getMinutes())],
    ['time:hour', int(now.getHours())],
    ['date:day', int(now.getDate())],
    ['date:month', int(now.getMonth() + 1)],
    ['date:year', int(now.getFullYear())],
  ];
}

/**
 * Writes the clock variables one by one through the normal set path.
 *
 * Each write is independent: unchanged values are suppressed, changed ones
 * trigger their own rule batch, and a failing write is logged without
 * stopping the rest.
 */
export async function publishTime(
  variables: VariableManager,
  log: Logger,
  now: Date,
): Promise<void> {
  for (const [name, value] of clockValues(now)) {
    try {
      await variables.set(name, value);
    } catch (err: unknown) {
      log.warn({ err, variable: name }, 'Failed to publish clock variable');
    }
  }
}

/**
 * Starts the background clock.
 *
 * A tick still blocked on delivery when the next one is due causes that
 * next tick to be skipped rather than queued.
 *
 * Returns a function that stops the clock.
 */
export function startClock(
  variables: VariableManager,
  log: Logger,
  options: ClockOptions = {},
): () => void {
  const intervalMs = options.intervalMs ?? DEFAULT_CLOCK_INTERVAL_MS;
  const now = options.now ?? (() => new Date());
  let ticking = false;

  const timer = setInterval(() => {
    if (ticking) {
      log.debug('Previous clock tick still running, skipping');
      return;
    }
    ticking = true;
    void publishTime(variables, log, now()).finally(() => {
      ticking = false;
    });
  }, intervalMs);

  log.info({ intervalMs }, 'Clock started');

  return () => {
    clearInterval(timer);
    log.info('Clock stopped');
  };
}
