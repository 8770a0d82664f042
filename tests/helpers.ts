import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { VariableChange } from '../src/domain/index.js';
import type { VariableManager } from '../src/application/variable-manager.js';

/** Minimal fake logger; `child()` returns the same fake. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/**
 * Stands in for the dispatch loop: receives every change event until the
 * manager is closed.
 */
export function drain(variables: VariableManager): {
  events: VariableChange[];
  done: Promise<void>;
} {
  const events: VariableChange[] = [];
  const done = (async () => {
    for await (const change of variables.updates) {
      events.push(change);
    }
  })();
  return { events, done };
}

/** Lets every queued microtask (store calls, hand-offs, cascades) run. */
export function settle(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
