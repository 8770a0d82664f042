import type { Logger } from 'pino';
import type { VariableChange } from '../domain/variable.js';
import { DEFAULT_RULE_EXTENSION, loadRules } from '../infrastructure/rules/index.js';
import type { ClockOptions } from './clock.js';
import { startClock } from './clock.js';
import type { Rule } from './rule.js';
import type { VariableManager } from './variable-manager.js';

export const DEFAULT_BATCH_WARN_THRESHOLD = 100;

export interface RuleManagerOptions {
  /** Clock settings, or `false` to run without the clock. */
  clock?: ClockOptions | false;
  /** In-flight batch count above which every new batch logs a warning. */
  batchWarnThreshold?: number;
}

export interface LoadOptions extends RuleManagerOptions {
  extension?: string;
}

/** Outcome of one run over the whole rule list. */
export interface BatchResult {
  readonly ran: number;
  readonly failed: number;
}

/**
 * Orchestrates rule execution.
 *
 * Every change event starts one batch that runs all rules in load order.
 * Batches run concurrently with each other and are not bounded: holding
 * back the receive would deadlock cascades, since a batch's own writes
 * wait on that receive. The in-flight count is tracked and logged instead.
 */
export class RuleManager {
  private readonly pending: Set<Promise<BatchResult>> = new Set();
  private stopClock: (() => void) | null = null;

  constructor(
    private readonly variables: VariableManager,
    private readonly log: Logger,
    readonly rules: readonly Rule[],
    private readonly options: RuleManagerOptions = {},
  ) {}

  /** Loads every rule file in `dir` and builds a manager over them. */
  static async load(
    dir: string,
    variables: VariableManager,
    log: Logger,
    options: LoadOptions = {},
  ): Promise<RuleManager> {
    const { extension = DEFAULT_RULE_EXTENSION, ...rest } = options;
    const rules = await loadRules(dir, extension, { variables, log });
    return new RuleManager(variables, log, rules, rest);
  }

  /** Batches started and not yet finished. */
  get inFlight(): number {
    return this.pending.size;
  }

  /**
   * Runs every rule once, in order. A failing rule is logged with its name
   * and the remaining rules still run. Never rejects.
   */
  async runBatch(change?: VariableChange): Promise<BatchResult> {
    let failed = 0;
    for (const rule of this.rules) {
      try {
        await rule.run();
      } catch (err: unknown) {
        failed++;
        this.log.error(
          { err, rule: rule.name, trigger: change?.name },
          `Rule '${rule.name}' failed`,
        );
      }
    }
    return { ran: this.rules.length, failed };
  }

  /**
   * Starts the clock and consumes change events until the variable
   * manager closes its delivery queue.
   */
  async run(): Promise<void> {
    if (this.options.clock !== false && this.stopClock === null) {
      this.stopClock = startClock(this.variables, this.log, this.options.clock);
    }

    this.log.info({ ruleCount: this.rules.length }, 'Dispatch loop started');

    for await (const change of this.variables.updates) {
      this.dispatch(change);
    }

    this.stop();
    this.log.info('Dispatch loop stopped');
  }

  /** Stops the clock. The dispatch loop ends when the delivery queue closes. */
  stop(): void {
    if (this.stopClock) {
      this.stopClock();
      this.stopClock = null;
    }
  }

  /** Resolves once no batch is in flight, including batches started meanwhile. */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private dispatch(change: VariableChange): void {
    const batch = this.runBatch(change);
    this.pending.add(batch);
    void batch.finally(() => {
      this.pending.delete(batch);
    });

    const threshold = this.options.batchWarnThreshold ?? DEFAULT_BATCH_WARN_THRESHOLD;
    if (this.pending.size > threshold) {
      this.log.warn(
        { inFlight: this.pending.size, threshold, trigger: change.name },
        'Rule batches are piling up',
      );
    }
  }
}
