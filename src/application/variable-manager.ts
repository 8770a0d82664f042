import type { Logger } from 'pino';
import type { Value } from '../domain/value.js';
import { formatValue, isFiniteValue, valuesEqual } from '../domain/value.js';
import type { VariableChange } from '../domain/variable.js';
import { DecodeError, NotStorableError, UndefinedSymbolError } from '../domain/errors.js';
import type { KeyValueStore } from '../infrastructure/store/types.js';
import { decodeVariable, encodeVariable } from '../infrastructure/store/variable-codec.js';
import { Channel } from './channel.js';
import { KeyedLock } from './keyed-lock.js';

export const DEFAULT_VARIABLE_PREFIX = 'var~';

/**
 * Owns every variable read and write.
 *
 * - Reads hit the write-through cache first, then the store.
 * - Writes that do not change the value are dropped (no write, no event).
 * - Effective writes persist, update the cache, then hand a change event
 *   to `updates`. `set()` resolves only after a consumer received it.
 *
 * The cache mirrors this process's own writes only; another process
 * writing the same store is not observed once a name is cached.
 */
export class VariableManager {
  readonly updates: Channel<VariableChange> = new Channel();

  private readonly cache: Map<string, Value> = new Map();
  private readonly locks = new KeyedLock();

  constructor(
    private readonly store: KeyValueStore,
    private readonly log: Logger,
    private readonly prefix: string = DEFAULT_VARIABLE_PREFIX,
  ) {}

  /**
   * @throws UndefinedSymbolError when the variable was never written.
   * @throws DecodeError when the stored record is unreadable.
   */
  async get(name: string): Promise<Value> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const raw = await this.store.get(this.key(name));
    if (raw === null) {
      throw new UndefinedSymbolError(name);
    }
    return decodeVariable(name, raw);
  }

  /**
   * Writes `value` unless it equals the current one.
   *
   * Resolves `true` when the write took effect and its change event was
   * delivered, `false` when it was suppressed as a no-op.
   *
   * @throws NotStorableError for NaN or infinite floats; nothing is written.
   */
  set(name: string, value: Value): Promise<boolean> {
    if (!isFiniteValue(value)) {
      return Promise.reject(new NotStorableError(name, formatValue(value)));
    }
    return this.locks.run(name, async () => {
      const current = await this.current(name);
      if (current !== undefined && valuesEqual(current, value)) {
        return false;
      }

      await this.store.set(this.key(name), encodeVariable(value));
      this.cache.set(name, value);

      this.log.debug({ variable: name, value: formatValue(value) }, 'Variable changed');
      await this.updates.send({ name, value });
      return true;
    });
  }

  /** Names of all persisted variables, sorted. */
  async names(): Promise<string[]> {
    const keys = await this.store.keys(this.prefix);
    return keys.map((k) => k.slice(this.prefix.length)).sort();
  }

  /** Stops delivery; the dispatch loop drains and exits. */
  close(): void {
    this.updates.close();
  }

  /**
   * Current value for the no-op check. A missing or unreadable record
   * counts as "no value" so the write goes through and repairs it.
   */
  private async current(name: string): Promise<Value | undefined> {
    try {
      return await this.get(name);
    } catch (err: unknown) {
      if (err instanceof UndefinedSymbolError) return undefined;
      if (err instanceof DecodeError) {
        this.log.warn({ err, variable: name }, 'Overwriting unreadable variable');
        return undefined;
      }
      throw err;
    }
  }

  private key(name: string): string {
    return this.prefix + name;
  }
}
