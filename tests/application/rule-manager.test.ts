import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { RuleManager } from '../../src/application/rule-manager.js';
import { Rule } from '../../src/application/rule.js';
import { VariableManager } from '../../src/application/variable-manager.js';
import { MemoryStore } from '../../src/infrastructure/store/memory-store.js';
import { int } from '../../src/domain/value.js';
import { NotStorableError } from '../../src/domain/errors.js';
import { drain, fakeLogger, settle } from '../helpers.js';

function setup(initial?: Record<string, string>) {
  const store = new MemoryStore(initial);
  const log = fakeLogger();
  const variables = new VariableManager(store, log);
  return { store, log, variables };
}

function rules(variables: VariableManager, log: Logger, sources: Record<string, string>): Rule[] {
  return Object.entries(sources).map(([name, source]) =>
    Rule.fromSource(name, source, { variables, log }));
}

describe('RuleManager.runBatch', () => {
  it('runs the rules after a failing one', async () => {
    const { variables, log } = setup();
    const { done } = drain(variables);
    const manager = new RuleManager(variables, log, rules(variables, log, {
      'a.rule': '(set first 1)',
      'b.rule': '(error "sensor offline")',
      'c.rule': '(set third 3)',
    }), { clock: false });

    const result = await manager.runBatch({ name: 'door', value: int(1) });

    expect(result).toEqual({ ran: 3, failed: 1 });
    expect(await variables.get('first')).toEqual(int(1));
    expect(await variables.get('third')).toEqual(int(3));
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ rule: 'b.rule', trigger: 'door', err: expect.any(Error) }),
      "Rule 'b.rule' failed",
    );
    variables.close();
    await done;
  });

  it('runs rules in load order', async () => {
    const { variables, log } = setup();
    const manager = new RuleManager(variables, log, rules(variables, log, {
      '10.rule': '(log "first")',
      '20.rule': '(log "second")',
    }), { clock: false });

    await manager.runBatch();

    const messages = vi.mocked(log.info).mock.calls.map((call) => call[0]);
    expect(messages).toEqual(['first', 'second']);
  });
});

describe('RuleManager.run', () => {
  it('starts one batch per change event', async () => {
    const { variables, log } = setup();
    const manager = new RuleManager(variables, log, rules(variables, log, {
      'tick.rule': '(log "tick")',
    }), { clock: false });
    const running = manager.run();

    await variables.set('x', int(1));
    await variables.set('x', int(2));
    await variables.set('x', int(2));
    await settle();
    await manager.idle();

    const ticks = vi.mocked(log.info).mock.calls.filter((call) => call[0] === 'tick');
    expect(ticks).toHaveLength(2);

    variables.close();
    await running;
    expect(log.info).toHaveBeenCalledWith('Dispatch loop stopped');
  });

  it('lets writes made by rules trigger further batches', async () => {
    const { variables, log } = setup({ 'var~count': '{"value":0}' });
    const manager = new RuleManager(variables, log, rules(variables, log, {
      'step.rule': '(if (< count 3) (set count (+ count 1)))',
    }), { clock: false });
    const send = vi.spyOn(variables.updates, 'send');
    const running = manager.run();

    await variables.set('count', int(1));
    await settle();
    await manager.idle();

    expect(await variables.get('count')).toEqual(int(3));
    expect(send.mock.calls.map(([change]) => change.value)).toEqual([int(1), int(2), int(3)]);
    expect(manager.inFlight).toBe(0);

    variables.close();
    await running;
  });

  it('fails a rule that writes NaN instead of cascading on it', async () => {
    const { variables, log, store } = setup();
    const manager = new RuleManager(variables, log, rules(variables, log, {
      'nan.rule': '(set x (/ 0.0 0.0))',
    }), { clock: false });
    const send = vi.spyOn(variables.updates, 'send');
    const running = manager.run();

    await variables.set('trigger', int(1));
    await settle(20);
    await manager.idle();

    expect(send).toHaveBeenCalledTimes(1);
    expect(store.peek('var~x')).toBeUndefined();
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ rule: 'nan.rule', err: expect.any(NotStorableError) }),
      "Rule 'nan.rule' failed",
    );

    variables.close();
    await running;
  });

  it('keeps a failing rule from stopping the loop', async () => {
    const { variables, log } = setup();
    const manager = new RuleManager(variables, log, rules(variables, log, {
      'bad.rule': '(+ missing 1)',
    }), { clock: false });
    const running = manager.run();

    await variables.set('x', int(1));
    await variables.set('x', int(2));
    await settle();
    await manager.idle();

    expect(log.error).toHaveBeenCalledTimes(2);
    variables.close();
    await running;
  });

  it('warns when in-flight batches exceed the threshold', async () => {
    const { variables, log } = setup();
    const manager = new RuleManager(variables, log, [], { clock: false, batchWarnThreshold: 0 });
    const running = manager.run();

    await variables.set('x', int(1));
    await settle();

    expect(log.warn).toHaveBeenCalledWith(
      { inFlight: 1, threshold: 0, trigger: 'x' },
      'Rule batches are piling up',
    );
    variables.close();
    await running;
  });

  it('publishes the clock while running and stops it on close', async () => {
    const { variables, log, store } = setup();
    const fixed = new Date(2024, 5, 15, 8, 30, 0);
    const manager = new RuleManager(variables, log, [], {
      clock: { intervalMs: 10, now: () => fixed },
    });
    const running = manager.run();

    await settle(50);
    variables.close();
    await running;

    expect(store.peek('var~date:month')).toBe('{"value":{"kind":"int","value":6}}');
    expect(log.info).toHaveBeenCalledWith('Clock stopped');
  });
});

describe('RuleManager.load', () => {
  const dir = join(process.cwd(), '.tmp-test-manager');

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('builds a manager over the rule files of a directory', async () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'b.lisp'), '(log "b")');
    writeFileSync(join(dir, 'a.lisp'), '(log "a")');
    writeFileSync(join(dir, 'c.rule'), '(log "c")');
    const { variables, log } = setup();

    const manager = await RuleManager.load(dir, variables, log, { extension: '.lisp', clock: false });

    expect(manager.rules.map((r) => r.name)).toEqual(['a.lisp', 'b.lisp']);
  });
});
