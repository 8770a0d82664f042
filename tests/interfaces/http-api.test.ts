import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/interfaces/http/server.js';
import { VariableManager } from '../../src/application/variable-manager.js';
import { RuleManager } from '../../src/application/rule-manager.js';
import { Rule } from '../../src/application/rule.js';
import { MemoryStore } from '../../src/infrastructure/store/memory-store.js';
import { float, int } from '../../src/domain/value.js';
import { drain, fakeLogger } from '../helpers.js';

describe('HTTP API', () => {
  let store: MemoryStore;
  let variables: VariableManager;
  let server: FastifyInstance;
  let drained: ReturnType<typeof drain>;

  beforeEach(async () => {
    const log = fakeLogger();
    store = new MemoryStore({
      'var~temp': '{"value":{"kind":"float","value":21.5}}',
      'var~broken': 'garbage',
    });
    variables = new VariableManager(store, log);
    drained = drain(variables);
    const ruleManager = new RuleManager(variables, log, [
      Rule.fromSource('heat.rule', '(log "checking")', { variables, log }),
    ], { clock: false });
    server = await buildServer({ variables, ruleManager, logLevel: 'silent' });
  });

  afterEach(async () => {
    await server.close();
    variables.close();
    await drained.done;
  });

  it('GET /api/v1/variables lists names', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/v1/variables' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ variables: ['broken', 'temp'] });
  });

  it('GET /api/v1/variables/:name returns the value as plain JSON', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/v1/variables/temp' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ name: 'temp', value: 21.5 });
  });

  it('GET /api/v1/variables/:name returns 404 for unknown names', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/v1/variables/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'undefined symbol: nope' });
  });

  it('GET /api/v1/variables/:name returns 500 for unreadable records', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/v1/variables/broken' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'cannot decode variable broken: record is not valid JSON' });
  });

  it('PUT /api/v1/variables/:name writes and reports the change', async () => {
    const first = await server.inject({
      method: 'PUT',
      url: '/api/v1/variables/mode',
      payload: { value: ['eco', 2] },
    });
    const again = await server.inject({
      method: 'PUT',
      url: '/api/v1/variables/mode',
      payload: { value: ['eco', 2] },
    });

    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({ name: 'mode', value: ['eco', 2], changed: true });
    expect(again.json()).toEqual({ name: 'mode', value: ['eco', 2], changed: false });
    expect(drained.events.map((e) => e.name)).toEqual(['mode']);
  });

  it('PUT maps integral numbers to int and others to float', async () => {
    await server.inject({ method: 'PUT', url: '/api/v1/variables/a', payload: { value: 3 } });
    await server.inject({ method: 'PUT', url: '/api/v1/variables/b', payload: { value: 0.5 } });

    expect(await variables.get('a')).toEqual(int(3));
    expect(await variables.get('b')).toEqual(float(0.5));
  });

  it('PUT rejects bodies without a value', async () => {
    const res = await server.inject({
      method: 'PUT',
      url: '/api/v1/variables/a',
      payload: { other: 1 },
    });

    expect(res.statusCode).toBe(400);
    expect(store.peek('var~a')).toBeUndefined();
  });

  it('PUT rejects objects as values', async () => {
    const res = await server.inject({
      method: 'PUT',
      url: '/api/v1/variables/a',
      payload: { value: { nested: true } },
    });

    expect(res.statusCode).toBe(400);
  });

  it('GET /api/v1/rules lists loaded rules', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/v1/rules' });

    expect(res.json()).toEqual({ rules: [{ name: 'heat.rule' }] });
  });

  it('GET /health reports engine counters', async () => {
    const res = await server.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', rules: 1, inFlightBatches: 0 });
  });
});
