import type { Value } from '../domain/value.js';
import {
  FALSE, NIL, TRUE, bool, float, formatValue, int, list, str, valuesEqual,
} from '../domain/value.js';
import type { Node, Position } from './ast.js';
import type { Callable, NativeFunction, RuntimeValue, Scope, SpecialForm } from './scope.js';
import { EvalError, isCallable } from './scope.js';

/** `false` and `nil` are false; every other value, functions included, is true. */
export function isTruthy(v: RuntimeValue): boolean {
  if (v.kind === 'nil') return false;
  if (v.kind === 'bool') return v.value;
  return true;
}

export function describeValue(v: RuntimeValue): string {
  return isCallable(v) ? `<${v.kind} ${v.name}>` : formatValue(v);
}

function form(
  name: string,
  apply: (scope: Scope, args: readonly Node[], pos: Position) => Promise<RuntimeValue>,
): SpecialForm {
  return { kind: 'form', name, apply };
}

/**
 * Wraps a synchronous function over plain values.
 *
 * Errors thrown by `fn` are reported without a position; callers see the
 * function name in the message instead.
 */
function fn(name: string, impl: (args: readonly Value[]) => RuntimeValue): NativeFunction {
  return {
    kind: 'function',
    name,
    async call(args) {
      const values: Value[] = [];
      for (const arg of args) {
        if (isCallable(arg)) {
          throw new Error(`${name}: cannot use ${describeValue(arg)} as a value`);
        }
        values.push(arg);
      }
      return impl(values);
    },
  };
}

function expectSymbol(node: Node | undefined, formName: string, pos: Position): string {
  if (node === undefined || node.type !== 'symbol') {
    throw new EvalError(`${formName} expects a symbol`, node?.pos ?? pos);
  }
  return node.name;
}

function arity(name: string, args: readonly unknown[], min: number, max: number, pos: Position): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new EvalError(`${name} takes ${expected} arguments, got ${args.length}`, pos);
  }
}

// ── Special forms ────────────────────────────────────────────

const varForm = form('var', async (scope, args, pos) => {
  arity('var', args, 1, 2, pos);
  const name = expectSymbol(args[0], 'var', pos);
  const init = args[1];
  const value = init === undefined ? NIL : await scope.eval(init);
  scope.create(name, value);
  return NIL;
});

const setForm = form('set', async (scope, args, pos) => {
  arity('set', args, 2, 2, pos);
  const name = expectSymbol(args[0], 'set', pos);
  const valueNode = args[1];
  const value = valueNode === undefined ? NIL : await scope.eval(valueNode);
  await scope.set(name, value);
  return NIL;
});

async function evalBody(scope: Scope, body: readonly Node[]): Promise<RuntimeValue> {
  let result: RuntimeValue = NIL;
  for (const node of body) {
    result = await scope.eval(node);
  }
  return result;
}

const doForm = form('do', async (scope, args) => evalBody(scope.branch(), args));

const ifForm = form('if', async (scope, args, pos) => {
  arity('if', args, 2, 3, pos);
  const [condition, then, otherwise] = args;
  if (condition === undefined || then === undefined) return NIL;
  if (isTruthy(await scope.eval(condition))) {
    return scope.eval(then);
  }
  return otherwise === undefined ? NIL : scope.eval(otherwise);
});

const andForm = form('and', async (scope, args) => {
  let result: RuntimeValue = TRUE;
  for (const arg of args) {
    result = await scope.eval(arg);
    if (!isTruthy(result)) return result;
  }
  return result;
});

const orForm = form('or', async (scope, args) => {
  let result: RuntimeValue = FALSE;
  for (const arg of args) {
    result = await scope.eval(arg);
    if (isTruthy(result)) return result;
  }
  return result;
});

/**
 * (func name (params...) body...) binds a named function in the current
 * scope; (func (params...) body...) returns an anonymous one.
 */
const funcForm = form('func', async (scope, args, pos) => {
  const [first, ...afterFirst] = args;
  let name = 'lambda';
  let paramsNode: Node | undefined = first;
  let body: readonly Node[] = afterFirst;

  if (first?.type === 'symbol') {
    name = first.name;
    [paramsNode, ...body] = afterFirst;
  }

  if (paramsNode === undefined || paramsNode.type !== 'list') {
    throw new EvalError('func expects a parameter list', paramsNode?.pos ?? pos);
  }
  const params = paramsNode.items.map((p) => expectSymbol(p, 'func parameter list', pos));

  const closure: NativeFunction = {
    kind: 'function',
    name,
    async call(callArgs) {
      if (callArgs.length !== params.length) {
        throw new EvalError(
          `${name} takes ${params.length} arguments, got ${callArgs.length}`,
          pos,
        );
      }
      const local = scope.branch();
      params.forEach((param, i) => {
        local.create(param, callArgs[i] ?? NIL);
      });
      return evalBody(local, body);
    },
  };

  if (name !== 'lambda') {
    scope.create(name, closure);
  }
  return closure;
});

// ── Functions ────────────────────────────────────────────────

type Numeric = { kind: 'int' | 'float'; value: number };

function numeric(name: string, v: Value): Numeric {
  if (v.kind !== 'int' && v.kind !== 'float') {
    throw new Error(`${name}: expected a number, got ${formatValue(v)}`);
  }
  return v;
}

function toNumber(name: string, isFloat: boolean, n: number): Value {
  if (isFloat) return float(n);
  if (!Number.isSafeInteger(n)) {
    throw new Error(`${name}: integer overflow`);
  }
  return int(n);
}

function arithmetic(
  name: string,
  identity: number | null,
  op: (a: number, b: number, isFloat: boolean) => number,
): NativeFunction {
  return fn(name, (args) => {
    if (name === '+' && args.length > 0 && args.every((a) => a.kind === 'string')) {
      return str(args.map((a) => (a.kind === 'string' ? a.value : '')).join(''));
    }
    const nums = args.map((a) => numeric(name, a));
    const isFloat = nums.some((n) => n.kind === 'float');
    const [first, ...rest] = nums;
    if (first === undefined) {
      if (identity === null) throw new Error(`${name} takes at least 1 argument`);
      return int(identity);
    }
    if (rest.length === 0 && name === '-') {
      return toNumber(name, isFloat, -first.value);
    }
    let acc = first.value;
    for (const n of rest) {
      acc = op(acc, n.value, isFloat);
    }
    return toNumber(name, isFloat, acc);
  });
}

function divide(name: string, mod: boolean) {
  return (a: number, b: number, isFloat: boolean): number => {
    if (!isFloat && b === 0) {
      throw new Error(`${name}: division by zero`);
    }
    if (mod) return a % b;
    return isFloat ? a / b : Math.trunc(a / b);
  };
}

function comparison(name: string, test: (order: number) => boolean): NativeFunction {
  return fn(name, (args) => {
    if (args.length !== 2) {
      throw new Error(`${name} takes 2 arguments, got ${args.length}`);
    }
    const [a, b] = args;
    if (a === undefined || b === undefined) return FALSE;
    if (a.kind === 'string' && b.kind === 'string') {
      return bool(test(a.value < b.value ? -1 : a.value > b.value ? 1 : 0));
    }
    const x = numeric(name, a).value;
    const y = numeric(name, b).value;
    return bool(test(x < y ? -1 : x > y ? 1 : 0));
  });
}

function equality(name: string, expected: boolean): NativeFunction {
  return fn(name, (args) => {
    if (args.length !== 2) {
      throw new Error(`${name} takes 2 arguments, got ${args.length}`);
    }
    const [a, b] = args;
    if (a === undefined || b === undefined) return FALSE;
    return bool(valuesEqual(a, b) === expected);
  });
}

const functions: readonly NativeFunction[] = [
  equality('==', true),
  equality('!=', false),
  comparison('<', (o) => o < 0),
  comparison('<=', (o) => o <= 0),
  comparison('>', (o) => o > 0),
  comparison('>=', (o) => o >= 0),
  arithmetic('+', 0, (a, b) => a + b),
  arithmetic('-', null, (a, b) => a - b),
  arithmetic('*', 1, (a, b) => a * b),
  arithmetic('/', null, divide('/', false)),
  arithmetic('%', null, divide('%', true)),
  fn('not', (args) => {
    if (args.length !== 1) throw new Error(`not takes 1 argument, got ${args.length}`);
    const [v] = args;
    return bool(v === undefined || !isTruthy(v));
  }),
  fn('list', (args) => list(args)),
  fn('error', (args) => {
    const message = args.map((a) => (a.kind === 'string' ? a.value : formatValue(a))).join(' ');
    throw new Error(message || 'error');
  }),
];

const forms: readonly Callable[] = [varForm, setForm, doForm, ifForm, andForm, orForm, funcForm];

/** Globals every fresh evaluation scope starts with. */
export function standardGlobals(): ReadonlyMap<string, RuntimeValue> {
  const globals = new Map<string, RuntimeValue>([
    ['true', TRUE],
    ['false', FALSE],
    ['nil', NIL],
  ]);
  for (const callable of [...forms, ...functions]) {
    globals.set(callable.name, callable);
  }
  return globals;
}
