import type { Value } from '../domain/value.js';
import { NIL, float, int, str } from '../domain/value.js';
import { UndefinedSymbolError } from '../domain/errors.js';
import type { Node, Position, Program } from './ast.js';
import { formatPosition } from './ast.js';

/** A host or user-defined function: receives evaluated arguments. */
export interface NativeFunction {
  readonly kind: 'function';
  readonly name: string;
  call(args: readonly RuntimeValue[]): Promise<RuntimeValue>;
}

/** A special form: receives the calling scope and unevaluated arguments. */
export interface SpecialForm {
  readonly kind: 'form';
  readonly name: string;
  apply(scope: Scope, args: readonly Node[], pos: Position): Promise<RuntimeValue>;
}

export type Callable = NativeFunction | SpecialForm;

export type RuntimeValue = Value | Callable;

export function isCallable(v: RuntimeValue): v is Callable {
  return v.kind === 'function' || v.kind === 'form';
}

/**
 * Symbol resolution contract the evaluator runs against.
 *
 * `get`/`set` walk towards the root; `create` always binds locally.
 */
export interface Scope {
  get(symbol: string): Promise<RuntimeValue>;
  set(symbol: string, value: RuntimeValue): Promise<void>;
  create(symbol: string, value: RuntimeValue): void;
  branch(): Scope;
  enclose(parent: Scope): void;
  eval(node: Node | Program): Promise<RuntimeValue>;
}

export class EvalError extends Error {
  constructor(message: string, public readonly pos: Position) {
    super(`${formatPosition(pos)}: ${message}`);
    this.name = 'EvalError';
  }
}

/** Supplies the globals a fresh default scope starts with. */
export type GlobalsFactory = () => ReadonlyMap<string, RuntimeValue>;

/**
 * Lexical scope backed by a Map, optionally enclosed by a parent.
 *
 * The root scope of an evaluation gets the standard globals; scopes made
 * with `branch()` start empty and see the globals through their parent.
 */
export class DefaultScope implements Scope {
  private readonly vars: Map<string, RuntimeValue>;
  private parent: Scope | null = null;

  constructor(globals?: GlobalsFactory) {
    this.vars = new Map(globals ? globals() : []);
  }

  async get(symbol: string): Promise<RuntimeValue> {
    const local = this.vars.get(symbol);
    if (local !== undefined) return local;
    if (this.parent) return this.parent.get(symbol);
    throw new UndefinedSymbolError(symbol);
  }

  async set(symbol: string, value: RuntimeValue): Promise<void> {
    if (this.vars.has(symbol)) {
      this.vars.set(symbol, value);
      return;
    }
    if (this.parent) {
      await this.parent.set(symbol, value);
      return;
    }
    throw new UndefinedSymbolError(symbol);
  }

  create(symbol: string, value: RuntimeValue): void {
    if (this.vars.has(symbol)) {
      throw new Error(`symbol already defined in this scope: ${symbol}`);
    }
    this.vars.set(symbol, value);
  }

  branch(): Scope {
    const child = new DefaultScope();
    child.enclose(this);
    return child;
  }

  enclose(parent: Scope): void {
    if (this.parent) {
      throw new Error('scope is already enclosed');
    }
    this.parent = parent;
  }

  async eval(node: Node | Program): Promise<RuntimeValue> {
    if (node.type === 'program') {
      return this.evalSequence(node.body);
    }
    return this.evalNode(node);
  }

  /** Evaluates forms in order, returning the last value (nil when empty). */
  async evalSequence(nodes: readonly Node[]): Promise<RuntimeValue> {
    let result: RuntimeValue = NIL;
    for (const node of nodes) {
      result = await this.evalNode(node);
    }
    return result;
  }

  private async evalNode(node: Node): Promise<RuntimeValue> {
    switch (node.type) {
      case 'int':
        return int(node.value);
      case 'float':
        return float(node.value);
      case 'string':
        return str(node.value);
      case 'symbol':
        return this.get(node.name);
      case 'list':
        return this.evalCall(node.items, node.pos);
    }
  }

  private async evalCall(items: readonly Node[], pos: Position): Promise<RuntimeValue> {
    const [head, ...rest] = items;
    if (head === undefined) {
      throw new EvalError('cannot evaluate empty list', pos);
    }

    const target = await this.evalNode(head);
    if (target.kind === 'form') {
      return target.apply(this, rest, pos);
    }
    if (target.kind !== 'function') {
      throw new EvalError(`cannot call non-function ${describeHead(head)}`, pos);
    }

    const args: RuntimeValue[] = [];
    for (const arg of rest) {
      args.push(await this.evalNode(arg));
    }
    return target.call(args);
  }
}

function describeHead(head: Node): string {
  return head.type === 'symbol' ? head.name : head.type;
}
