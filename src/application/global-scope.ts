import type { Value } from '../domain/value.js';
import { NotStorableError, UnsupportedScopeOperationError } from '../domain/errors.js';
import type {
  NativeFunction, Node, Program, RuntimeValue, Scope,
} from '../language/index.js';
import { describeValue, isCallable, newDefaultScope } from '../language/index.js';
import type { VariableManager } from './variable-manager.js';

/**
 * Root of every rule's scope chain.
 *
 * Symbol reads and writes that no lexical scope claims land here and are
 * answered by the VariableManager, so `(set temp 21)` in a rule persists
 * `temp` and notifies every rule. This scope has no lexical layer: the
 * evaluator always works in a default child scope beneath it.
 */
export class GlobalScope implements Scope {
  constructor(
    private readonly variables: VariableManager,
    private readonly actions: readonly NativeFunction[] = [],
  ) {}

  async get(symbol: string): Promise<RuntimeValue> {
    return this.variables.get(symbol);
  }

  async set(symbol: string, value: RuntimeValue): Promise<void> {
    await this.variables.set(symbol, storable(symbol, value));
  }

  create(_symbol: string, _value: RuntimeValue): void {
    throw new UnsupportedScopeOperationError('create');
  }

  branch(): Scope {
    throw new UnsupportedScopeOperationError('branch');
  }

  enclose(_parent: Scope): void {
    throw new UnsupportedScopeOperationError('enclose');
  }

  /** Evaluates in a fresh default scope enclosing this one, with the actions bound. */
  async eval(node: Node | Program): Promise<RuntimeValue> {
    const scope = newDefaultScope();
    scope.enclose(this);
    for (const action of this.actions) {
      scope.create(action.name, action);
    }
    return scope.eval(node);
  }
}

function storable(symbol: string, value: RuntimeValue): Value {
  if (isCallable(value)) {
    throw new NotStorableError(symbol, describeValue(value));
  }
  return value;
}
