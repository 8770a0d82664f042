import { DefaultScope } from './scope.js';
import { standardGlobals } from './builtins.js';

export type { Node, Position, Program } from './ast.js';
export { formatPosition } from './ast.js';
export { parse, ParseError } from './parse.js';
export type {
  Scope, RuntimeValue, Callable, NativeFunction, SpecialForm, GlobalsFactory,
} from './scope.js';
export { DefaultScope, EvalError, isCallable } from './scope.js';
export { standardGlobals, isTruthy, describeValue } from './builtins.js';

/** A root evaluation scope preloaded with the standard globals. */
export function newDefaultScope(): DefaultScope {
  return new DefaultScope(standardGlobals);
}
