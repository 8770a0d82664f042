export type { Value, ValueKind, JsonValue } from './value.js';
export {
  NIL, TRUE, FALSE, int, float, str, bool, list,
  valuesEqual, isFiniteValue, formatValue, fromJson, toJson,
} from './value.js';
export type { VariableChange, ClockVariable } from './variable.js';
export { CLOCK_VARIABLES } from './variable.js';
export {
  UndefinedSymbolError,
  DecodeError,
  NotStorableError,
  UnsupportedScopeOperationError,
  BuiltinArgumentError,
  ChannelClosedError,
  ConfigError,
} from './errors.js';
export type { ScopeOperation, BuiltinArgumentReason } from './errors.js';
