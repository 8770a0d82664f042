export { Channel } from './channel.js';
export { KeyedLock } from './keyed-lock.js';
export { VariableManager, DEFAULT_VARIABLE_PREFIX } from './variable-manager.js';
export { GlobalScope } from './global-scope.js';
export { createActions, createRunAction, createLogAction, runCommand } from './actions.js';
export { Rule } from './rule.js';
export type { RuleDeps } from './rule.js';
export { startClock, publishTime, clockValues, DEFAULT_CLOCK_INTERVAL_MS } from './clock.js';
export type { ClockOptions } from './clock.js';
export { RuleManager, DEFAULT_BATCH_WARN_THRESHOLD } from './rule-manager.js';
export type { RuleManagerOptions, LoadOptions, BatchResult } from './rule-manager.js';
export { variableBodySchema, variableNameSchema } from './variable-schema.js';
export type { VariableBody } from './variable-schema.js';
