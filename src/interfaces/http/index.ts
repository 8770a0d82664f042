export { default as enginePlugin } from './engine-plugin.js';
export type { EnginePluginOptions } from './engine-plugin.js';
export { default as variableRoutes } from './variable-routes.js';
export { default as ruleRoutes } from './rule-routes.js';
export { buildServer } from './server.js';
export type { ServerDeps } from './server.js';
