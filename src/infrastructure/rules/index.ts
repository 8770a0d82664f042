export { loadRules, discoverRuleFiles, DEFAULT_RULE_EXTENSION } from './rule-loader.js';
