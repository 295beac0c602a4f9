// src/engine/index.ts

export * from './types.js';
export { RuleEngine, defineStruct, engineMessage } from './rule-engine.js';
export { BUILTIN_RULES, isEmptyValue } from './builtin-rules.js';
export { parseRules } from './rule-parser.js';
export type { ParsedRules, ParsedTag, RuleTag } from './rule-parser.js';
