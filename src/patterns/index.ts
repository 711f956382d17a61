export { globToRegExp, escapeRegExp } from './glob.js';
export { classifyPattern, compileRule, compileWeights, countRules } from './compiler.js';
export type {
  ChildRule,
  CompiledRule,
  CompiledRuleSet,
  NameRule,
  ParentRule,
  PatternKind,
  WeightInput,
  WeightTable,
} from './types.js';
