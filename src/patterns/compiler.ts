/**
 * @fileoverview Weight table compilation
 *
 * Splits a weight table into child, name and parent rules and compiles each
 * pattern's matcher once. The classification is purely lexical:
 *
 * 1. a leading `./` makes a child pattern
 * 2. otherwise a trailing `/` makes a parent pattern
 * 3. anything else is a name pattern
 *
 * Compilation cannot fail; every string, the empty one included, is a pattern.
 */

import { globToRegExp } from './glob.js';
import type {
  ChildRule,
  CompiledRule,
  CompiledRuleSet,
  NameRule,
  ParentRule,
  PatternKind,
  WeightInput,
} from './types.js';

const CHILD_PREFIX = './';
const GLOBSTAR = '**';
const GLOBSTAR_HEAD = '**/';
const GLOBSTAR_TAIL = '/**';

export function classifyPattern(pattern: string): PatternKind {
  if (pattern.startsWith(CHILD_PREFIX)) return 'child';
  if (pattern.endsWith('/')) return 'parent';
  return 'name';
}

function compileChildRule(pattern: string, weight: number): ChildRule {
  let glob = pattern.slice(CHILD_PREFIX.length);
  const directoryOnly = glob.length > 0 && glob.endsWith('/');
  if (directoryOnly) glob = glob.slice(0, -1);
  return { kind: 'child', pattern, matcher: globToRegExp(glob), weight, directoryOnly };
}

// `**/node_modules/**/` -> core `node_modules`, floating at both ends.
// `**/foo/*/`           -> core `foo/*`, must end at the immediate parent.
// `**/a/**/b/**/`       -> core `a/**/b`, spans two or more names.
// `**/`                 -> core `**`, matches any ancestry once.
function compileParentRule(pattern: string, weight: number): ParentRule {
  let core = pattern.slice(0, -1);
  const anchorStart = !core.startsWith(GLOBSTAR_HEAD);
  if (!anchorStart) core = core.slice(GLOBSTAR_HEAD.length);
  const anchorEnd = !core.endsWith(GLOBSTAR_TAIL);
  if (!anchorEnd) core = core.slice(0, -GLOBSTAR_TAIL.length);
  return {
    kind: 'parent',
    pattern,
    matcher: globToRegExp(core),
    weight,
    segments: core.split('/').filter((segment) => segment !== GLOBSTAR).length,
    variableSpan: core.includes(GLOBSTAR),
    anchorStart,
    anchorEnd,
  };
}

function compileNameRule(pattern: string, weight: number): NameRule {
  return { kind: 'name', pattern, matcher: globToRegExp(pattern), weight };
}

export function compileRule(pattern: string, weight: number): CompiledRule {
  switch (classifyPattern(pattern)) {
    case 'child':
      return compileChildRule(pattern, weight);
    case 'parent':
      return compileParentRule(pattern, weight);
    case 'name':
      return compileNameRule(pattern, weight);
  }
}

function entriesOf(weights: WeightInput): Iterable<readonly [string, number]> {
  if (weights instanceof Map) return weights.entries();
  return Object.entries(weights);
}

/**
 * Compile a weight table into frozen rule sets, preserving the table's
 * iteration order within each kind.
 */
export function compileWeights(weights: WeightInput): CompiledRuleSet {
  const child: ChildRule[] = [];
  const name: NameRule[] = [];
  const parent: ParentRule[] = [];

  for (const [pattern, weight] of entriesOf(weights)) {
    const rule = compileRule(pattern, weight);
    switch (rule.kind) {
      case 'child':
        child.push(Object.freeze(rule));
        break;
      case 'parent':
        parent.push(Object.freeze(rule));
        break;
      case 'name':
        name.push(Object.freeze(rule));
        break;
    }
  }

  return Object.freeze({
    child: Object.freeze(child),
    name: Object.freeze(name),
    parent: Object.freeze(parent),
  });
}

export function countRules(rules: CompiledRuleSet): number {
  return rules.child.length + rules.name.length + rules.parent.length;
}
