/**
 * @fileoverview Shared types for marker patterns and compiled rules
 */

/**
 * Pattern string to signed integer weight. Iteration order is insertion
 * order; setting an existing pattern again replaces its weight.
 */
export type WeightTable = Map<string, number>;

/**
 * Anything a weight table can be built from. Plain objects are read in
 * `Object.entries` order.
 */
export type WeightInput = WeightTable | Readonly<Record<string, number>>;

// child:  starts with `./`, the candidate has a matching entry
// parent: ends with `/`, the candidate's ancestry matches
// name:   anything else, the candidate's own base name matches
export type PatternKind = 'child' | 'name' | 'parent';

interface RuleBase {
  /** Pattern text as it appeared in the weight table. */
  readonly pattern: string;
  readonly matcher: RegExp;
  readonly weight: number;
}

export interface NameRule extends RuleBase {
  readonly kind: 'name';
}

export interface ChildRule extends RuleBase {
  readonly kind: 'child';
  /** Set by a trailing `/` (`./src/`): only directory entries can match. */
  readonly directoryOnly: boolean;
}

export interface ParentRule extends RuleBase {
  readonly kind: 'parent';
  /**
   * Fewest consecutive ancestor names one match spans. Zero when the core is
   * made only of globstars, which match any ancestry.
   */
  readonly segments: number;
  /** The core holds a globstar, so a match may span more than `segments` names. */
  readonly variableSpan: boolean;
  /** No leading globstar segment: the match must start at the top-most ancestor. */
  readonly anchorStart: boolean;
  /** No trailing globstar segment: the match must end at the immediate parent. */
  readonly anchorEnd: boolean;
}

export type CompiledRule = NameRule | ChildRule | ParentRule;

export interface CompiledRuleSet {
  readonly child: readonly ChildRule[];
  readonly name: readonly NameRule[];
  readonly parent: readonly ParentRule[];
}
