/**
 * @fileoverview Per-directory marker scoring
 *
 * A directory's score is the sum of three independent parts:
 *
 * - **name**: name rules matched against the directory's base name
 * - **ancestry**: parent rules matched against the names of its proper
 *   ancestors (the filesystem root, whose name is empty, is not included)
 * - **children**: child rules matched against each immediate entry
 *
 * Ancestry is matched per ancestor, not against the joined path. A parent
 * rule spanning `n` names is tried on every window of `n` consecutive
 * ancestor names (joined with `/`) that its anchoring allows, and each
 * matching window adds the rule's weight once. A core holding a globstar
 * spans a variable number of names, so every longer window is tried too.
 *
 * Rules are compiled once per {@link DirectoryScorer} and shared by every
 * directory it scores.
 */

import * as path from 'node:path';
import { compileWeights } from '../patterns/compiler.js';
import type { CompiledRuleSet, ParentRule, WeightInput } from '../patterns/types.js';
import { loadDefaultWeights } from '../config/weights.js';
import { safeSync, type Result } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import { nodeDirectoryReader, type DirectoryReader } from './directory_reader.js';

export interface ScoreBreakdown {
  readonly path: string;
  readonly name: number;
  readonly ancestry: number;
  readonly children: number;
  readonly total: number;
  /** Present when the directory could not be listed; `children` is then 0. */
  readonly listingError?: string;
}

export interface ScorerOptions {
  reader?: DirectoryReader;
}

/**
 * Names of the proper ancestors of `dir`, top-most first, excluding the
 * filesystem root.
 *
 * @example
 * ancestorNames('/home/dev/app/src') // ['home', 'dev', 'app']
 */
export function ancestorNames(dir: string): string[] {
  const parent = path.dirname(dir);
  if (parent === dir) return [];
  const relativeParent = path.relative(path.parse(dir).root, parent);
  return relativeParent ? relativeParent.split(path.sep) : [];
}

export function countParentMatches(rule: ParentRule, ancestors: readonly string[]): number {
  // Only globstars: any ancestry matches, the empty one included.
  if (rule.segments === 0) return 1;
  const count = ancestors.length;
  const finalStart = rule.anchorStart ? 0 : count - rule.segments;

  let hits = 0;
  for (let start = 0; start <= finalStart; start++) {
    const shortest = start + rule.segments;
    if (shortest > count) break;
    const longest = rule.variableSpan ? count : shortest;
    const firstEnd = rule.anchorEnd ? count : shortest;
    const lastEnd = rule.anchorEnd ? count : longest;
    if (firstEnd > longest) continue;
    for (let end = firstEnd; end <= lastEnd; end++) {
      if (rule.matcher.test(ancestors.slice(start, end).join('/'))) hits++;
    }
  }
  return hits;
}

export class DirectoryScorer {
  private readonly reader: DirectoryReader;

  constructor(
    readonly rules: CompiledRuleSet,
    options: ScorerOptions = {},
  ) {
    this.reader = options.reader ?? nodeDirectoryReader;
  }

  scoreName(name: string): number {
    let total = 0;
    for (const rule of this.rules.name) {
      if (rule.matcher.test(name)) total += rule.weight;
    }
    return total;
  }

  scoreAncestry(ancestors: readonly string[]): number {
    let total = 0;
    for (const rule of this.rules.parent) {
      total += rule.weight * countParentMatches(rule, ancestors);
    }
    return total;
  }

  /**
   * Child-marker score. A directory that cannot be listed is not an error
   * for the caller: it yields an `Err` that {@link explain} turns into 0.
   */
  scoreChildren(dir: string): Result<number, Error> {
    return safeSync(() => {
      let total = 0;
      if (this.rules.child.length === 0) return total;
      for (const entry of this.reader.readEntries(dir)) {
        for (const rule of this.rules.child) {
          if (!rule.matcher.test(entry.name)) continue;
          if (rule.directoryOnly && !entry.isDirectory()) continue;
          total += rule.weight;
        }
      }
      return total;
    });
  }

  explain(dir: string): ScoreBreakdown {
    const absolute = path.resolve(dir);
    const name = this.scoreName(path.basename(absolute));
    const ancestry = this.scoreAncestry(ancestorNames(absolute));
    const childResult = this.scoreChildren(absolute);

    if (!childResult.ok) {
      logDebug('Directory not listable; child markers count as 0', {
        path: absolute,
        error: childResult.error.message,
      });
      return {
        path: absolute,
        name,
        ancestry,
        children: 0,
        total: name + ancestry,
        listingError: childResult.error.message,
      };
    }

    const children = childResult.value;
    return { path: absolute, name, ancestry, children, total: name + ancestry + children };
  }

  score(dir: string): number {
    return this.explain(dir).total;
  }
}

/**
 * Build a scorer for a weight table, or for the bundled defaults when no
 * table is given.
 */
export function createScorer(weights?: WeightInput, options: ScorerOptions = {}): DirectoryScorer {
  return new DirectoryScorer(compileWeights(weights ?? loadDefaultWeights()), options);
}

export function scoreDirectory(dir: string, weights?: WeightInput, options: ScorerOptions = {}): number {
  return createScorer(weights, options).score(dir);
}
