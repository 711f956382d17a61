/**
 * @fileoverview Project root selection
 *
 * Scores the start directory and each of its ancestors, closest first, and
 * keeps the first candidate with the highest score. A candidate only replaces
 * the current best when it scores strictly higher, so ties go to the
 * directory nearer the start and an all-zero chain selects the start itself.
 */

import { realpathSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import * as path from 'node:path';
import { StartPathError, getErrorMessage } from '../core/errors.js';
import type { WeightInput } from '../patterns/types.js';
import { logDebug } from '../telemetry/logger.js';
import { createScorer, type DirectoryScorer, type ScoreBreakdown, type ScorerOptions } from './scorer.js';

export interface RootSelection {
  readonly root: string;
  readonly score: number;
  /** Every candidate's total, closest to the start first. */
  readonly scores: ReadonlyMap<string, number>;
  readonly candidates: readonly ScoreBreakdown[];
}

export interface FindRootOptions extends ScorerOptions {
  /** Defaults to `cwd`. */
  start?: string;
  /** Defaults to the bundled weights. */
  weights?: WeightInput;
  cwd?: string;
}

function firstSeparator(input: string): number {
  const slash = input.indexOf('/');
  const native = input.indexOf(path.sep);
  if (slash === -1) return native;
  if (native === -1) return slash;
  return Math.min(slash, native);
}

/**
 * Expand a leading `~` or `~user`. Other users' homes are taken to sit
 * beside the current user's home directory.
 *
 * @example
 * expandHome('~/src')     // '/home/dev/src'
 * expandHome('~ops/src')  // '/home/ops/src'
 */
export function expandHome(input: string): string {
  if (!input.startsWith('~')) return input;
  const cut = firstSeparator(input);
  const user = cut === -1 ? input.slice(1) : input.slice(1, cut);
  const rest = cut === -1 ? '' : input.slice(cut + 1);
  const home = user === '' ? homedir() : path.join(path.dirname(homedir()), user);
  return rest === '' ? home : path.join(home, rest);
}

/**
 * Absolute, symlink-free directory for a start path. A path naming a file
 * resolves to the file's directory.
 *
 * @throws {StartPathError} when the path does not exist or cannot be read
 */
export function resolveStartPath(start?: string, cwd: string = process.cwd()): string {
  const requested = start ?? cwd;
  const absolute = path.resolve(cwd, expandHome(requested));

  try {
    const real = realpathSync(absolute);
    return statSync(real).isDirectory() ? real : path.dirname(real);
  } catch (error) {
    throw new StartPathError(requested, getErrorMessage(error), error instanceof Error ? error : undefined);
  }
}

/**
 * `start` followed by each ancestor up to and including the filesystem root.
 */
export function listCandidates(start: string): string[] {
  const candidates = [start];
  let current = start;
  for (let parent = path.dirname(current); parent !== current; parent = path.dirname(current)) {
    candidates.push(parent);
    current = parent;
  }
  return candidates;
}

/**
 * First entry with the highest total. Entries must be ordered closest first.
 */
export function pickBest<T extends { readonly total: number }>(scored: readonly T[]): T {
  const [first, ...rest] = scored;
  if (first === undefined) {
    throw new Error('Cannot pick a root from an empty candidate list');
  }
  let best = first;
  for (const entry of rest) {
    if (entry.total > best.total) best = entry;
  }
  return best;
}

/**
 * Score every candidate from `start` upward with `scorer` and pick the root.
 * `start` is resolved with {@link resolveStartPath}.
 */
export function selectRoot(scorer: DirectoryScorer, start?: string, cwd?: string): RootSelection {
  const resolvedStart = resolveStartPath(start, cwd);
  const candidates = listCandidates(resolvedStart).map((candidate) => scorer.explain(candidate));
  const best = pickBest(candidates);

  logDebug('Project root selected', {
    start: resolvedStart,
    root: best.path,
    score: best.total,
    candidates: candidates.length,
  });

  return {
    root: best.path,
    score: best.total,
    scores: new Map(candidates.map((candidate) => [candidate.path, candidate.total])),
    candidates,
  };
}

/**
 * Heuristically find the project root for `options.start` (or the current
 * working directory).
 *
 * @example
 * const { root } = findProjectRoot({ start: 'packages/api/src' });
 */
export function findProjectRoot(options: FindRootOptions = {}): RootSelection {
  const scorer = createScorer(options.weights, { reader: options.reader });
  return selectRoot(scorer, options.start, options.cwd);
}
