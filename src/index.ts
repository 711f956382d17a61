/**
 * @fileoverview rootfinder - heuristic project root detection
 *
 * Scores a start directory and each of its ancestors against weighted marker
 * patterns and returns the best-scoring one.
 *
 * ```typescript
 * import { findProjectRoot } from 'rootfinder';
 *
 * const { root, scores } = findProjectRoot({ start: 'packages/api/src' });
 * ```
 *
 * Custom tables layer over the defaults:
 *
 * ```typescript
 * import { buildWeightTable, createScorer, selectRoot } from 'rootfinder';
 *
 * const scorer = createScorer(buildWeightTable({ overrides: ['./Cargo.toml:100'] }));
 * const { root } = selectRoot(scorer, process.cwd());
 * ```
 *
 * @packageDocumentation
 */

export { ROOTFINDER_VERSION } from './version.js';

// Patterns
export {
  classifyPattern,
  compileRule,
  compileWeights,
  countRules,
  escapeRegExp,
  globToRegExp,
  type ChildRule,
  type CompiledRule,
  type CompiledRuleSet,
  type NameRule,
  type ParentRule,
  type PatternKind,
  type WeightInput,
  type WeightTable,
} from './patterns/index.js';

// Scoring
export {
  DirectoryScorer,
  ancestorNames,
  countParentMatches,
  createScorer,
  findProjectRoot,
  listCandidates,
  nodeDirectoryReader,
  pickBest,
  resolveStartPath,
  scoreDirectory,
  selectRoot,
  type DirectoryEntry,
  type DirectoryReader,
  type FindRootOptions,
  type RootSelection,
  type ScoreBreakdown,
  type ScorerOptions,
} from './scoring/index.js';

// Weight tables
export {
  DEFAULT_WEIGHTS_PATH,
  WeightTableSchema,
  buildWeightTable,
  loadDefaultWeights,
  loadWeightsFile,
  mergeWeights,
  parseWeightOverride,
  parseWeightsJson,
  toWeightTable,
  type WeightSources,
} from './config/weights.js';

// Errors
export {
  RootFinderError,
  StartPathError,
  WeightConfigError,
  getErrorMessage,
  isRootFinderError,
  type ErrorJSON,
  type WeightConfigErrorCode,
} from './core/errors.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';
