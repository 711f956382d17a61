export {
  DirectoryScorer,
  ancestorNames,
  countParentMatches,
  createScorer,
  scoreDirectory,
  type ScoreBreakdown,
  type ScorerOptions,
} from './scorer.js';
export {
  findProjectRoot,
  listCandidates,
  pickBest,
  resolveStartPath,
  selectRoot,
  type FindRootOptions,
  type RootSelection,
} from './selector.js';
export { nodeDirectoryReader, type DirectoryEntry, type DirectoryReader } from './directory_reader.js';
