import * as path from 'node:path';
import { buildWeightTable, type WeightSources } from '../../config/weights.js';
import { findProjectRoot, type RootSelection } from '../../scoring/selector.js';
import type { ScoreBreakdown } from '../../scoring/scorer.js';

export interface FindRootCommandOptions {
  start?: string;
  weights: WeightSources;
  verbose?: boolean;
  rel?: boolean;
  json?: boolean;
  cwd?: string;
}

export interface FindRootJson {
  root: string;
  score: number;
  candidates: Array<{ path: string; score: number; name: number; ancestry: number; children: number }>;
}

export function formatCandidateLine(candidate: ScoreBreakdown, isRoot: boolean, displayPath: string): string {
  return `${isRoot ? '**' : ''} ${candidate.total}: ${displayPath}`;
}

export function toFindRootJson(selection: RootSelection, display: (p: string) => string): FindRootJson {
  return {
    root: display(selection.root),
    score: selection.score,
    candidates: selection.candidates.map((candidate) => ({
      path: display(candidate.path),
      score: candidate.total,
      name: candidate.name,
      ancestry: candidate.ancestry,
      children: candidate.children,
    })),
  };
}

export function findRootCommand(options: FindRootCommandOptions): RootSelection {
  const cwd = options.cwd ?? process.cwd();
  const weights = buildWeightTable(options.weights);
  const selection = findProjectRoot({ start: options.start, weights, cwd });

  const display = (p: string): string => (options.rel ? path.relative(cwd, p) || '.' : p);

  if (options.json) {
    console.log(JSON.stringify(toFindRootJson(selection, display), null, 2));
    return selection;
  }

  if (options.verbose) {
    for (const candidate of selection.candidates) {
      console.log(formatCandidateLine(candidate, candidate.path === selection.root, display(candidate.path)));
    }
  }
  console.log(display(selection.root));
  return selection;
}
