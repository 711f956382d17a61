import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import type { RootSelection } from '../../../scoring/selector.js';
import { findRootCommand, formatCandidateLine, toFindRootJson } from '../find_root.js';

describe('formatCandidateLine', () => {
  const breakdown = { path: '/work/app', name: 0, ancestry: -5, children: 45, total: 40 };

  it('marks the root with **', () => {
    expect(formatCandidateLine(breakdown, true, '/work/app')).toBe('** 40: /work/app');
  });

  it('starts other lines with a space', () => {
    expect(formatCandidateLine({ ...breakdown, total: -100 }, false, '/')).toBe(' -100: /');
  });
});

describe('toFindRootJson', () => {
  it('renders candidates through the display function', () => {
    const selection: RootSelection = {
      root: '/work/app',
      score: 40,
      scores: new Map([
        ['/work/app/src', -100],
        ['/work/app', 40],
      ]),
      candidates: [
        { path: '/work/app/src', name: -100, ancestry: 0, children: 0, total: -100 },
        { path: '/work/app', name: 0, ancestry: 0, children: 40, total: 40 },
      ],
    };

    expect(toFindRootJson(selection, (p) => path.posix.relative('/work', p))).toEqual({
      root: 'app',
      score: 40,
      candidates: [
        { path: 'app/src', score: -100, name: -100, ancestry: 0, children: 0 },
        { path: 'app', score: 40, name: 0, ancestry: 0, children: 40 },
      ],
    });
  });
});

describe('findRootCommand', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = realpathSync(mkdtempSync(path.join(tmpdir(), 'rootfinder-command-')));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns the selection and prints the root', () => {
    const app = path.join(testDir, 'app');
    mkdirSync(path.join(app, 'src'), { recursive: true });
    writeFileSync(path.join(app, 'rootfinder-command-marker'), '');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const selection = findRootCommand({
      start: path.join(app, 'src'),
      weights: { useDefaults: false, overrides: ['./rootfinder-command-marker=12', 'src=-3'] },
    });

    expect(selection.root).toBe(app);
    expect(selection.score).toBe(12);
    expect(selection.scores.get(path.join(app, 'src'))).toBe(-3);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(app);
  });
});
