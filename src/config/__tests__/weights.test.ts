/**
 * @fileoverview Tests for weight table sources and layering
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { WeightConfigError } from '../../core/errors.js';
import {
  buildWeightTable,
  loadDefaultWeights,
  loadWeightsFile,
  mergeWeights,
  parseWeightOverride,
  parseWeightsJson,
  toWeightTable,
} from '../weights.js';

function captureError(fn: () => unknown): WeightConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof WeightConfigError) return error;
    throw error;
  }
  throw new Error('Expected a WeightConfigError');
}

describe('parseWeightOverride', () => {
  it('parses pattern:value and pattern=value', () => {
    expect(parseWeightOverride('./Cargo.toml:100')).toEqual(['./Cargo.toml', 100]);
    expect(parseWeightOverride('src=-50')).toEqual(['src', -50]);
    expect(parseWeightOverride('bin=+5')).toEqual(['bin', 5]);
  });

  it('splits on the last separator', () => {
    expect(parseWeightOverride('C:/work:10')).toEqual(['C:/work', 10]);
    expect(parseWeightOverride('a=b=3')).toEqual(['a=b', 3]);
  });

  it('prefers = over : when both appear', () => {
    expect(parseWeightOverride('./a:b=3')).toEqual(['./a:b', 3]);
  });

  it('accepts an empty pattern', () => {
    expect(parseWeightOverride('=-100')).toEqual(['', -100]);
  });

  it('allows whitespace around the value', () => {
    expect(parseWeightOverride('src: 7 ')).toEqual(['src', 7]);
  });

  it('rejects a string without separator', () => {
    const error = captureError(() => parseWeightOverride('Makefile'));

    expect(error.code).toBe('EWEIGHT_FORMAT');
    expect(error.source).toBe('Makefile');
  });

  it('rejects values that are not base-10 integers', () => {
    for (const raw of ['src:ten', 'src:1.5', 'src:', 'src:0x10', 'src:1e3', 'a=b:3']) {
      expect(captureError(() => parseWeightOverride(raw)).code).toBe('EWEIGHT_VALUE');
    }
  });

  it('rejects integers beyond the safe range', () => {
    expect(captureError(() => parseWeightOverride('src:99999999999999999999')).code).toBe('EWEIGHT_VALUE');
  });
});

describe('toWeightTable', () => {
  it('accepts an object of integers', () => {
    expect(toWeightTable({ './go.mod': 40, src: -100 }, 'test')).toEqual(
      new Map([
        ['./go.mod', 40],
        ['src', -100],
      ]),
    );
  });

  it('rejects non-integer weights', () => {
    const error = captureError(() => toWeightTable({ src: 1.5 }, 'weights.json'));

    expect(error.code).toBe('EWEIGHTS_SCHEMA');
    expect(error.message).toContain("at 'src'");
  });

  it('rejects integers beyond the safe range', () => {
    const error = captureError(() => toWeightTable({ './Cargo.toml': 1e20 }, 'weights.json'));

    expect(error.code).toBe('EWEIGHTS_SCHEMA');
    expect(error.message).toBe(
      "Weights from weights.json must be an object mapping patterns to integers at './Cargo.toml': Weight must be a safe integer",
    );
  });

  it('rejects non-objects', () => {
    expect(captureError(() => toWeightTable([1, 2], 'x')).code).toBe('EWEIGHTS_SCHEMA');
    expect(captureError(() => toWeightTable(null, 'x')).code).toBe('EWEIGHTS_SCHEMA');
    expect(captureError(() => toWeightTable('src', 'x')).code).toBe('EWEIGHTS_SCHEMA');
  });
});

describe('parseWeightsJson', () => {
  it('parses an inline JSON object', () => {
    expect(parseWeightsJson('{"./Cargo.toml": 100}')).toEqual(new Map([['./Cargo.toml', 100]]));
  });

  it('rejects invalid JSON', () => {
    const error = captureError(() => parseWeightsJson('{"./Cargo.toml": }'));

    expect(error.code).toBe('EWEIGHTS_PARSE');
    expect(error.source).toBe('--weights-json');
  });

  it('applies the same integer range as overrides', () => {
    expect(captureError(() => parseWeightsJson('{"./Cargo.toml": 1e20}')).code).toBe('EWEIGHTS_SCHEMA');
    expect(parseWeightsJson('{"./Cargo.toml": 9007199254740991}')).toEqual(
      new Map([['./Cargo.toml', 9007199254740991]]),
    );
  });
});

describe('weights files', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'rootfinder-weights-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('loads JSON with comments', () => {
    const file = join(testDir, 'weights.json');
    writeFileSync(file, '{\n  // rust first\n  "./Cargo.toml": 100, /* python */ "./setup.py": 1\n}\n');

    expect(loadWeightsFile(file)).toEqual(
      new Map([
        ['./Cargo.toml', 100],
        ['./setup.py', 1],
      ]),
    );
  });

  it('loads YAML by extension', () => {
    const file = join(testDir, 'weights.yml');
    writeFileSync(file, '"./go.mod": 90\n"**/vendor/**/": -120\n');

    expect(loadWeightsFile(file)).toEqual(
      new Map([
        ['./go.mod', 90],
        ['**/vendor/**/', -120],
      ]),
    );
  });

  it('reports a missing file', () => {
    const file = join(testDir, 'missing.json');
    const error = captureError(() => loadWeightsFile(file));

    expect(error.code).toBe('EWEIGHTS_FILE');
    expect(error.source).toBe(file);
    expect(error.message).toContain('ENOENT');
  });

  it('reports a file that does not parse', () => {
    const file = join(testDir, 'weights.json');
    writeFileSync(file, '{ not json');

    expect(captureError(() => loadWeightsFile(file)).code).toBe('EWEIGHTS_PARSE');
  });

  it('reports an empty YAML document as a schema error', () => {
    const file = join(testDir, 'weights.yaml');
    writeFileSync(file, '');

    expect(captureError(() => loadWeightsFile(file)).code).toBe('EWEIGHTS_SCHEMA');
  });

  describe('buildWeightTable', () => {
    it('applies file, inline JSON and overrides in increasing precedence', () => {
      const file = join(testDir, 'weights.json');
      writeFileSync(file, JSON.stringify({ a: 1, b: 1, c: 1 }));

      const table = buildWeightTable({
        useDefaults: false,
        weightsFile: file,
        weightsJson: '{"b": 2, "c": 2}',
        overrides: ['c=3'],
      });

      expect(table).toEqual(
        new Map([
          ['a', 1],
          ['b', 2],
          ['c', 3],
        ]),
      );
    });

    it('keeps the other defaults when overriding one', () => {
      const defaults = loadDefaultWeights();
      const table = buildWeightTable({ overrides: ['./Cargo.toml:100'] });

      expect(table.get('./Cargo.toml')).toBe(100);
      expect(table.size).toBe(defaults.size);
      for (const [pattern, weight] of defaults) {
        if (pattern !== './Cargo.toml') expect(table.get(pattern)).toBe(weight);
      }
    });

    it('starts empty without defaults', () => {
      expect(buildWeightTable({ useDefaults: false }).size).toBe(0);
    });

    it('fails before scoring on a bad override', () => {
      expect(() => buildWeightTable({ overrides: ['nothing-here'] })).toThrow(WeightConfigError);
    });
  });
});

describe('loadDefaultWeights', () => {
  it('contains the bundled markers', () => {
    const defaults = loadDefaultWeights();

    expect(defaults.get('./package.json')).toBe(40);
    expect(defaults.get('./Cargo.toml')).toBe(40);
    expect(defaults.get('./README.md')).toBe(5);
    expect(defaults.get('node_modules')).toBe(-100);
    expect(defaults.get('')).toBe(-100);
    expect(defaults.get('**/node_modules/**/')).toBe(-200);
    expect(defaults.get('**/*cache*/**/')).toBe(-50);
  });

  it('returns a fresh table each time', () => {
    const first = loadDefaultWeights();
    first.set('./package.json', 0);

    expect(loadDefaultWeights().get('./package.json')).toBe(40);
  });
});

describe('mergeWeights', () => {
  it('overwrites existing patterns and appends new ones', () => {
    const target = new Map([
      ['a', 1],
      ['b', 1],
    ]);

    mergeWeights(target, new Map([['b', 5], ['c', 9]]));

    expect([...target]).toEqual([
      ['a', 1],
      ['b', 5],
      ['c', 9],
    ]);
  });
});
