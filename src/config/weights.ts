/**
 * @fileoverview Weight table sources
 *
 * A weight table is assembled from up to four layers, each overwriting the
 * patterns it names:
 *
 * 1. the bundled defaults (`data/default_weights.json`), unless disabled
 * 2. a weights file (JSON with comments, or YAML by extension)
 * 3. an inline JSON object string
 * 4. individual `pattern:value` / `pattern=value` overrides
 *
 * Every failure here is fatal and surfaces as a {@link WeightConfigError}
 * before any directory is scored.
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import stripJsonComments from 'strip-json-comments';
import YAML from 'yaml';
import { z } from 'zod';
import { WeightConfigError } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import type { WeightTable } from '../patterns/types.js';

export const DEFAULT_WEIGHTS_PATH = fileURLToPath(new URL('../../data/default_weights.json', import.meta.url));

/** Label used as the error source for `--weights-json` input. */
export const INLINE_JSON_SOURCE = '--weights-json';

export const WeightTableSchema = z.record(
  z.string(),
  z.number().int().refine(Number.isSafeInteger, { message: 'Weight must be a safe integer' }),
);

export interface WeightSources {
  /** Start from the bundled defaults. Defaults to true. */
  useDefaults?: boolean;
  weightsFile?: string;
  weightsJson?: string;
  overrides?: readonly string[];
}

// ============================================================================
// VALIDATION
// ============================================================================

export function toWeightTable(value: unknown, source: string): WeightTable {
  const parsed = WeightTableSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new WeightConfigError(
      'EWEIGHTS_SCHEMA',
      `Weights from ${source} must be an object mapping patterns to integers${where}: ${issue?.message ?? 'invalid value'}`,
      source,
    );
  }
  return new Map(Object.entries(parsed.data));
}

// ============================================================================
// LOADERS
// ============================================================================

export function parseWeightsJson(text: string, source: string = INLINE_JSON_SOURCE): WeightTable {
  const parsed = safeSync((): unknown => JSON.parse(text));
  if (!parsed.ok) {
    throw new WeightConfigError(
      'EWEIGHTS_PARSE',
      `Invalid JSON in ${source}: ${parsed.error.message}`,
      source,
      parsed.error,
    );
  }
  return toWeightTable(parsed.value, source);
}

function parseWeightsDocument(filePath: string, content: string): unknown {
  const ext = extname(filePath).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return YAML.parse(content);
  return JSON.parse(stripJsonComments(content));
}

export function loadWeightsFile(filePath: string): WeightTable {
  const content = safeSync(() => readFileSync(filePath, 'utf8'));
  if (!content.ok) {
    throw new WeightConfigError(
      'EWEIGHTS_FILE',
      `Cannot read weights file ${filePath}: ${content.error.message}`,
      filePath,
      content.error,
    );
  }

  const parsed = safeSync(() => parseWeightsDocument(filePath, content.value));
  if (!parsed.ok) {
    throw new WeightConfigError(
      'EWEIGHTS_PARSE',
      `Cannot parse weights file ${filePath}: ${parsed.error.message}`,
      filePath,
      parsed.error,
    );
  }
  return toWeightTable(parsed.value, filePath);
}

/**
 * Bundled default weights. Returns a fresh table on every call, so callers
 * may modify it.
 */
export function loadDefaultWeights(): WeightTable {
  return loadWeightsFile(DEFAULT_WEIGHTS_PATH);
}

// ============================================================================
// OVERRIDES
// ============================================================================

// `=` wins over `:` when both appear; the split is on the last occurrence so
// patterns may themselves contain the separator.
const OVERRIDE_SEPARATORS = ['=', ':'] as const;
const INTEGER_PATTERN = /^[+-]?\d+$/;

function parseWeightValue(text: string, raw: string): number {
  const trimmed = text.trim();
  const value = INTEGER_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw new WeightConfigError(
      'EWEIGHT_VALUE',
      `Invalid weight value '${text}' in '${raw}' (expected a base-10 integer)`,
      raw,
    );
  }
  return value;
}

export function parseWeightOverride(raw: string): [pattern: string, weight: number] {
  for (const separator of OVERRIDE_SEPARATORS) {
    const index = raw.lastIndexOf(separator);
    if (index === -1) continue;
    return [raw.slice(0, index), parseWeightValue(raw.slice(index + 1), raw)];
  }
  throw new WeightConfigError(
    'EWEIGHT_FORMAT',
    `Invalid weight format '${raw}' (expected 'pattern:value' or 'pattern=value')`,
    raw,
  );
}

// ============================================================================
// LAYERING
// ============================================================================

export function mergeWeights(target: WeightTable, layer: ReadonlyMap<string, number>): WeightTable {
  for (const [pattern, weight] of layer) {
    target.set(pattern, weight);
  }
  return target;
}

export function buildWeightTable(sources: WeightSources = {}): WeightTable {
  const table: WeightTable = sources.useDefaults === false ? new Map() : loadDefaultWeights();

  if (sources.weightsFile !== undefined) {
    mergeWeights(table, loadWeightsFile(sources.weightsFile));
  }
  if (sources.weightsJson !== undefined) {
    mergeWeights(table, parseWeightsJson(sources.weightsJson));
  }
  for (const raw of sources.overrides ?? []) {
    const [pattern, weight] = parseWeightOverride(raw);
    table.set(pattern, weight);
  }

  logDebug('Weight table assembled', {
    patterns: table.size,
    defaults: sources.useDefaults !== false,
    weightsFile: sources.weightsFile,
    inlineJson: sources.weightsJson !== undefined,
    overrides: sources.overrides?.length ?? 0,
  });
  return table;
}
