/**
 * @fileoverview rootfinder error hierarchy
 *
 * Fatal input problems are thrown as typed errors so the CLI can map them to
 * exit codes. Recoverable filesystem problems never reach this hierarchy; the
 * scorer absorbs them (see scoring/scorer.ts).
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class RootFinderError extends Error {
  abstract readonly code: string;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// WEIGHT CONFIGURATION ERRORS
// ============================================================================

export type WeightConfigErrorCode =
  | 'EWEIGHT_FORMAT'
  | 'EWEIGHT_VALUE'
  | 'EWEIGHTS_FILE'
  | 'EWEIGHTS_PARSE'
  | 'EWEIGHTS_SCHEMA';

export class WeightConfigError extends RootFinderError {
  constructor(
    readonly code: WeightConfigErrorCode,
    message: string,
    /** The override string, file path, or `--weights-json` label that was rejected. */
    readonly source: string,
    readonly cause?: Error,
  ) {
    super(message);
    this.name = 'WeightConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        source: this.source,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// START PATH ERRORS
// ============================================================================

export class StartPathError extends RootFinderError {
  readonly code = 'ESTART_PATH';

  constructor(
    readonly startPath: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Cannot resolve start path '${startPath}': ${message}`);
    this.name = 'StartPathError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        startPath: this.startPath,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isRootFinderError(error: unknown): error is RootFinderError {
  return error instanceof RootFinderError;
}

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}
