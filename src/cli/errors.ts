/**
 * @fileoverview CLI error handling with recovery hints
 *
 * Every failure that reaches the CLI is converted to an {@link ErrorEnvelope},
 * printed on stderr (as JSON under `--json`), and mapped to an exit code.
 */

import { RootFinderError, getErrorMessage, type WeightConfigErrorCode } from '../core/errors.js';

export type CliErrorCode = 'EINVALID_ARGUMENT';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type ErrorCode = CliErrorCode | WeightConfigErrorCode | 'ESTART_PATH' | 'EINTERNAL';

export const ExitCodes = {
  SUCCESS: 0,
  INTERNAL: 1,
  INVALID_ARGUMENT: 2,
  WEIGHT_CONFIG: 3,
  START_PATH: 4,
} as const;

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

const WEIGHT_FILE_HINT = 'Weights files hold a JSON (comments allowed) or YAML object of pattern to integer.';

export const RECOVERY_HINTS: Record<ErrorCode, string[]> = {
  EINVALID_ARGUMENT: ["Run 'rootfinder --help' for usage information."],
  EWEIGHT_FORMAT: ["Write overrides as PATTERN:VALUE or PATTERN=VALUE, e.g. -w './Cargo.toml:100'."],
  EWEIGHT_VALUE: ['Weight values must be base-10 integers, e.g. -w src=-50.'],
  EWEIGHTS_FILE: ['Check that the --weights-file path exists and is readable.', WEIGHT_FILE_HINT],
  EWEIGHTS_PARSE: ['Fix the syntax of the weights document.', WEIGHT_FILE_HINT],
  EWEIGHTS_SCHEMA: ['Every weight must be an integer, e.g. {"./Cargo.toml": 100}.'],
  ESTART_PATH: ['Pass an existing file or directory as the start path.'],
  EINTERNAL: ['Re-run with --debug for diagnostic output.'],
};

const EXIT_CODE_BY_ERROR: Record<ErrorCode, number> = {
  EINVALID_ARGUMENT: ExitCodes.INVALID_ARGUMENT,
  EWEIGHT_FORMAT: ExitCodes.WEIGHT_CONFIG,
  EWEIGHT_VALUE: ExitCodes.WEIGHT_CONFIG,
  EWEIGHTS_FILE: ExitCodes.WEIGHT_CONFIG,
  EWEIGHTS_PARSE: ExitCodes.WEIGHT_CONFIG,
  EWEIGHTS_SCHEMA: ExitCodes.WEIGHT_CONFIG,
  ESTART_PATH: ExitCodes.START_PATH,
  EINTERNAL: ExitCodes.INTERNAL,
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(EXIT_CODE_BY_ERROR, code);
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  options: { recoveryHints?: string[]; context?: Record<string, unknown> } = {},
): ErrorEnvelope {
  return {
    code,
    message,
    recoveryHints: options.recoveryHints ?? RECOVERY_HINTS[code],
    context: options.context,
  };
}

export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(error.code, error.message, { context: error.details });
  }
  if (error instanceof RootFinderError && isErrorCode(error.code)) {
    return createErrorEnvelope(error.code, error.message, { context: error.toJSON().details });
  }
  return createErrorEnvelope('EINTERNAL', getErrorMessage(error));
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return EXIT_CODE_BY_ERROR[envelope.code];
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Hints:', ...envelope.recoveryHints.map((hint) => `  - ${hint}`));
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
