import { parseArgs } from 'node:util';
import { CliError } from './errors.js';

export interface CliOptions {
  start?: string;
  help: boolean;
  version: boolean;
  verbose: boolean;
  rel: boolean;
  json: boolean;
  debug: boolean;
  noDefaults: boolean;
  weights: string[];
  weightsJson?: string;
  weightsFile?: string;
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        verbose: { type: 'boolean', default: false },
        rel: { type: 'boolean', default: false },
        json: { type: 'boolean', default: false },
        debug: { type: 'boolean', default: false },
        'no-defaults': { type: 'boolean', default: false },
        weight: { type: 'string', short: 'w', multiple: true },
        'weights-json': { type: 'string' },
        'weights-file': { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new CliError(error instanceof Error ? error.message : String(error), 'EINVALID_ARGUMENT');
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    throw new CliError(`Expected at most one start path, got ${positionals.length}`, 'EINVALID_ARGUMENT', {
      positionals,
    });
  }

  return {
    start: positionals[0],
    help: values.help ?? false,
    version: values.version ?? false,
    verbose: values.verbose ?? false,
    rel: values.rel ?? false,
    json: values.json ?? false,
    debug: values.debug ?? false,
    noDefaults: values['no-defaults'] ?? false,
    weights: values.weight ?? [],
    weightsJson: values['weights-json'],
    weightsFile: values['weights-file'],
  };
}
