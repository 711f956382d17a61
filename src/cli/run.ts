import { ROOTFINDER_VERSION } from '../version.js';
import { setLogLevel } from '../telemetry/logger.js';
import { parseCliArgs } from './args.js';
import { findRootCommand } from './commands/find_root.js';
import { ExitCodes, classifyError, formatErrorJson, formatErrorWithHints, getExitCode } from './errors.js';
import { showHelp } from './help.js';

/**
 * Run the CLI for `argv` (without the node and script entries) and return
 * the exit code. Output goes to stdout, errors to stderr.
 */
export function runCli(argv: string[], cwd: string = process.cwd()): number {
  // Checked before parsing so that argument errors honour it too.
  const jsonMode = argv.includes('--json');

  try {
    const options = parseCliArgs(argv);
    if (options.debug) setLogLevel('debug');

    if (options.help) {
      showHelp();
      return ExitCodes.SUCCESS;
    }
    if (options.version) {
      console.log(`rootfinder ${ROOTFINDER_VERSION.string}`);
      return ExitCodes.SUCCESS;
    }

    findRootCommand({
      start: options.start,
      weights: {
        useDefaults: !options.noDefaults,
        weightsFile: options.weightsFile,
        weightsJson: options.weightsJson,
        overrides: options.weights,
      },
      verbose: options.verbose,
      rel: options.rel,
      json: options.json,
      cwd,
    });
    return ExitCodes.SUCCESS;
  } catch (error) {
    const envelope = classifyError(error);
    console.error(jsonMode ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
    return getExitCode(envelope);
  }
}
