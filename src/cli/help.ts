/**
 * @fileoverview Help text for the rootfinder CLI
 */

export const HELP_TEXT = `
rootfinder - Heuristically detect the root of a project directory

USAGE:
    rootfinder [start] [options]

    Scores the start directory (default: current directory) and each of its
    ancestors against weighted marker patterns and prints the best one.
    A leading ~ or ~user in the start path is expanded; other users' homes
    are looked for beside your own home directory.

OPTIONS:
    -w, --weight PATTERN:VALUE  Add or override a weight, e.g. './Cargo.toml:100'
                                or 'src=-50'. Repeatable; highest precedence.
    --weights-json JSON         Weights as a JSON object string
    --weights-file PATH         Weights file (JSON with comments, or .yaml/.yml)
    --no-defaults               Start from an empty table instead of the defaults
    --verbose                   Print every candidate and its score (** marks the root)
    --rel                       Print paths relative to the current directory
    --json                      Print the result (and errors) as JSON
    --debug                     Log diagnostics to stderr
    -h, --help                  Show this help
    -v, --version               Show version information

PATTERNS:
    ./name     the directory contains an entry called name
    ./name/    ... and that entry is a directory
    name       the directory itself is called name
    **/name/**/  name appears anywhere among the ancestors
    **/name/   the immediate parent is called name

    * matches within one name, ** matches across '/', everything else is literal.

EXIT CODES:
    0  root printed
    1  internal error
    2  invalid arguments
    3  invalid weight configuration
    4  start path cannot be resolved
`;

export function showHelp(): void {
  console.log(HELP_TEXT.trim());
}
