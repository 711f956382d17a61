#!/usr/bin/env node
/**
 * @fileoverview rootfinder CLI entry point
 *
 *   rootfinder [start] [--verbose] [--rel] [-w PATTERN:VALUE ...]
 *              [--weights-json JSON] [--weights-file PATH] [--no-defaults]
 *              [--json] [--debug]
 *
 * @packageDocumentation
 */

import { runCli } from './run.js';

process.exitCode = runCli(process.argv.slice(2));
