/**
 * @exclusions/cli
 *
 * Developer CLI for the exclusion engine. The `exclusions` binary lives in
 * src/bin/exclusions.ts; this module exports the pieces for embedding and
 * testing.
 */

export { createProgram } from './commands/index.js';
export { combineRules, intersectCommand, unionCommand } from './commands/combine.js';
export { formatCommand } from './commands/format.js';
export type { ProgramIO } from './commands/shared.js';
export { DEFAULT_CLI_CONFIG, resolveCliConfig } from './config.js';
export type { CliConfig, CliFlags } from './config.js';
export { ConsoleLogSink } from './output/console-log-sink.js';
