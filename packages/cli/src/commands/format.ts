/**
 * exclusions format — Simplify and print a single rule
 *
 * Usage:
 *   exclusions format 'any(g:*, g:m, h:*)'   → any(g:*, h:*)
 */

import { Command } from 'commander';
import { parseExcludeSpecOrThrow } from '@exclusions/model';
import type { CliFlags } from '../config.js';
import { buildFactory, printResult, runReported } from './shared.js';
import type { ProgramIO } from './shared.js';

export function formatCommand(io: ProgramIO = {}): Command {
  return new Command('format')
    .description('Parse one rule, simplifying composites while reading')
    .argument('<rule>', 'Exclusion rule in notation')
    .option('--trace', 'Print every engine operation to stderr')
    .option('--no-trace', 'Do not trace, even if EXCLUSIONS_TRACE is set')
    .action((rule: string, flags: CliFlags, command: Command) => {
      runReported(command, () => {
        printResult(parseExcludeSpecOrThrow(rule, buildFactory(flags, io)));
      });
    });
}
