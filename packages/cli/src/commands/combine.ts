/**
 * exclusions union / intersect — Combine rules through the engine
 *
 * Usage:
 *   exclusions union 'org.foo:*' 'org.foo:bar'         → org.foo:*
 *   exclusions intersect 'org.foo:*' '*:bar'           → org.foo:bar
 *   exclusions union --trace 'x:y' 'all(a:*, *:m)'     → any(a:m, x:y), with a trace
 *
 * Each rule is parsed with the configured engine, so a composite inside a
 * single rule is simplified before the rules are combined.
 */

import { Command } from 'commander';
import { parseExcludeSpecOrThrow } from '@exclusions/model';
import type { ExcludeFactory, ExcludeSpec } from '@exclusions/model';
import type { CombineOperation } from '@exclusions/engine';
import type { CliFlags } from '../config.js';
import { buildFactory, printResult, runReported } from './shared.js';
import type { ProgramIO } from './shared.js';

/**
 * Parse every rule and combine them with one anyOf / allOf request.
 *
 * @throws {NotationError} If any rule is not valid notation
 */
export function combineRules(
  operation: CombineOperation,
  rules: ReadonlyArray<string>,
  factory: ExcludeFactory,
): ExcludeSpec {
  const specs = rules.map((rule) => parseExcludeSpecOrThrow(rule, factory));
  return operation === 'anyOf' ? factory.anyOf(specs) : factory.allOf(specs);
}

function combineCommand(
  name: string,
  operation: CombineOperation,
  description: string,
  io: ProgramIO,
): Command {
  return new Command(name)
    .description(description)
    .argument('<rules...>', 'Exclusion rules in notation, e.g. org.foo:* or all(g:*, *:m)')
    .option('--trace', 'Print every engine operation to stderr')
    .option('--no-trace', 'Do not trace, even if EXCLUSIONS_TRACE is set')
    .option('--cache', 'Memoize engine results (default)')
    .option('--no-cache', 'Disable memoization of engine results')
    .action((rules: string[], flags: CliFlags, command: Command) => {
      runReported(command, () => {
        printResult(combineRules(operation, rules, buildFactory(flags, io)));
      });
    });
}

export function unionCommand(io: ProgramIO = {}): Command {
  return combineCommand('union', 'anyOf', 'Exclude what any of the rules excludes', io);
}

export function intersectCommand(io: ProgramIO = {}): Command {
  return combineCommand('intersect', 'allOf', 'Exclude what all of the rules exclude', io);
}
