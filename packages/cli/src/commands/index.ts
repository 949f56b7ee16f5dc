/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * Imported by:
 *   src/bin/exclusions.ts   (process entry point)
 *   test/cli.test.ts        (with injected env and trace writer)
 */

import { Command } from 'commander'
import { intersectCommand, unionCommand } from './combine.js'
import { formatCommand } from './format.js'
import type { ProgramIO } from './shared.js'

export function createProgram(io: ProgramIO = {}): Command {
  return new Command()
    .name('exclusions')
    .description(
      'Combine dependency exclusion rules and print the simplified result.\n' +
      'Rules use the notation group[:module[:artifact[@ext]]], * for any,\n' +
      'and any(...) / all(...) for composites.',
    )
    .version('0.1.0')
    .addCommand(unionCommand(io))
    .addCommand(intersectCommand(io))
    .addCommand(formatCommand(io))
}
