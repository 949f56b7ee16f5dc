/**
 * Helpers shared by the exclusions commands: engine assembly from resolved
 * configuration, result printing, and error reporting.
 */

import type { Command } from 'commander';
import { createExcludeFactory } from '@exclusions/engine';
import { NotationError, formatExcludeSpec, hashSpec } from '@exclusions/model';
import type { ExcludeFactory, ExcludeSpec } from '@exclusions/model';
import { resolveCliConfig } from '../config.js';
import type { CliFlags } from '../config.js';
import { ConsoleLogSink } from '../output/console-log-sink.js';
import { resultColor, t } from '../output/theme.js';

/** Process-level inputs, replaceable in tests. */
export interface ProgramIO {
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Receives --trace lines. Defaults to stderr. */
  readonly traceWriter?: ((line: string) => void) | undefined;
}

export function buildFactory(flags: CliFlags, io: ProgramIO): ExcludeFactory {
  const config = resolveCliConfig(flags, io.env);
  return createExcludeFactory({
    cache: config.cache,
    sink: config.trace ? new ConsoleLogSink(io.traceWriter) : undefined,
  });
}

export function printResult(spec: ExcludeSpec): void {
  const formatted = formatExcludeSpec(spec);
  // eslint-disable-next-line no-console
  console.log(resultColor(formatted)(formatted));
  // eslint-disable-next-line no-console
  console.log(t.muted(`hash ${hashSpec(spec)}`));
}

/**
 * Run a command action, reporting failures through commander.
 * Invalid notation exits with 2, anything else with 1.
 */
export function runReported(command: Command, action: () => void): void {
  try {
    action();
  } catch (err) {
    if (err instanceof NotationError) {
      command.error(t.red(err.message), { exitCode: 2, code: 'exclusions.notation' });
    }
    if (err instanceof Error) {
      command.error(t.red(`Unexpected error: ${err.message}`), {
        exitCode: 1,
        code: 'exclusions.unexpected',
      });
    }
    throw err;
  }
}
