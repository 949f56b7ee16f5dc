/**
 * Exclusion CLI — Console Operation Log Sink
 *
 * Implements the LogSink interface from @exclusions/engine by writing one
 * colored trace line per operation:
 *
 *   <timestamp> anyOf(g:*, g:m) → g:*
 *
 * The engine owns the LogSink interface and OperationLogger class; this is
 * the CLI's concrete sink. Lines go to stderr by default so that traced
 * output never mixes with the result printed on stdout.
 */

import type { LogSink, OperationLogEntry } from '@exclusions/engine';
import { operationColor, resultColor, t } from './theme.js';

const writeStderr = (line: string): void => {
  process.stderr.write(`${line}\n`);
};

export class ConsoleLogSink implements LogSink {
  constructor(private readonly write: (line: string) => void = writeStderr) {}

  append(entry: OperationLogEntry): void {
    const operands = entry.operands.join(t.dim(', '));
    this.write(
      `${t.muted(entry.timestamp)} ` +
        `${operationColor(entry.operation)(entry.operation)}${t.dim('(')}${operands}${t.dim(')')} ` +
        `${t.dim('→')} ${resultColor(entry.result)(entry.result)}`,
    );
  }
}
