/**
 * @fileoverview Command-line runner: `ics-agenda <file.ics>`.
 *
 * Writes one checklist line per upcoming event to stdout. Any failure is
 * reported as `error: <message>` on stderr and nothing reaches stdout.
 */

import config, { validateConfig } from './config.js';
import { buildAgenda } from './services/agenda/index.js';
import { readCalendarFile } from './services/calendar/source.js';
import {
  AppError,
  EXIT_OK,
  UsageError,
  describeError,
  exitCodeFor,
} from './utils/errors.js';
import { createLogger, createRunId, withLogContext } from './utils/observability/index.js';

const log = createLogger({ domain: 'cli' });

export const USAGE = 'usage: ics-agenda <file.ics>';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  now: () => Date;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  now: () => new Date(),
};

/** The single positional argument: the calendar path. */
export function parseArgs(args: readonly string[]): string {
  if (args.length === 0) {
    throw new UsageError(`missing calendar file\n${USAGE}`);
  }
  if (args.length > 1) {
    throw new UsageError(`expected one calendar file, got ${args.length} arguments\n${USAGE}`);
  }
  return args[0];
}

/**
 * Run one agenda pass. Returns the process exit code.
 *
 * Output is buffered until the whole calendar has been processed, so a
 * failing run never leaves partial lines on stdout.
 */
export function runCli(args: readonly string[], io: CliIO = processIO): number {
  return withLogContext({ runId: createRunId() }, () => {
    try {
      validateConfig();
      const path = parseArgs(args);
      const text = readCalendarFile(path);
      const lines = buildAgenda(text, {
        now: io.now(),
        allDayPolicy: config.calendar.allDayPolicy,
      });
      if (lines.length > 0) {
        io.stdout(`${lines.join('\n')}\n`);
      }
      return EXIT_OK;
    } catch (error) {
      if (error instanceof AppError) {
        log.debug('run_failed', { code: error.code, ...error.context });
      } else {
        log.error('run_failed_unexpectedly', { error });
      }
      io.stderr(`error: ${describeError(error)}\n`);
      return exitCodeFor(error);
    }
  });
}
