import { ConsoleLogger, LogLevel } from '@nestjs/common';

/**
 * Reports go to stdout; every log line, whatever its level, goes to stderr so
 * that a report can be piped without warnings mixed into it.
 */
export class StderrLogger extends ConsoleLogger {
  protected printMessages(messages: unknown[], context = '', logLevel: LogLevel = 'log'): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}

const LEVEL_ORDER: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

export function resolveLogLevels(silent: boolean, configured: string | undefined): LogLevel[] {
  if (silent) {
    return ['error'];
  }
  const wanted = LEVEL_ORDER.find((level) => level === configured?.trim().toLowerCase()) ?? 'warn';
  return LEVEL_ORDER.slice(0, LEVEL_ORDER.indexOf(wanted) + 1);
}
