import { ConsoleLogger, LogLevel } from '@nestjs/common';

/**
 * Standard output carries the report, so every log level goes to stderr.
 */
export class StderrLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context = '',
    logLevel: LogLevel = 'log',
    _writeStreamType?: 'stdout' | 'stderr',
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}

export function logLevelsFor(opts: { quiet?: boolean; verbose?: boolean }): LogLevel[] {
  if (opts.quiet) return ['error'];
  if (opts.verbose) return ['error', 'warn', 'log', 'debug', 'verbose'];
  return ['error', 'warn', 'log'];
}
