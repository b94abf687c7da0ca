import { ConsoleLogger, LogLevel } from '@nestjs/common';

/** Ordered from most to least severe. */
export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Expand a threshold such as "log" into every level at least that severe.
 * Unknown or empty values fall back to the default threshold.
 */
export function resolveLogLevels(threshold: string | undefined): LogLevel[] {
  const normalized = threshold?.trim();
  const level = isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}

/**
 * Console logger that writes every level to stderr.
 * stdout carries query results only.
 */
export class StderrLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
    _writeStreamType?: 'stdout' | 'stderr',
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
