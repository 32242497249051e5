/**
 * Timestamped console logging shared by the pipeline stages
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogSink = (line: string) => void;

export class Logger {
  private readonly verbose: boolean;
  private sink: LogSink;

  constructor(options: { verbose?: boolean; sink?: LogSink } = {}) {
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? (line => console.log(line));
  }

  /**
   * Log message with timestamp; info lines only show up in verbose mode
   */
  log(message: string, level: LogLevel = 'info'): void {
    if (!this.verbose && level === 'info') {
      return;
    }

    const timestamp = new Date().toISOString();
    const prefix = level === 'error' ? '❌' : level === 'warn' ? '⚠️' : 'ℹ️';
    this.sink(`[${timestamp}] ${prefix} ${message}`);
  }

  info(message: string): void {
    this.log(message, 'info');
  }

  warn(message: string): void {
    this.log(message, 'warn');
  }

  error(message: string): void {
    this.log(message, 'error');
  }
}

export const defaultLogger = new Logger();

/**
 * Logger that drops everything, for tests and library callers
 */
export function createSilentLogger(): Logger {
  return new Logger({ verbose: false, sink: () => undefined });
}
