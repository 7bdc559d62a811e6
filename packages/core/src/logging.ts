/**
 * Logger contract shared by every runtime component.
 *
 * `console` satisfies it, so components default to it and tests inject a
 * recording logger instead.
 */
export interface NexLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit `debug` lines (per-tick chatter). Default: false. */
  verbose?: boolean;
  /** Sink to write to. Default: the global console. */
  target?: NexLogger;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): NexLogger {
  const { verbose = false, target = console } = options;
  return {
    debug: (message) => {
      if (verbose) {
        target.debug(message);
      }
    },
    info: (message) => target.info(message),
    warn: (message) => target.warn(message),
    error: (message) => target.error(message),
  };
}

export interface RecordedLogLine {
  level: keyof NexLogger;
  message: string;
}

/** Logger that keeps every line in memory. */
export class MemoryLogger implements NexLogger {
  readonly lines: RecordedLogLine[] = [];

  debug(message: string): void {
    this.lines.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  messages(level?: keyof NexLogger): string[] {
    return this.lines
      .filter((line) => level === undefined || line.level === level)
      .map((line) => line.message);
  }
}
