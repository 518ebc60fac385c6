/**
 * Logger with structured output
 *
 * One JSON object per line on stdout. Components take a Logger in their
 * options and fall back to a child of the shared instance.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  /** Fields attached to every line */
  bindings?: Record<string, unknown>;
  /** Line writer, console.log unless replaced */
  write?: (line: string) => void;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalised = value?.trim().toLowerCase();
  switch (normalised) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return normalised;
    case 'warning':
      return 'warn';
    default:
      return 'info';
  }
}

export class Logger {
  private readonly level: LogLevel;
  private readonly component: string | undefined;
  private readonly bindings: Record<string, unknown>;
  private readonly write: (line: string) => void;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? parseLogLevel(process.env.LOG_LEVEL);
    this.component = options?.component;
    this.bindings = options?.bindings ?? {};
    this.write = options?.write ?? ((line) => console.log(line));
  }

  /** Derive a logger for a named component, keeping level and bindings */
  child(component: string, bindings?: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      component,
      bindings: { ...this.bindings, ...bindings },
      write: this.write,
    });
  }

  /** Derive a logger that adds fields to every line */
  with(bindings: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      component: this.component,
      bindings: { ...this.bindings, ...bindings },
      write: this.write,
    });
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log('error', message, {
      ...data,
      error: error?.message,
      stack: error?.stack,
    });
  }

  private log(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    this.write(
      JSON.stringify({
        level: level.toUpperCase(),
        message,
        component: this.component,
        ...this.bindings,
        ...data,
        timestamp: new Date().toISOString(),
      })
    );
  }
}

export const logger = new Logger();

/** A logger that drops everything, for tests and dry wiring */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'silent' });
}
