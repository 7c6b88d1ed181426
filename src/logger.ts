import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, error?: unknown, meta?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Pino-based implementation of Logger
 */
class PinoLogger implements Logger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, error?: unknown, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error instanceof Error) {
      logData.error = { name: error.name, message: error.message, stack: error.stack };
    } else if (error !== undefined) {
      logData.error = error;
    }
    this.pinoLogger.error(logData, msg);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

/**
 * Create a logger writing structured JSON lines to stderr, so command output on
 * stdout stays readable.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const pinoLogger = pino(
    {
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.destination(2)
  );
  return new PinoLogger(pinoLogger);
}

/** A logger that discards everything */
export function silentLogger(): Logger {
  return new PinoLogger(pino({ level: 'silent' }));
}

/**
 * Create a component-specific logger
 */
export function getComponentLogger(
  parent: Logger,
  component: string,
  additionalContext?: Record<string, unknown>
): Logger {
  return parent.child({ component, ...additionalContext });
}
