import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface HarnessLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string | Error, meta?: Record<string, unknown>): void;
}

export const noopLogger: HarnessLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'Debug',
  info: 'Info',
  warn: 'Warning',
  error: 'Error'
};

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  write?: (line: string) => void;
};

function formatMeta(meta: Record<string, unknown> | undefined): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  return ` ${JSON.stringify(meta)}`;
}

/**
 * Human-readable logger for the CLI. Lines go to stdout next to the report
 * so a warning shows up right under the implementation that caused it.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): HarnessLogger {
  const threshold = LEVEL_ORDER[options.level ?? 'warn'];
  const write = options.write ?? ((line: string) => console.log(line));

  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    write(`${LEVEL_LABELS[level]}: ${message}${formatMeta(meta)}`);
  };

  return {
    debug(message, meta) {
      emit('debug', message, meta);
    },
    info(message, meta) {
      emit('info', message, meta);
    },
    warn(message, meta) {
      emit('warn', message, meta);
    },
    error(message, meta) {
      if (message instanceof Error) {
        emit('error', message.message, { ...meta, stack: message.stack });
      } else {
        emit('error', message, meta);
      }
    }
  } satisfies HarnessLogger;
}

export function createPinoLogger(level: LogLevel): HarnessLogger {
  const base = pino({ level, base: undefined, timestamp: pino.stdTimeFunctions.isoTime });
  return {
    debug(message, meta) {
      base.debug(meta ?? {}, message);
    },
    info(message, meta) {
      base.info(meta ?? {}, message);
    },
    warn(message, meta) {
      base.warn(meta ?? {}, message);
    },
    error(message, meta) {
      if (message instanceof Error) {
        base.error({ ...meta, err: message }, message.message);
      } else {
        base.error(meta ?? {}, message);
      }
    }
  } satisfies HarnessLogger;
}
