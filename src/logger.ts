import type { ScaffoldState } from './types.js';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

/** Fields a log line can carry while a package is being scaffolded. */
export interface LogContext {
  package?: string;
  root?: string;
  step?: string;
  path?: string;
  from?: ScaffoldState;
  to?: ScaffoldState;
  entries?: number;
  operations?: number;
  duration?: number;
  code?: string;
  error?: string;
}

let silent = true;
let level = LogLevel.INFO;

function format(tag: string, msg: string, ctx?: LogContext): string {
  return `[${new Date().toISOString()}] [${tag}] ${msg}${ctx ? ` ${JSON.stringify(ctx)}` : ''}`;
}

export const logger = {
  error: (msg: string, ctx?: LogContext) => {
    if (!silent && level >= LogLevel.ERROR) {
      console.error(format('ERROR', msg, ctx));
    }
  },

  warn: (msg: string, ctx?: LogContext) => {
    if (!silent && level >= LogLevel.WARN) {
      console.warn(format('WARN', msg, ctx));
    }
  },

  info: (msg: string, ctx?: LogContext) => {
    if (!silent && level >= LogLevel.INFO) {
      console.log(format('INFO', msg, ctx));
    }
  },

  debug: (msg: string, ctx?: LogContext) => {
    if (!silent && level >= LogLevel.DEBUG) {
      console.log(format('DEBUG', msg, ctx));
    }
  },

  /** Times one transaction step; a failure is logged and rethrown. */
  operation: async <T>(step: string, fn: () => Promise<T>): Promise<T> => {
    const start = Date.now();
    try {
      const result = await fn();
      logger.debug('Step completed', { step, duration: Date.now() - start });
      return result;
    } catch (error) {
      logger.error('Step failed', {
        step,
        duration: Date.now() - start,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }
};

export function configureLogger(options: { level?: LogLevel; silent?: boolean }): void {
  if (options.level !== undefined) level = options.level;
  if (options.silent !== undefined) silent = options.silent;
}
