import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  level: LogLevel;
  shouldLog(level: LogLevel): boolean;
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  progress(current: number, total: number, msg: string): void;
  error(msg: string): void;
}

export const logger: Logger = {
  level: 'info',

  shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  },

  debug(msg: string): void {
    if (this.shouldLog('debug')) {
      console.error(pc.dim(`[debug] ${msg}`));
    }
  },

  info(msg: string): void {
    if (this.shouldLog('info')) {
      console.error(msg);
    }
  },

  warn(msg: string): void {
    if (this.shouldLog('warn')) {
      console.error(pc.yellow(`⚠ ${msg}`));
    }
  },

  /** One line per finished unit of work, prefixed with `[current/total]`. */
  progress(current: number, total: number, msg: string): void {
    if (this.shouldLog('info')) {
      const width = String(total).length;
      console.error(`${pc.dim(`[${String(current).padStart(width)}/${total}]`)} ${msg}`);
    }
  },

  error(msg: string): void {
    if (this.shouldLog('error')) {
      console.error(pc.red(`✖ ${msg}`));
    }
  },
};
