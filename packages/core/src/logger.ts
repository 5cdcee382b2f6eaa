import pino from 'pino';
import type { LogLevel } from '@taskforce/shared';

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export class Logger {
  private pino: pino.Logger;

  constructor(options: LoggerOptions = {}, instance?: pino.Logger) {
    this.pino =
      instance ??
      pino({
        level: options.level ?? 'info',
        transport: options.pretty
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                ignore: 'pid,hostname',
                translateTime: 'SYS:standard',
              },
            }
          : undefined,
      });
  }

  /**
   * Returns a logger whose lines carry `bindings`.
   */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger({}, this.pino.child(bindings));
  }

  info(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.info(msgOrObj);
    } else {
      this.pino.info(msgOrObj, msg);
    }
  }

  error(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.error(msgOrObj);
    } else {
      this.pino.error(msgOrObj, msg);
    }
  }

  warn(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.warn(msgOrObj);
    } else {
      this.pino.warn(msgOrObj, msg);
    }
  }

  debug(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.debug(msgOrObj);
    } else {
      this.pino.debug(msgOrObj, msg);
    }
  }

  fatal(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.fatal(msgOrObj);
    } else {
      this.pino.fatal(msgOrObj, msg);
    }
  }
}

/** Logger that discards everything; used where no logger is injected. */
export const silentLogger = new Logger({ level: 'silent' });
