export type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;
}

export function isLevel(value: string): value is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function envLevel(): Level {
  const fromEnv = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevel(fromEnv) ? fromEnv : 'info';
}

export function createLogger(service: string, level: Level = envLevel()): Logger {
  const threshold = LEVELS[level];
  const log = (lvl: Level, msg: string, meta?: object) => {
    if (LEVELS[lvl] < threshold) return;
    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: lvl,
        service,
        message: msg,
        ...meta,
      })
    );
  };
  return {
    debug: (msg: string, meta?: object) => log('debug', msg, meta),
    info: (msg: string, meta?: object) => log('info', msg, meta),
    warn: (msg: string, meta?: object) => log('warn', msg, meta),
    error: (msg: string, meta?: object) => log('error', msg, meta),
  };
}

// For callers that want nothing on stdout, e.g. embedded use and tests.
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
