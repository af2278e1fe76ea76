/* eslint-disable no-console */
export type Level = 'debug' | 'info' | 'warn' | 'error';

type Meta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
  child(bindings: Meta): Logger;
}

const LEVEL_ORDER: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const isLevel = (value: string | undefined): value is Level =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

let threshold: Level = isLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export const setLogLevel = (level: Level): void => {
  threshold = level;
};

const write = (level: Level, message: string, bindings: Meta, meta?: Meta) => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const payload = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...bindings,
    ...(meta ?? {})
  };

  console.log(JSON.stringify(payload));
};

export const createLogger = (bindings: Meta = {}): Logger => ({
  debug: (message, meta) => write('debug', message, bindings, meta),
  info: (message, meta) => write('info', message, bindings, meta),
  warn: (message, meta) => write('warn', message, bindings, meta),
  error: (message, meta) => write('error', message, bindings, meta),
  child: (extra) => createLogger({ ...bindings, ...extra })
});

export const logger = createLogger();
