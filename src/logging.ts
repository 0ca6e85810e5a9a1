/**
 * Minimal structured logger. The argument order matches pino, so a fastify
 * `app.log` can be passed anywhere a Logger is accepted.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export const consoleLogger: Logger = {
  debug: (obj, msg) => console.debug(`[search] ${msg ?? ''}`, obj),
  info: (obj, msg) => console.info(`[search] ${msg ?? ''}`, obj),
  warn: (obj, msg) => console.warn(`[search] ${msg ?? ''}`, obj),
  error: (obj, msg) => console.error(`[search] ${msg ?? ''}`, obj),
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
