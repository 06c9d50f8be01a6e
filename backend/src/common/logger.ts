/**
 * Narrow logger contract shared by services and jobs.
 *
 * fastify's pino instance (app.log) satisfies it; tests pass vi.fn() mocks.
 */

export interface Logger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  debug?(obj: object, msg?: string): void;
}

export const consoleLogger: Logger = {
  info: (obj, msg) => console.log(`[INFO] ${msg ?? ''}`, obj),
  warn: (obj, msg) => console.warn(`[WARN] ${msg ?? ''}`, obj),
  error: (obj, msg) => console.error(`[ERROR] ${msg ?? ''}`, obj),
  debug: (obj, msg) => console.debug(`[DEBUG] ${msg ?? ''}`, obj),
};
