/**
 * Logger seam for the support core.
 *
 * The core never writes logs itself; the host app passes an adapter over
 * its own logger. consoleLogger is the default when none is given.
 */

export type LogData = Record<string, unknown>;

export interface SupportLogger {
  info(stage: string, message: string, data?: LogData): void;
  warn(stage: string, message: string, data?: LogData): void;
  error(stage: string, message: string, data?: LogData): void;
}

export const consoleLogger: SupportLogger = {
  info: (stage, message, data) => console.log(`[${stage}] ${message}`, data ?? ""),
  warn: (stage, message, data) => console.warn(`[${stage}] ${message}`, data ?? ""),
  error: (stage, message, data) => console.error(`[${stage}] ${message}`, data ?? ""),
};

export const silentLogger: SupportLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Injectable clock */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
