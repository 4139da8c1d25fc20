/**
 * @fileoverview Logger contract
 *
 * @module @mockpilot/engine/contracts/Logger
 */

export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const consoleLogger: Logger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};

/**
 * Error message for logging without losing non-Error throwables.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
