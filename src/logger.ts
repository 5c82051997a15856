/**
 * Minimal logging surface shared by discovery, the transport and the poller.
 * Any object with log/warn/error fits, so a host can hand in its own.
 */
export interface Logger {
    log(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const PREFIX = '[QMB]';

export const consoleLogger: Logger = {
    log: (message) => console.log(`${PREFIX} ${message}`),
    warn: (message) => console.warn(`${PREFIX} ${message}`),
    error: (message) => console.error(`${PREFIX} ${message}`)
};

export const silentLogger: Logger = {
    log: () => undefined,
    warn: () => undefined,
    error: () => undefined
};
