/**
 * Custom Error Classes for register acquisition
 * Provides specific error types so callers can tell a bad register from a lost line
 */

/**
 * Reasons a single register can fail to decode. Carried inline in the
 * acquisition result, never thrown past the register.
 */
export enum DecodeErrorKind {
    UnsupportedType = 'unsupported-type',
    Transport = 'transport',
    MalformedResponse = 'malformed-response',
    Exception = 'exception'
}

export type TransportFailureReason = 'unavailable' | 'timeout' | 'exception' | 'protocol';

/**
 * Error thrown when the serial line or the device fails a transaction
 */
export class TransportError extends Error {
    public reason: TransportFailureReason;
    public path: string;
    public modbusCode?: number;

    constructor(path: string, reason: TransportFailureReason, message: string, modbusCode?: number) {
        super(`Transport failure on ${path} (${reason}): ${message}`);
        this.name = 'TransportError';
        this.reason = reason;
        this.path = path;
        this.modbusCode = modbusCode;
    }
}

/**
 * Error thrown when a user-supplied value cannot be turned into a register word
 */
export class EncodeError extends Error {
    public registerName: string;

    constructor(registerName: string, message: string) {
        super(`Cannot encode value for "${registerName}": ${message}`);
        this.name = 'EncodeError';
        this.registerName = registerName;
    }
}

/**
 * Error thrown when the register map document is malformed
 */
export class RegisterMapError extends Error {
    public issues: string[];

    constructor(issues: string[], source?: string) {
        const where = source ? ` in ${source}` : '';
        super(`Invalid register map${where}: ${issues.join('; ')}`);
        this.name = 'RegisterMapError';
        this.issues = issues;
    }
}

/**
 * Error thrown when a write names a register the map does not define
 */
export class RegisterNotFoundError extends Error {
    public registerName: string;

    constructor(registerName: string) {
        super(`Register "${registerName}" not found in register map`);
        this.name = 'RegisterNotFoundError';
        this.registerName = registerName;
    }
}

/**
 * Error thrown when a write is attempted while no device is connected
 */
export class NotConnectedError extends Error {
    constructor(operation: string) {
        super(`Cannot ${operation}: device not connected`);
        this.name = 'NotConnectedError';
    }
}

/**
 * Error thrown when an operation does not settle in time
 */
export class TimeoutError extends Error {
    public operation: string;
    public timeout: number;

    constructor(operation: string, timeout: number) {
        super(`Operation "${operation}" timed out after ${timeout}ms`);
        this.name = 'TimeoutError';
        this.operation = operation;
        this.timeout = timeout;
    }
}
