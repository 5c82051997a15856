import ModbusRTU from "modbus-serial";
import * as CONST from './constants';
import { TransportError, TransportFailureReason } from './errors';
import { Logger, silentLogger } from './logger';
import { Parity, delay, describeError, withTimeout } from './utils';

export type StopBits = 1 | 2;

export interface RtuClientOptions {
    path: string;
    baudRate: number;
    slaveId: number;
    parity?: Parity;
    stopBits?: StopBits;
    /** Per-transaction timeout (ms) */
    timeout?: number;
    /** Keep the port open between calls instead of reopening for each one */
    keepAlive?: boolean;
    /** Pause after opening the port before the first frame (ms) */
    settleTime?: number;
    logger?: Logger;
}

/**
 * Register-level operations the acquisition engine needs from a line.
 */
export interface RegisterTransport {
    readRegisters(address: number, count: number, functionCode: number): Promise<number[]>;
    writeSingleRegister(address: number, value: number, functionCode?: number): Promise<void>;
    close(): Promise<void>;
}

const UNAVAILABLE_MARKERS = ['Port Not Open', 'ECONNREFUSED', 'cannot open', 'No such file', 'Access denied', 'EACCES', 'ENOENT', 'EBUSY', 'disconnected'];
const TIMEOUT_MARKERS = ['ETIMEDOUT', 'Timed out', 'TransactionTimedOutError'];

/**
 * Map an error thrown by modbus-serial or serialport onto a transport failure
 */
export function toTransportError(path: string, error: unknown): TransportError {
    if (error instanceof TransportError) return error;

    let modbusCode: number | undefined;
    let errno = '';
    let name = '';
    if (typeof error === 'object' && error !== null) {
        if ('modbusCode' in error && typeof error.modbusCode === 'number') modbusCode = error.modbusCode;
        if ('errno' in error && typeof error.errno === 'string') errno = error.errno;
        if ('name' in error && typeof error.name === 'string') name = error.name;
    }
    const message = error instanceof Error ? error.message : String(error);
    const haystack = `${name} ${errno} ${message}`;

    let reason: TransportFailureReason = 'protocol';
    if (modbusCode !== undefined) {
        reason = 'exception';
    } else if (name === 'TimeoutError' || TIMEOUT_MARKERS.some(m => haystack.includes(m))) {
        reason = 'timeout';
    } else if (UNAVAILABLE_MARKERS.some(m => haystack.includes(m))) {
        reason = 'unavailable';
    }
    return new TransportError(path, reason, message, modbusCode);
}

/**
 * One Modbus RTU line to one slave.
 *
 * Calls are serialized through a promise queue, so at most one frame is on
 * the half-duplex bus at a time. After a failed transaction (other than a
 * Modbus exception reply) the port is closed and the next call reopens it; whatever the device sent late for
 * the failed request is discarded with the old port.
 */
export class RtuClient implements RegisterTransport {
    public readonly path: string;
    public readonly baudRate: number;
    public readonly slaveId: number;
    public readonly parity: Parity;
    public readonly stopBits: StopBits;
    public readonly timeout: number;
    public readonly keepAlive: boolean;
    private settleTime: number;
    private logger: Logger;
    private client: ModbusRTU | null;
    private queue: Promise<unknown>;
    private closed: boolean;

    constructor(options: RtuClientOptions) {
        this.path = options.path;
        this.baudRate = options.baudRate;
        this.slaveId = options.slaveId;
        this.parity = options.parity ?? 'none';
        this.stopBits = options.stopBits ?? CONST.DEFAULT_STOP_BITS;
        this.timeout = options.timeout ?? CONST.DEFAULT_TIMEOUT;
        this.keepAlive = options.keepAlive ?? false;
        this.settleTime = options.settleTime ?? 0;
        this.logger = options.logger ?? silentLogger;
        this.client = null;
        this.queue = Promise.resolve();
        this.closed = false;
    }

    get isOpen(): boolean {
        return this.client !== null && this.client.isOpen;
    }

    /**
     * Read `count` consecutive registers
     * @param functionCode 3 (holding) or 4 (input)
     * @throws {TransportError} on line failure, timeout, exception response or short reply
     */
    async readRegisters(address: number, count: number, functionCode: number = CONST.FC_READ_HOLDING): Promise<number[]> {
        if (functionCode !== CONST.FC_READ_HOLDING && functionCode !== CONST.FC_READ_INPUT) {
            throw new RangeError(`Function code ${functionCode} cannot read registers`);
        }
        return this.request(async (client) => {
            const res = functionCode === CONST.FC_READ_INPUT
                ? await client.readInputRegisters(address, count)
                : await client.readHoldingRegisters(address, count);
            if (res.data.length !== count) {
                throw new TransportError(this.path, 'protocol', `expected ${count} register(s) at ${address}, got ${res.data.length}`);
            }
            return res.data.map(w => w & CONST.WORD_MASK);
        });
    }

    /**
     * Write one register word
     * @throws {TransportError} on line failure, timeout or exception response
     */
    async writeSingleRegister(address: number, value: number, functionCode: number = CONST.FC_WRITE_SINGLE): Promise<void> {
        if (functionCode !== CONST.FC_WRITE_SINGLE) {
            throw new RangeError(`Function code ${functionCode} is not a single-register write`);
        }
        if (!Number.isInteger(value) || value < 0 || value > CONST.WORD_MASK) {
            throw new RangeError(`Register value ${value} does not fit in 16 bits`);
        }
        await this.request(async (client) => {
            await client.writeRegister(address, value);
        });
    }

    /**
     * Release the port. Queued calls still run; later calls fail.
     */
    async close(): Promise<void> {
        this.closed = true;
        await this.queue;
        await this.invalidate();
    }

    /**
     * Run an action with exclusive use of the port, opening it if needed.
     */
    private request<T>(action: (client: ModbusRTU) => Promise<T>): Promise<T> {
        const resultPromise = this.queue.then(async () => {
            if (this.closed) {
                throw new TransportError(this.path, 'unavailable', 'client closed');
            }

            let client = this.client;
            if (!client || !client.isOpen) {
                try {
                    client = await this._connect();
                } catch (e) {
                    await this.invalidate();
                    throw toTransportError(this.path, e);
                }
            }
            client.setID(this.slaveId);
            client.setTimeout(this.timeout);

            try {
                const res = await action(client);
                if (!this.keepAlive) {
                    await this.invalidate();
                }
                return res;
            } catch (e) {
                const error = toTransportError(this.path, e);
                // An exception reply is a whole frame; the port stays usable
                if (!this.keepAlive || error.reason !== 'exception') {
                    await this.invalidate();
                }
                throw error;
            }
        });

        // Keep the queue alive after a failure so later calls still run
        this.queue = resultPromise.catch(() => undefined);

        return resultPromise;
    }

    private async _connect(): Promise<ModbusRTU> {
        const client = new ModbusRTU();
        this.client = client;
        client.setTimeout(this.timeout);
        await withTimeout(
            client.connectRTUBuffered(this.path, {
                baudRate: this.baudRate,
                dataBits: CONST.DEFAULT_DATA_BITS,
                stopBits: this.stopBits,
                parity: this.parity
            }),
            CONST.OPEN_TIMEOUT,
            `open ${this.path}`
        );
        if (this.settleTime > 0) {
            await delay(this.settleTime);
        }
        return client;
    }

    private async invalidate(): Promise<void> {
        const client = this.client;
        this.client = null;
        if (!client) return;
        try {
            await withTimeout(new Promise<void>(resolve => client.close(() => resolve())), CONST.OPEN_TIMEOUT, `close ${this.path}`);
        } catch (e) {
            this.logger.warn(`Closing ${this.path} failed: ${describeError(e)}`);
        }
    }
}

export default RtuClient;
