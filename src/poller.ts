import { AcquisitionResult, isTransportLoss, readAll } from './acquisition';
import { EngineeringValue, encode, isDecodeError } from './codec';
import * as CONST from './constants';
import { Candidate, ClientFactory, DiscoveryOptions, defaultClientFactory, describeCandidate, discover, probeCandidate } from './discovery';
import { NotConnectedError } from './errors';
import { EventQueue } from './event-queue';
import { Logger, silentLogger } from './logger';
import { RegisterMap, findRegister } from './register-map';
import { RegisterTransport } from './rtu-client';
import { describeError } from './utils';

export enum ConnectionState {
    Disconnected = 'DISCONNECTED',
    Connected = 'CONNECTED'
}

export type PollEvent =
    | { type: 'status'; state: ConnectionState; message: string; timestamp: number; candidate?: Candidate }
    | { type: 'data'; timestamp: number; values: AcquisitionResult };

export type DiscoverFn = (options: DiscoveryOptions) => Promise<Candidate | null>;

export interface PollerOptions {
    map: RegisterMap;
    /** Fixed port/baud/parity; skips scanning but keeps the reconnect cycle */
    override?: Candidate;
    /** Wait between discovery sweeps (ms) */
    scanInterval?: number;
    /** Wait between acquisition passes (ms) */
    samplePeriod?: number;
    /** Per-transaction timeout for every client the poller creates (ms) */
    timeout?: number;
    /** Narrow the discovery sweep (ports, bauds, parities, port lister) */
    discovery?: Pick<DiscoveryOptions, 'ports' | 'bauds' | 'parities' | 'portLister' | 'settleTime'>;
    clientFactory?: ClientFactory;
    discover?: DiscoverFn;
    maxQueuedEvents?: number;
    onEvent?: (event: PollEvent) => void;
    logger?: Logger;
    now?: () => number;
}

function lostMessage(reason: string): string {
    return `Disconnected: ${reason}. Waiting for device...`;
}

interface ConnectionStats {
    lastSuccess: Date | null;
    lastError: Date | null;
    failedScans: number;
}

/**
 * Keeps a live connection to the instrument and republishes its registers.
 *
 * DISCONNECTED: run discovery every `scanInterval` until a candidate answers.
 * CONNECTED: read the full register list every `samplePeriod`; a pass where
 * the line itself is gone drops the client and returns to DISCONNECTED.
 *
 * Events go to a queue the caller drains; the loop never waits on it.
 */
export class Poller {
    private map: RegisterMap;
    private override?: Candidate;
    private scanInterval: number;
    private samplePeriod: number;
    private timeout: number;
    private discoveryOptions: PollerOptions['discovery'];
    private clientFactory: ClientFactory;
    private discoverFn: DiscoverFn;
    private onEvent?: (event: PollEvent) => void;
    private logger: Logger;
    private now: () => number;
    private events: EventQueue<PollEvent>;

    private _state: ConnectionState;
    private client: RegisterTransport | null;
    private _candidate: Candidate | null;
    private stopRequested: boolean;
    private loop: Promise<void> | null;
    private wake: (() => void) | null;
    public connectionState: ConnectionStats;

    constructor(options: PollerOptions) {
        this.map = options.map;
        this.override = options.override;
        this.scanInterval = options.scanInterval ?? CONST.SCAN_INTERVAL;
        this.samplePeriod = options.samplePeriod ?? CONST.SAMPLE_PERIOD;
        this.timeout = options.timeout ?? CONST.DEFAULT_TIMEOUT;
        this.discoveryOptions = options.discovery;
        this.clientFactory = options.clientFactory ?? defaultClientFactory;
        this.discoverFn = options.discover ?? discover;
        this.onEvent = options.onEvent;
        this.logger = options.logger ?? silentLogger;
        this.now = options.now ?? Date.now;
        this.events = new EventQueue(options.maxQueuedEvents ?? CONST.MAX_QUEUED_EVENTS);

        this._state = ConnectionState.Disconnected;
        this.client = null;
        this._candidate = null;
        this.stopRequested = false;
        this.loop = null;
        this.wake = null;
        this.connectionState = { lastSuccess: null, lastError: null, failedScans: 0 };
    }

    get state(): ConnectionState {
        return this._state;
    }

    get candidate(): Candidate | null {
        return this._candidate;
    }

    get running(): boolean {
        return this.loop !== null;
    }

    start(): void {
        if (this.loop) return;
        this.stopRequested = false;
        this.logger.log('Waiting for device...');
        this.loop = this.run()
            .catch((err) => {
                this.logger.error(`Poll loop crashed: ${describeError(err)}`);
            })
            .finally(() => {
                this.loop = null;
            });
    }

    /**
     * Ask the loop to finish after the current pass and release the port
     */
    async stop(): Promise<void> {
        this.stopRequested = true;
        if (this.wake) this.wake();
        if (this.loop) await this.loop;
    }

    /**
     * Cut the wait before the next discovery sweep short
     */
    scanNow(): void {
        if (this._state === ConnectionState.Disconnected && this.wake) {
            this.wake();
        }
    }

    /**
     * Take the events published since the last call, oldest first
     */
    drain(): PollEvent[] {
        return this.events.drain();
    }

    /**
     * Encode a value (usually the user's text) and write it to the named register
     *
     * @returns the raw register word written
     * @throws {RegisterNotFoundError} for an unknown name
     * @throws {EncodeError} when the value cannot be encoded
     * @throws {NotConnectedError} while no device is connected
     * @throws {TransportError} when the device does not take the write
     */
    async write(name: string, value: EngineeringValue): Promise<number> {
        const descriptor = findRegister(this.map, name);
        const raw = encode(descriptor, value);
        const client = this.client;
        if (!client || this._state !== ConnectionState.Connected) {
            throw new NotConnectedError(`write ${name}`);
        }
        await client.writeSingleRegister(descriptor.address, raw, CONST.FC_WRITE_SINGLE);
        this.logger.log(`Wrote ${raw} to ${name} (@${descriptor.address})`);
        return raw;
    }

    private async run(): Promise<void> {
        while (!this.stopRequested) {
            if (this._state === ConnectionState.Disconnected) {
                const candidate = await this.findDevice();
                if (candidate && !this.stopRequested) {
                    this.connect(candidate);
                    continue;
                }
                await this.sleep(this.scanInterval);
            } else {
                const ok = await this.pass();
                await this.sleep(ok ? this.samplePeriod : this.scanInterval);
            }
        }

        if (this._state === ConnectionState.Connected) {
            await this.disconnect('Stopped');
        }
    }

    private async findDevice(): Promise<Candidate | null> {
        const options: DiscoveryOptions = {
            ...this.discoveryOptions,
            slaveId: this.map.slaveId,
            endianness: this.map.endianness,
            probe: this.map.probe,
            timeout: this.timeout,
            clientFactory: this.clientFactory,
            shouldStop: () => this.stopRequested,
            logger: this.logger
        };

        try {
            if (this.override) {
                return (await probeCandidate(this.override, options)) ? this.override : null;
            }
            const found = await this.discoverFn(options);
            if (!found) this.connectionState.failedScans++;
            return found;
        } catch (e) {
            this.connectionState.failedScans++;
            this.logger.error(`Discovery failed: ${describeError(e)}`);
            return null;
        }
    }

    private connect(candidate: Candidate): void {
        this.client = this.clientFactory({
            path: candidate.path,
            baudRate: candidate.baudRate,
            parity: candidate.parity,
            slaveId: this.map.slaveId,
            timeout: this.timeout,
            keepAlive: true,
            logger: this.logger
        });
        this._candidate = candidate;
        this._state = ConnectionState.Connected;
        this.connectionState.failedScans = 0;

        const message = `Connected: ${describeCandidate(candidate)}, slave=${this.map.slaveId}`;
        this.logger.log(message);
        this.publish({ type: 'status', state: this._state, message, timestamp: this.now(), candidate });
    }

    private async disconnect(message: string): Promise<void> {
        const client = this.client;
        this.client = null;
        this._candidate = null;
        this._state = ConnectionState.Disconnected;

        if (client) {
            try {
                await client.close();
            } catch (e) {
                this.logger.warn(`Closing client failed: ${describeError(e)}`);
            }
        }

        this.logger.warn(message);
        this.publish({ type: 'status', state: this._state, message, timestamp: this.now() });
    }

    /**
     * @returns false when the pass lost the connection
     */
    private async pass(): Promise<boolean> {
        const client = this.client;
        if (!client) {
            await this.disconnect(lostMessage('no client'));
            return false;
        }

        let values: AcquisitionResult;
        try {
            values = await readAll(client, this.map.registers, this.map.endianness);
        } catch (e) {
            this.connectionState.lastError = new Date(this.now());
            await this.disconnect(lostMessage(describeError(e)));
            return false;
        }

        if (isTransportLoss(values)) {
            this.connectionState.lastError = new Date(this.now());
            const lost = [...values.values()].find(isDecodeError);
            await this.disconnect(lostMessage(lost ? lost.message : 'no response'));
            return false;
        }

        this.connectionState.lastSuccess = new Date(this.now());
        this.publish({ type: 'data', timestamp: this.now(), values });
        return true;
    }

    private publish(event: PollEvent): void {
        this.events.push(event);
        if (this.onEvent) {
            try {
                this.onEvent(event);
            } catch (e) {
                this.logger.error(`Event listener threw: ${describeError(e)}`);
            }
        }
    }

    private sleep(ms: number): Promise<void> {
        if (this.stopRequested) return Promise.resolve();
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve();
            }, ms);
            this.wake = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
        });
    }
}

export default Poller;
