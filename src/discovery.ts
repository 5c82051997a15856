import ModbusRTU from "modbus-serial";
import { readRegister } from './acquisition';
import { isDecodeError } from './codec';
import * as CONST from './constants';
import { Logger, silentLogger } from './logger';
import { Endianness, RegisterDescriptor } from './register-map';
import { RegisterTransport, RtuClient, RtuClientOptions } from './rtu-client';
import { Parity, describeError, parityLetter } from './utils';

export interface Candidate {
    path: string;
    baudRate: number;
    parity: Parity;
}

export type PortLister = () => Promise<string[]>;
export type ClientFactory = (options: RtuClientOptions) => RegisterTransport;

export interface DiscoveryOptions {
    slaveId: number;
    endianness: Endianness;
    /** Register that must decode without error for a candidate to match */
    probe: RegisterDescriptor;
    /** Ports to try instead of the ones the OS reports */
    ports?: string[];
    parities?: readonly Parity[];
    bauds?: readonly number[];
    timeout?: number;
    settleTime?: number;
    portLister?: PortLister;
    clientFactory?: ClientFactory;
    shouldStop?: () => boolean;
    statusCallback?: (msg: string) => void;
    logger?: Logger;
}

export const defaultClientFactory: ClientFactory = (options) => new RtuClient(options);

/**
 * Serial ports in the order the OS reports them
 */
export async function listSerialPorts(): Promise<string[]> {
    const ports: Array<{ path: string }> = await ModbusRTU.getPorts();
    return ports.map(p => p.path);
}

export function describeCandidate(candidate: Candidate): string {
    return `${candidate.path} ${candidate.baudRate} ${parityLetter(candidate.parity)}`;
}

/**
 * Every port × parity × baud combination, in scan order
 */
export function buildCandidates(
    ports: readonly string[],
    parities: readonly Parity[] = CONST.COMMON_PARITIES,
    bauds: readonly number[] = CONST.COMMON_BAUDS
): Candidate[] {
    const candidates: Candidate[] = [];
    for (const path of ports) {
        for (const parity of parities) {
            for (const baudRate of bauds) {
                candidates.push({ path, baudRate, parity });
            }
        }
    }
    return candidates;
}

/**
 * Try one candidate with a throwaway client. The client is always closed.
 *
 * @returns true when the probe register decodes without error
 */
export async function probeCandidate(candidate: Candidate, options: DiscoveryOptions): Promise<boolean> {
    const logger = options.logger ?? silentLogger;
    const factory = options.clientFactory ?? defaultClientFactory;
    let client: RegisterTransport | null = null;

    try {
        client = factory({
            path: candidate.path,
            baudRate: candidate.baudRate,
            parity: candidate.parity,
            slaveId: options.slaveId,
            timeout: options.timeout ?? CONST.DEFAULT_TIMEOUT,
            settleTime: options.settleTime ?? CONST.DEFAULT_PROBE_SETTLE,
            keepAlive: false,
            logger
        });
        const value = await readRegister(client, options.probe, options.endianness);
        if (isDecodeError(value)) {
            logger.log(`Probe ${describeCandidate(candidate)} failed: ${value.message}`);
            return false;
        }
        return true;
    } catch (e) {
        logger.log(`Probe ${describeCandidate(candidate)} failed: ${describeError(e)}`);
        return false;
    } finally {
        if (client) {
            try {
                await client.close();
            } catch (e) {
                logger.warn(`Closing probe client on ${candidate.path} failed: ${describeError(e)}`);
            }
        }
    }
}

/**
 * Find the port, baud rate and parity the instrument answers on.
 * First match in scan order wins.
 *
 * @returns the matching candidate, or null once every candidate has failed
 */
export async function discover(options: DiscoveryOptions): Promise<Candidate | null> {
    const logger = options.logger ?? silentLogger;

    let ports: string[];
    if (options.ports) {
        ports = options.ports;
    } else {
        try {
            ports = await (options.portLister ?? listSerialPorts)();
        } catch (e) {
            logger.error(`Listing serial ports failed: ${describeError(e)}`);
            return null;
        }
    }

    const candidates = buildCandidates(ports, options.parities, options.bauds);
    if (candidates.length === 0) {
        return null;
    }
    if (options.statusCallback) options.statusCallback(`Scanning ${ports.length} port(s), ${candidates.length} candidate(s)...`);

    for (const candidate of candidates) {
        if (options.shouldStop && options.shouldStop()) break;

        if (await probeCandidate(candidate, options)) {
            logger.log(`Found device on ${describeCandidate(candidate)}, slave ${options.slaveId}`);
            if (options.statusCallback) options.statusCallback(`Found device on ${describeCandidate(candidate)}`);
            return candidate;
        }
    }
    return null;
}
