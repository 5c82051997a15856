import { DecodedValue, decode, decodeError, wordCountOf } from './codec';
import { DecodeErrorKind, TransportError } from './errors';
import { Endianness, RegisterDescriptor, isKnownType } from './register-map';
import { RegisterTransport } from './rtu-client';
import { describeError } from './utils';

/** Register name → value, in register-list order. */
export type AcquisitionResult = Map<string, DecodedValue>;

/**
 * Read and decode one register. Any failure, including a lost line, comes
 * back as that register's error value. Only an unreachable line or a timeout
 * is reported as a transport error. Registers of an unknown type are never
 * put on the bus.
 */
export async function readRegister(transport: RegisterTransport, descriptor: RegisterDescriptor, endianness: Endianness): Promise<DecodedValue> {
    if (!isKnownType(descriptor.type)) {
        return decodeError(DecodeErrorKind.UnsupportedType, `unsupported register type "${descriptor.type}"`);
    }
    try {
        const words = await transport.readRegisters(descriptor.address, wordCountOf(descriptor), descriptor.functionCode);
        return decode(descriptor, words, endianness);
    } catch (e) {
        if (e instanceof TransportError) {
            // The device answered, so the line itself is fine
            if (e.reason === 'exception') return decodeError(DecodeErrorKind.Exception, e.message);
            if (e.reason === 'protocol') return decodeError(DecodeErrorKind.MalformedResponse, e.message);
            return decodeError(DecodeErrorKind.Transport, e.message);
        }
        return decodeError(DecodeErrorKind.Exception, describeError(e));
    }
}

/**
 * One acquisition pass over the register list. Registers are read one after
 * another; a failing register never stops the rest of the pass.
 */
export async function readAll(transport: RegisterTransport, registers: readonly RegisterDescriptor[], endianness: Endianness): Promise<AcquisitionResult> {
    const out: AcquisitionResult = new Map();
    for (const r of registers) {
        out.set(r.name, await readRegister(transport, r, endianness));
    }
    return out;
}

/**
 * True when no register of the pass decoded and at least one failed at the
 * transport, the signature of a device that went away mid-run.
 */
export function isTransportLoss(result: AcquisitionResult): boolean {
    let lost = false;
    for (const value of result.values()) {
        if (value.kind !== 'error') return false;
        if (value.error === DecodeErrorKind.Transport) lost = true;
    }
    return lost;
}
