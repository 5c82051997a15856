/**
 * Register codec: raw 16-bit words to typed values and back.
 * Pure functions, parameterized by a descriptor and the map's word order.
 */

import * as CONST from './constants';
import { DecodeErrorKind, EncodeError } from './errors';
import { Endianness, RegisterDescriptor, SymbolEntry, impliedWordCount } from './register-map';
import { combineWords, parseBooleanText, parseNumber, toInt16, toInt32, wordsToBytes } from './utils';

export type DecodedValue =
    | { kind: 'boolean'; value: boolean }
    | { kind: 'number'; value: number }
    | { kind: 'label'; value: string; raw: number }
    | { kind: 'flags'; value: string[] }
    | { kind: 'text'; value: string }
    | { kind: 'error'; error: DecodeErrorKind; message: string };

export type DecodeFailure = Extract<DecodedValue, { kind: 'error' }>;

export type EngineeringValue = number | boolean | string | readonly string[];

export function decodeError(error: DecodeErrorKind, message: string): DecodeFailure {
    return { kind: 'error', error, message };
}

export function isDecodeError(value: DecodedValue | undefined): value is DecodeFailure {
    return value !== undefined && value.kind === 'error';
}

/**
 * Registers to read for a descriptor
 */
export function wordCountOf(descriptor: RegisterDescriptor): number {
    return impliedWordCount(descriptor.type) ?? descriptor.wordCount;
}

function lookupLabel(symbols: readonly SymbolEntry[], raw: number): string | undefined {
    return symbols.find(s => s.value === raw)?.label;
}

function decodeAscii(words: readonly number[]): string {
    const chars = wordsToBytes(words)
        .filter(b => b <= 0x7F)
        .map(b => String.fromCharCode(b))
        .join('');
    return chars.replace(/\0+$/, '').trim();
}

// Six bytes in natural word order, high byte first: 0x0011 0x2233 0x4455 -> 00:11:22:33:44:55
function decodeMac(words: readonly number[]): string {
    return wordsToBytes(words)
        .map(b => b.toString(16).toUpperCase().padStart(2, '0'))
        .join(':');
}

/**
 * Turn the words read for one register into its typed value.
 * Never throws: short reads and unknown types come back as error values.
 */
export function decode(descriptor: RegisterDescriptor, words: readonly number[], endianness: Endianness): DecodedValue {
    const needed = wordCountOf(descriptor);
    if (words.length < needed) {
        return decodeError(DecodeErrorKind.MalformedResponse, `expected ${needed} word(s), got ${words.length}`);
    }
    const w = words[0] & CONST.WORD_MASK;

    switch (descriptor.type) {
        case 'uint16':
        case 'command16':
            return { kind: 'number', value: w * descriptor.scale };
        case 'int16':
            return { kind: 'number', value: toInt16(w) * descriptor.scale };
        case 'bool16':
            return { kind: 'boolean', value: w !== 0 };
        case 'enum16': {
            const label = lookupLabel(descriptor.symbols ?? [], w);
            return label !== undefined ? { kind: 'label', value: label, raw: w } : { kind: 'number', value: w };
        }
        case 'bitmask16':
            return {
                kind: 'flags',
                value: (descriptor.symbols ?? []).filter(s => (w & s.value) !== 0).map(s => s.label)
            };
        case 'uint32':
        case 'int32': {
            const combined = combineWords(words[0], words[1], endianness === 'big');
            const value = descriptor.type === 'int32' ? toInt32(combined) : combined;
            return { kind: 'number', value: value * descriptor.scale };
        }
        case 'ip32':
            return { kind: 'text', value: wordsToBytes(words.slice(0, 2)).join('.') };
        case 'mac48':
            return { kind: 'text', value: decodeMac(words.slice(0, 3)) };
        case 'ascii':
            return { kind: 'text', value: decodeAscii(words.slice(0, needed)) };
        default:
            return decodeError(DecodeErrorKind.UnsupportedType, `unsupported register type "${descriptor.type}"`);
    }
}

function toNumber(descriptor: RegisterDescriptor, value: EngineeringValue): number {
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new EncodeError(descriptor.name, `${value} is not a finite number`);
        }
        return value;
    }
    if (typeof value === 'string') {
        const parsed = parseNumber(value);
        if (parsed === null) {
            throw new EncodeError(descriptor.name, `"${value}" is not a number`);
        }
        if (!Number.isFinite(parsed)) {
            throw new EncodeError(descriptor.name, `${parsed} is not a finite number`);
        }
        return parsed;
    }
    throw new EncodeError(descriptor.name, `expected a number, got ${typeof value === 'boolean' ? 'a boolean' : 'a list'}`);
}

/**
 * Clamp to the descriptor's bounds in engineering units, then scale and
 * round to the nearest raw integer. A zero scale means no scaling.
 */
function toRaw(descriptor: RegisterDescriptor, value: EngineeringValue): number {
    let v = toNumber(descriptor, value);
    const { min, max } = descriptor.bounds ?? {};
    if (min !== undefined && v < min) v = min;
    if (max !== undefined && v > max) v = max;

    const scale = descriptor.scale === 0 ? 1 : descriptor.scale;
    return Math.round(v / scale);
}

function checkWord(descriptor: RegisterDescriptor, raw: number, min: number, max: number): number {
    if (raw < min || raw > max) {
        throw new EncodeError(descriptor.name, `raw value ${raw} outside ${min}..${max}`);
    }
    return raw < 0 ? raw + CONST.UINT16_RANGE : raw;
}

function encodeScaled(descriptor: RegisterDescriptor, value: EngineeringValue, signed: boolean): number {
    const raw = toRaw(descriptor, value);
    return signed ? checkWord(descriptor, raw, -CONST.INT16_SIGN_BIT, CONST.INT16_SIGN_BIT - 1) : checkWord(descriptor, raw, 0, CONST.WORD_MASK);
}

function encodeBool(descriptor: RegisterDescriptor, value: EngineeringValue): number {
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (typeof value === 'string') {
        const parsed = parseBooleanText(value);
        if (parsed === null) {
            throw new EncodeError(descriptor.name, `"${value}" is not an on/off value`);
        }
        return parsed ? 1 : 0;
    }
    return toNumber(descriptor, value) !== 0 ? 1 : 0;
}

function encodeEnum(descriptor: RegisterDescriptor, value: EngineeringValue): number {
    if (typeof value === 'string') {
        const wanted = value.trim().toLowerCase();
        const match = (descriptor.symbols ?? []).find(s => s.label.toLowerCase() === wanted);
        if (match) return match.value;
        if (parseNumber(value) === null) {
            throw new EncodeError(descriptor.name, `unknown label "${value}"`);
        }
    }
    return checkWord(descriptor, Math.trunc(toNumber(descriptor, value)), 0, CONST.WORD_MASK);
}

function encodeFlags(descriptor: RegisterDescriptor, value: EngineeringValue): number {
    let labels: readonly string[];
    if (Array.isArray(value)) {
        labels = value;
    } else if (typeof value === 'string' && parseNumber(value) === null) {
        labels = value.split(',').map(s => s.trim()).filter(s => s !== '');
    } else {
        return checkWord(descriptor, Math.trunc(toNumber(descriptor, value)), 0, CONST.WORD_MASK);
    }

    let raw = 0;
    for (const label of labels) {
        const match = (descriptor.symbols ?? []).find(s => s.label.toLowerCase() === label.toLowerCase());
        if (!match) {
            throw new EncodeError(descriptor.name, `unknown flag "${label}"`);
        }
        raw |= match.value;
    }
    return raw;
}

function encodeScaled32(descriptor: RegisterDescriptor, value: EngineeringValue, endianness: Endianness): number[] {
    const raw = toRaw(descriptor, value);
    const signed = descriptor.type === 'int32';
    const lo = signed ? -CONST.INT32_SIGN_BIT : 0;
    const hi = signed ? CONST.INT32_SIGN_BIT - 1 : CONST.UINT32_RANGE - 1;
    if (raw < lo || raw > hi) {
        throw new EncodeError(descriptor.name, `raw value ${raw} outside ${lo}..${hi}`);
    }
    const unsigned = raw < 0 ? raw + CONST.UINT32_RANGE : raw;
    const high = Math.floor(unsigned / CONST.UINT16_RANGE);
    const low = unsigned % CONST.UINT16_RANGE;
    return endianness === 'big' ? [high, low] : [low, high];
}

/**
 * Register words for a value, 32-bit types included, in the map's word order.
 * The write path only issues single-register writes; this is the inverse of
 * `decode` for tooling and simulators.
 */
export function encodeWords(descriptor: RegisterDescriptor, value: EngineeringValue, endianness: Endianness): number[] {
    if (descriptor.type === 'uint32' || descriptor.type === 'int32') {
        return encodeScaled32(descriptor, value, endianness);
    }
    return [encode(descriptor, value)];
}

/**
 * Turn an engineering value (or the user's text for it) into the single
 * register word to write.
 *
 * @throws {EncodeError} for unparseable input, unknown labels, values that do
 * not fit one register, and types that span several registers
 */
export function encode(descriptor: RegisterDescriptor, value: EngineeringValue): number {
    switch (descriptor.type) {
        case 'uint16':
        case 'command16':
            return encodeScaled(descriptor, value, false);
        case 'int16':
            return encodeScaled(descriptor, value, true);
        case 'bool16':
            return encodeBool(descriptor, value);
        case 'enum16':
            return encodeEnum(descriptor, value);
        case 'bitmask16':
            return encodeFlags(descriptor, value);
        default:
            throw new EncodeError(descriptor.name, `single-register writes are not supported for type ${descriptor.type}`);
    }
}
