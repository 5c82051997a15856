import { decode, encode, encodeWords, isDecodeError, wordCountOf } from '../src/codec';
import { DecodeErrorKind, EncodeError } from '../src/errors';
import { RegisterDescriptor, defineRegister } from '../src/register-map';

describe('codec', () => {
    describe('decode', () => {
        test('uint16 applies scale', () => {
            const reg = defineRegister({ name: 'Window_ms', type: 'uint16', address: 0, scale: 0.5 });
            expect(decode(reg, [1000], 'big')).toEqual({ kind: 'number', value: 500 });
        });

        test('int16 uses two\'s complement', () => {
            const reg = defineRegister({ name: 'Offset', type: 'int16', address: 0 });
            expect(decode(reg, [0x8000], 'big')).toEqual({ kind: 'number', value: -32768 });
            expect(decode(reg, [0x7FFF], 'big')).toEqual({ kind: 'number', value: 32767 });
            expect(decode(reg, [0xFFFF], 'big')).toEqual({ kind: 'number', value: -1 });
        });

        test('command16 decodes like uint16', () => {
            const reg = defineRegister({ name: 'Zero', type: 'command16', address: 0, scale: 2 });
            expect(decode(reg, [21], 'big')).toEqual({ kind: 'number', value: 42 });
        });

        test('bool16 is true for any non-zero word', () => {
            const reg = defineRegister({ name: 'Alpha_ON', type: 'bool16', address: 0 });
            expect(decode(reg, [0], 'big')).toEqual({ kind: 'boolean', value: false });
            expect(decode(reg, [1], 'big')).toEqual({ kind: 'boolean', value: true });
            expect(decode(reg, [0x8000], 'big')).toEqual({ kind: 'boolean', value: true });
        });

        test('enum16 resolves labels and falls back to the raw number', () => {
            const reg = defineRegister({ name: 'Osc', type: 'enum16', address: 0, symbolMap: { '0': 'Internal', '1': 'External' } });
            expect(decode(reg, [1], 'big')).toEqual({ kind: 'label', value: 'External', raw: 1 });
            expect(decode(reg, [7], 'big')).toEqual({ kind: 'number', value: 7 });
        });

        test('bitmask16 collects the labels of set bits', () => {
            const reg = defineRegister({ name: 'Status', type: 'bitmask16', address: 0, symbolMap: { '1': 'RUNNING', '2': 'FAULT' } });
            const both = decode(reg, [3], 'big');
            expect(both.kind).toBe('flags');
            expect(both.kind === 'flags' ? new Set(both.value) : null).toEqual(new Set(['RUNNING', 'FAULT']));
            expect(decode(reg, [0], 'big')).toEqual({ kind: 'flags', value: [] });
            expect(decode(reg, [2], 'big')).toEqual({ kind: 'flags', value: ['FAULT'] });
        });

        test('int32 honours word order', () => {
            const reg = defineRegister({ name: 'Thickness', type: 'int32', address: 0 });
            expect(decode(reg, [0x0001, 0x0000], 'big')).toEqual({ kind: 'number', value: 65536 });
            expect(decode(reg, [0x0001, 0x0000], 'little')).toEqual({ kind: 'number', value: 1 });
            expect(decode(reg, [0xFFFF, 0xFFFF], 'big')).toEqual({ kind: 'number', value: -1 });
            expect(decode(reg, [0x8000, 0x0000], 'big')).toEqual({ kind: 'number', value: -2147483648 });
        });

        test('uint32 stays unsigned', () => {
            const reg = defineRegister({ name: 'Freq', type: 'uint32', address: 0, scale: 0.01 });
            const value = decode(reg, [0xFFFF, 0xFFFF], 'big');
            expect(value.kind).toBe('number');
            expect(value.kind === 'number' ? value.value : NaN).toBeCloseTo(42949672.95, 5);
            expect(decode(reg, [0x0000, 0x0064], 'little')).toEqual({ kind: 'number', value: 0x00640000 * 0.01 });
        });

        test('ip32 renders dotted octets', () => {
            const reg = defineRegister({ name: 'IP', type: 'ip32', address: 0 });
            expect(decode(reg, [0x0A00, 0x0001], 'big')).toEqual({ kind: 'text', value: '10.0.0.1' });
            expect(decode(reg, [0x0A00, 0x0001], 'little')).toEqual({ kind: 'text', value: '10.0.0.1' });
        });

        test('mac48 renders colon-separated uppercase hex', () => {
            const reg = defineRegister({ name: 'MAC', type: 'mac48', address: 0 });
            expect(decode(reg, [0x0011, 0x2233, 0x4455], 'little')).toEqual({ kind: 'text', value: '00:11:22:33:44:55' });
            expect(decode(reg, [0xAABB, 0xCCDD, 0xEEFF], 'big')).toEqual({ kind: 'text', value: 'AA:BB:CC:DD:EE:FF' });
            expect(decode(reg, [0x0102, 0x0304, 0x0506], 'big')).toEqual({ kind: 'text', value: '01:02:03:04:05:06' });
        });

        test('ascii strips trailing NUL and whitespace', () => {
            const reg = defineRegister({ name: 'Model', type: 'ascii', address: 0, wordCount: 2 });
            expect(decode(reg, [0x4142, 0x4300], 'big')).toEqual({ kind: 'text', value: 'ABC' });
            expect(decode(reg, [0x2051, 0x2000], 'big')).toEqual({ kind: 'text', value: 'Q' });
        });

        test('ascii drops bytes outside 7-bit ASCII', () => {
            const reg = defineRegister({ name: 'Model', type: 'ascii', address: 0, wordCount: 2 });
            expect(decode(reg, [0x41FF, 0x8042], 'big')).toEqual({ kind: 'text', value: 'AB' });
        });

        test('unknown type decodes to an unsupported error value', () => {
            const reg = defineRegister({ name: 'Gain', type: 'float32', address: 0, wordCount: 2 });
            const value = decode(reg, [0x3F80, 0x0000], 'big');
            expect(isDecodeError(value)).toBe(true);
            expect(value).toEqual({ kind: 'error', error: DecodeErrorKind.UnsupportedType, message: 'unsupported register type "float32"' });
        });

        test('short read is a malformed response, not a throw', () => {
            const reg = defineRegister({ name: 'Freq', type: 'uint32', address: 0 });
            expect(decode(reg, [1], 'big')).toEqual({ kind: 'error', error: DecodeErrorKind.MalformedResponse, message: 'expected 2 word(s), got 1' });
        });
    });

    describe('wordCountOf', () => {
        test('fixed-width types imply their size', () => {
            expect(wordCountOf(defineRegister({ name: 'a', type: 'int16', address: 0 }))).toBe(1);
            expect(wordCountOf(defineRegister({ name: 'b', type: 'int32', address: 0 }))).toBe(2);
            expect(wordCountOf(defineRegister({ name: 'c', type: 'ip32', address: 0 }))).toBe(2);
            expect(wordCountOf(defineRegister({ name: 'd', type: 'mac48', address: 0 }))).toBe(3);
            expect(wordCountOf(defineRegister({ name: 'e', type: 'ascii', address: 0, wordCount: 8 }))).toBe(8);
            expect(wordCountOf(defineRegister({ name: 'f', type: 'ascii', address: 0 }))).toBe(1);
        });
    });

    describe('encode', () => {
        test('clamps to bounds before scaling', () => {
            const reg = defineRegister({ name: 'Level', type: 'uint16', address: 0, bounds: { min: 0, max: 100 } });
            expect(encode(reg, '150')).toBe(100);
            const scaled = defineRegister({ name: 'Level', type: 'uint16', address: 0, scale: 0.1, bounds: { min: 0, max: 100 } });
            expect(encode(scaled, '150')).toBe(1000);
            expect(encode(scaled, '-3')).toBe(0);
        });

        test('divides by scale and rounds to nearest', () => {
            const reg = defineRegister({ name: 'Density', type: 'uint16', address: 0, scale: 0.001 });
            expect(encode(reg, '8.92')).toBe(8920);
            expect(encode(reg, 1.2346)).toBe(1235);
        });

        test('treats a zero scale as no scaling', () => {
            const reg: RegisterDescriptor = { name: 'Raw', type: 'uint16', address: 0, functionCode: 3, scale: 0, wordCount: 1 };
            expect(encode(reg, 12.4)).toBe(12);
        });

        test('int16 negatives become two\'s-complement words', () => {
            const reg = defineRegister({ name: 'Offset', type: 'int16', address: 0 });
            expect(encode(reg, '-5')).toBe(0xFFFB);
            expect(() => encode(reg, 40000)).toThrow(EncodeError);
        });

        test('rejects values that do not fit the register', () => {
            const reg = defineRegister({ name: 'Window_ms', type: 'uint16', address: 0 });
            expect(() => encode(reg, 70000)).toThrow('raw value 70000 outside 0..65535');
            expect(() => encode(reg, -1)).toThrow(EncodeError);
        });

        test('rejects non-numeric and non-finite input', () => {
            const reg = defineRegister({ name: 'Window_ms', type: 'uint16', address: 0 });
            expect(() => encode(reg, 'abc')).toThrow('Cannot encode value for "Window_ms": "abc" is not a number');
            expect(() => encode(reg, '')).toThrow(EncodeError);
            expect(() => encode(reg, '0x10')).toThrow('Cannot encode value for "Window_ms": "0x10" is not a number');
            expect(() => encode(reg, Infinity)).toThrow(EncodeError);
            expect(() => encode(reg, NaN)).toThrow(EncodeError);
            expect(() => encode(reg, true)).toThrow(EncodeError);
        });

        test('bool16 takes booleans and switch words', () => {
            const reg = defineRegister({ name: 'Alpha_ON', type: 'bool16', address: 0 });
            expect(encode(reg, true)).toBe(1);
            expect(encode(reg, false)).toBe(0);
            expect(encode(reg, 'ON')).toBe(1);
            expect(encode(reg, 'yes')).toBe(1);
            expect(encode(reg, '0')).toBe(0);
            expect(encode(reg, 'off')).toBe(0);
            expect(() => encode(reg, 'maybe')).toThrow(EncodeError);
        });

        test('enum16 takes a label (any case) or a raw number', () => {
            const reg = defineRegister({ name: 'Osc', type: 'enum16', address: 0, symbolMap: { '0': 'Internal', '1': 'External' } });
            expect(encode(reg, 'external')).toBe(1);
            expect(encode(reg, ' Internal ')).toBe(0);
            expect(encode(reg, '7')).toBe(7);
            expect(encode(reg, 3)).toBe(3);
            expect(() => encode(reg, 'crystal')).toThrow('unknown label "crystal"');
        });

        test('bitmask16 ORs flag labels', () => {
            const reg = defineRegister({ name: 'Status', type: 'bitmask16', address: 0, symbolMap: { '1': 'RUNNING', '2': 'FAULT' } });
            expect(encode(reg, ['RUNNING', 'FAULT'])).toBe(3);
            expect(encode(reg, 'fault')).toBe(2);
            expect(encode(reg, 'RUNNING, FAULT')).toBe(3);
            expect(encode(reg, '5')).toBe(5);
            expect(() => encode(reg, ['IDLE'])).toThrow('unknown flag "IDLE"');
        });

        test('multi-word and text types are not single-register writes', () => {
            expect(() => encode(defineRegister({ name: 'Freq', type: 'uint32', address: 0 }), 1)).toThrow(EncodeError);
            expect(() => encode(defineRegister({ name: 'IP', type: 'ip32', address: 0 }), '10.0.0.1')).toThrow(EncodeError);
            expect(() => encode(defineRegister({ name: 'Model', type: 'ascii', address: 0 }), 'AB')).toThrow(EncodeError);
        });
    });

    describe('round trip', () => {
        test('uint16 and int16 survive within scale rounding', () => {
            const u = defineRegister({ name: 'u', type: 'uint16', address: 0, scale: 0.1 });
            const i = defineRegister({ name: 'i', type: 'int16', address: 0, scale: 0.5 });
            for (const v of [0, 12.3, 6553.5]) {
                const out = decode(u, [encode(u, v)], 'big');
                expect(out.kind === 'number' ? out.value : NaN).toBeCloseTo(v, 6);
            }
            for (const v of [-12.5, -16384, 16383.5]) {
                const out = decode(i, [encode(i, v)], 'big');
                expect(out.kind === 'number' ? out.value : NaN).toBeCloseTo(v, 6);
            }
        });

        test('uint32 and int32 survive in both word orders', () => {
            const u = defineRegister({ name: 'u', type: 'uint32', address: 0 });
            const i = defineRegister({ name: 'i', type: 'int32', address: 0, scale: 0.1 });
            for (const order of ['big', 'little'] as const) {
                expect(decode(u, encodeWords(u, 4000000000, order), order)).toEqual({ kind: 'number', value: 4000000000 });
                const out = decode(i, encodeWords(i, -1234.5, order), order);
                expect(out.kind === 'number' ? out.value : NaN).toBeCloseTo(-1234.5, 6);
            }
            expect(encodeWords(u, 65536, 'big')).toEqual([1, 0]);
            expect(encodeWords(u, 65536, 'little')).toEqual([0, 1]);
        });

        test('bool16, enum and bitmask labels survive', () => {
            const b = defineRegister({ name: 'b', type: 'bool16', address: 0 });
            expect(decode(b, [encode(b, true)], 'big')).toEqual({ kind: 'boolean', value: true });
            const e = defineRegister({ name: 'e', type: 'enum16', address: 0, symbolMap: { '2': 'END_OF_LIFE' } });
            expect(decode(e, [encode(e, 'END_OF_LIFE')], 'big')).toEqual({ kind: 'label', value: 'END_OF_LIFE', raw: 2 });
            const m = defineRegister({ name: 'm', type: 'bitmask16', address: 0, symbolMap: { '4': 'SHUTTER_OPEN' } });
            expect(decode(m, [encode(m, ['SHUTTER_OPEN'])], 'big')).toEqual({ kind: 'flags', value: ['SHUTTER_OPEN'] });
        });
    });
});
