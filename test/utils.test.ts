import { TimeoutError } from '../src/errors';
import {
    combineWords,
    describeError,
    parityLetter,
    parseBooleanText,
    parseNumber,
    parseParity,
    toInt16,
    toInt32,
    withTimeout,
    wordsToBytes
} from '../src/utils';
import * as CONST from '../src/constants';

describe('utils', () => {
    describe('wordsToBytes', () => {
        test('splits each word high byte first', () => {
            expect(wordsToBytes([0x1234, 0x00FF])).toEqual([0x12, 0x34, 0x00, 0xFF]);
        });
        test('returns nothing for no words', () => {
            expect(wordsToBytes([])).toEqual([]);
        });
    });

    describe('toInt16', () => {
        test('keeps positive words', () => {
            expect(toInt16(0)).toBe(0);
            expect(toInt16(0x7FFF)).toBe(32767);
        });
        test('wraps words with the sign bit set', () => {
            expect(toInt16(CONST.INT16_SIGN_BIT)).toBe(-32768);
            expect(toInt16(0xFFFE)).toBe(-2);
        });
    });

    describe('toInt32', () => {
        test('wraps values with the sign bit set', () => {
            expect(toInt32(0x7FFFFFFF)).toBe(2147483647);
            expect(toInt32(0xFFFFFFFF)).toBe(-1);
        });
    });

    describe('combineWords', () => {
        test('puts the first word high when big-endian', () => {
            expect(combineWords(0x0001, 0x0002, true)).toBe(0x00010002);
        });
        test('puts the first word low when little-endian', () => {
            expect(combineWords(0x0001, 0x0002, false)).toBe(0x00020001);
        });
        test('stays unsigned at the top of the range', () => {
            expect(combineWords(0xFFFF, 0xFFFF, true)).toBe(4294967295);
        });
    });

    describe('parseNumber', () => {
        test('parses decimal text', () => {
            expect(parseNumber('12.5')).toBe(12.5);
            expect(parseNumber(' -3 ')).toBe(-3);
        });
        test('returns null for empty or non-numeric text', () => {
            expect(parseNumber('')).toBeNull();
            expect(parseNumber('   ')).toBeNull();
            expect(parseNumber('12a')).toBeNull();
        });
        test('accepts decimal exponents but not other radixes', () => {
            expect(parseNumber('1e3')).toBe(1000);
            expect(parseNumber('.5')).toBe(0.5);
            expect(parseNumber('0x10')).toBeNull();
            expect(parseNumber('0b11')).toBeNull();
            expect(parseNumber('0o7')).toBeNull();
            expect(parseNumber('Infinity')).toBeNull();
        });
    });

    describe('parseBooleanText', () => {
        test('recognises switch words in any case', () => {
            expect(parseBooleanText('On')).toBe(true);
            expect(parseBooleanText('TRUE')).toBe(true);
            expect(parseBooleanText('no')).toBe(false);
            expect(parseBooleanText(' 0 ')).toBe(false);
        });
        test('returns null for anything else', () => {
            expect(parseBooleanText('2')).toBeNull();
            expect(parseBooleanText('')).toBeNull();
        });
    });

    describe('parseParity', () => {
        test('accepts names and letters', () => {
            expect(parseParity('none')).toBe('none');
            expect(parseParity('E')).toBe('even');
            expect(parseParity(' odd ')).toBe('odd');
        });
        test('returns null for unknown parity', () => {
            expect(parseParity('mark')).toBeNull();
        });
        test('round-trips through the letter form', () => {
            expect(parityLetter('none')).toBe('N');
            expect(parityLetter('even')).toBe('E');
            expect(parityLetter('odd')).toBe('O');
        });
    });

    describe('describeError', () => {
        test('names the error class', () => {
            expect(describeError(new RangeError('bad'))).toBe('RangeError: bad');
            expect(describeError('plain')).toBe('plain');
        });
    });

    describe('withTimeout', () => {
        test('resolves with the operation result', async () => {
            await expect(withTimeout(Promise.resolve(5), 100, 'read')).resolves.toBe(5);
        });
        test('rejects with a TimeoutError when the operation is too slow', async () => {
            const slow = new Promise<number>(resolve => setTimeout(() => resolve(1), 200));
            await expect(withTimeout(slow, 10, 'open /dev/ttyUSB0')).rejects.toThrow(TimeoutError);
            await expect(withTimeout(new Promise<never>(() => undefined), 10, 'open /dev/ttyUSB0'))
                .rejects.toThrow('Operation "open /dev/ttyUSB0" timed out after 10ms');
        });
        test('passes the operation error through', async () => {
            await expect(withTimeout(Promise.reject(new Error('boom')), 100, 'read')).rejects.toThrow('boom');
        });
    });
});
