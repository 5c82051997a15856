/**
 * Register Utility Functions
 * Reusable helpers for word arithmetic, user text parsing and timeouts
 */

import * as CONST from './constants';
import { TimeoutError } from './errors';

export type Parity = 'none' | 'even' | 'odd';

/**
 * Split 16-bit words into bytes, high byte first within each word
 */
export function wordsToBytes(words: readonly number[]): number[] {
    const bytes: number[] = [];
    for (const w of words) {
        bytes.push((w >> 8) & 0xFF, w & 0xFF);
    }
    return bytes;
}

/**
 * Interpret a register word as a two's-complement 16-bit integer
 */
export function toInt16(word: number): number {
    const w = word & CONST.WORD_MASK;
    return w >= CONST.INT16_SIGN_BIT ? w - CONST.UINT16_RANGE : w;
}

/**
 * Interpret an unsigned 32-bit value as two's-complement
 */
export function toInt32(value: number): number {
    return value >= CONST.INT32_SIGN_BIT ? value - CONST.UINT32_RANGE : value;
}

/**
 * Combine two consecutive registers into an unsigned 32-bit value.
 * Multiplication keeps the result unsigned where a shift would not.
 *
 * @param bigEndian - first word read is the high half
 */
export function combineWords(first: number, second: number, bigEndian: boolean): number {
    const high = bigEndian ? first : second;
    const low = bigEndian ? second : first;
    return (high & CONST.WORD_MASK) * CONST.UINT16_RANGE + (low & CONST.WORD_MASK);
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse user text as a decimal number. Hex, binary and octal literals are
 * not numbers here.
 *
 * @returns the number, or null when the text is empty or not numeric
 */
export function parseNumber(text: string): number | null {
    const trimmed = text.trim();
    if (!DECIMAL.test(trimmed)) return null;
    const value = Number(trimmed);
    return Number.isNaN(value) ? null : value;
}

const TRUE_WORDS = ['1', 'true', 'on', 'yes'];
const FALSE_WORDS = ['0', 'false', 'off', 'no'];

/**
 * Parse switch-style user text ("on", "yes", "1", ...)
 *
 * @returns the boolean, or null when the text is neither
 */
export function parseBooleanText(text: string): boolean | null {
    const t = text.trim().toLowerCase();
    if (TRUE_WORDS.includes(t)) return true;
    if (FALSE_WORDS.includes(t)) return false;
    return null;
}

/**
 * Parse a parity name; single-letter N/E/O forms are accepted
 */
export function parseParity(text: string): Parity | null {
    switch (text.trim().toLowerCase()) {
        case 'n':
        case 'none':
            return 'none';
        case 'e':
        case 'even':
            return 'even';
        case 'o':
        case 'odd':
            return 'odd';
        default:
            return null;
    }
}

export function parityLetter(parity: Parity): string {
    return parity === 'none' ? 'N' : parity === 'even' ? 'E' : 'O';
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    return String(error);
}

export function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Race an operation against a timer; the timer is cleared once either settles
 *
 * @throws {TimeoutError} when the timer wins
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(operationName, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeoutPromise]);
    } finally {
        if (timer) clearTimeout(timer);
    }
}
