import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import * as CONST from './constants';
import { RegisterMapError, RegisterNotFoundError } from './errors';
import { Logger, silentLogger } from './logger';

export const REGISTER_TYPES = [
    'uint16', 'int16', 'bool16', 'enum16', 'bitmask16', 'command16',
    'uint32', 'int32', 'ip32', 'mac48', 'ascii'
] as const;

export type KnownRegisterType = typeof REGISTER_TYPES[number];

// Unknown types load (with a warning) and decode to an "unsupported" value
export type RegisterType = KnownRegisterType | (string & {});

export type Endianness = 'big' | 'little';

export interface SymbolEntry {
    value: number;
    label: string;
}

export interface RegisterBounds {
    min?: number;
    max?: number;
}

export interface RegisterDescriptor {
    readonly name: string;
    readonly type: RegisterType;
    readonly address: number;
    readonly functionCode: number;
    readonly scale: number;
    readonly wordCount: number;
    /** Ordered integer → label entries, present for enum16 and bitmask16 only. */
    readonly symbols?: readonly SymbolEntry[];
    readonly bounds?: Readonly<RegisterBounds>;
}

export interface RegisterMap {
    slaveId: number;
    endianness: Endianness;
    probe: RegisterDescriptor;
    registers: readonly RegisterDescriptor[];
}

const SCALED_TYPES: readonly string[] = ['uint16', 'int16', 'command16', 'uint32', 'int32'];
const SYMBOL_TYPES: readonly string[] = ['enum16', 'bitmask16'];

export function isKnownType(type: string): type is KnownRegisterType {
    return (REGISTER_TYPES as readonly string[]).includes(type);
}

/**
 * Number of registers a fixed-width type occupies, or null where the
 * descriptor decides (ascii and unknown types).
 */
export function impliedWordCount(type: RegisterType): number | null {
    switch (type) {
        case 'uint16':
        case 'int16':
        case 'bool16':
        case 'enum16':
        case 'bitmask16':
        case 'command16':
            return CONST.REG_SIZE_16;
        case 'uint32':
        case 'int32':
        case 'ip32':
            return CONST.REG_SIZE_32;
        case 'mac48':
            return CONST.REG_SIZE_MAC48;
        default:
            return null;
    }
}

const finite = z.number().finite();
const wordCountSchema = z.number().int().min(1).max(125);
const functionCodeSchema = z.number().int().min(1).max(127);
const symbolMapSchema = z.record(z.string(), z.string());

// Both the camelCase keys and the instrument vendor file's keys are accepted
const rawRegisterSchema = z.object({
    name: z.string().min(1),
    type: z.string().min(1),
    address: z.number().int().min(0).max(CONST.WORD_MASK),
    functionCode: functionCodeSchema.optional(),
    function: functionCodeSchema.optional(),
    scale: finite.optional(),
    wordCount: wordCountSchema.optional(),
    words: wordCountSchema.optional(),
    symbolMap: symbolMapSchema.optional(),
    map: symbolMapSchema.optional(),
    bounds: z.object({ min: finite.optional(), max: finite.optional() }).optional(),
    min: finite.optional(),
    max: finite.optional()
});

const rawMapSchema = z.object({
    slaveId: z.number().int().min(CONST.MIN_UNIT_ID).max(CONST.MAX_UNIT_ID).optional(),
    slave_id: z.number().int().min(CONST.MIN_UNIT_ID).max(CONST.MAX_UNIT_ID).optional(),
    endianness: z.enum(['big', 'little']),
    probe: rawRegisterSchema.nullish(),
    registers: z.array(rawRegisterSchema).min(1)
});

type RawRegister = z.infer<typeof rawRegisterSchema>;

function parseSymbols(raw: Record<string, string>, where: string, issues: string[]): SymbolEntry[] {
    const entries: SymbolEntry[] = [];
    for (const [key, label] of Object.entries(raw)) {
        const trimmed = key.trim();
        if (!/^\d+$/.test(trimmed)) {
            issues.push(`${where}: symbol key "${key}" is not a non-negative integer`);
            continue;
        }
        const value = parseInt(trimmed, 10);
        if (value > CONST.WORD_MASK) {
            issues.push(`${where}: symbol key ${value} does not fit in a 16-bit register`);
            continue;
        }
        entries.push({ value, label });
    }
    return entries;
}

function resolveRegister(raw: RawRegister, where: string, issues: string[], logger: Logger): RegisterDescriptor {
    const type: RegisterType = raw.type;
    const scale = raw.scale ?? 1.0;
    const explicitWords = raw.wordCount ?? raw.words;
    const implied = impliedWordCount(type);
    const symbolMap = raw.symbolMap ?? raw.map;
    const bounds: RegisterBounds = { ...raw.bounds };
    if (raw.min !== undefined) bounds.min = raw.min;
    if (raw.max !== undefined) bounds.max = raw.max;

    if (!isKnownType(type)) {
        logger.warn(`${where}: unknown register type "${type}" will decode as unsupported`);
    }
    if (SCALED_TYPES.includes(type) && scale === 0) {
        issues.push(`${where}: scale must be non-zero`);
    }
    if (implied !== null && explicitWords !== undefined && explicitWords !== implied) {
        issues.push(`${where}: type ${type} occupies ${implied} register(s), not ${explicitWords}`);
    }
    if (bounds.min !== undefined && bounds.max !== undefined && bounds.min > bounds.max) {
        issues.push(`${where}: min ${bounds.min} is greater than max ${bounds.max}`);
    }

    let symbols: SymbolEntry[] | undefined;
    if (SYMBOL_TYPES.includes(type)) {
        if (!symbolMap) {
            issues.push(`${where}: ${type} requires a symbol map`);
        } else {
            symbols = parseSymbols(symbolMap, where, issues);
        }
    }

    const descriptor: RegisterDescriptor = {
        name: raw.name,
        type,
        address: raw.address,
        functionCode: raw.functionCode ?? raw.function ?? CONST.FC_READ_HOLDING,
        scale,
        wordCount: implied ?? explicitWords ?? CONST.REG_SIZE_16,
        ...(symbols ? { symbols: Object.freeze(symbols) } : {}),
        ...(bounds.min !== undefined || bounds.max !== undefined ? { bounds: Object.freeze(bounds) } : {})
    };
    return Object.freeze(descriptor);
}

/**
 * Validate a register map document and resolve it into immutable descriptors.
 * Every problem is collected before failing so one load reports them all.
 *
 * @throws {RegisterMapError} when the document is malformed
 */
export function parseRegisterMap(document: unknown, source?: string, logger: Logger = silentLogger): RegisterMap {
    const parsed = rawMapSchema.safeParse(document);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
        throw new RegisterMapError(issues, source);
    }

    const raw = parsed.data;
    const issues: string[] = [];
    const slaveId = raw.slaveId ?? raw.slave_id;
    if (slaveId === undefined) {
        issues.push('slaveId is required');
    }

    const seen = new Set<string>();
    const registers = raw.registers.map((r, i) => {
        if (seen.has(r.name)) {
            issues.push(`registers.${i}: duplicate register name "${r.name}"`);
        }
        seen.add(r.name);
        return resolveRegister(r, `registers.${i} (${r.name})`, issues, logger);
    });

    const probe = raw.probe
        ? resolveRegister(raw.probe, `probe (${raw.probe.name})`, issues, logger)
        : registers[0];

    if (issues.length > 0 || slaveId === undefined) {
        throw new RegisterMapError(issues, source);
    }

    return {
        slaveId,
        endianness: raw.endianness,
        probe,
        registers: Object.freeze(registers)
    };
}

export type RegisterInput = z.input<typeof rawRegisterSchema>;

/**
 * Build one descriptor in code, with the same checks a loaded map gets
 */
export function defineRegister(input: RegisterInput, logger: Logger = silentLogger): RegisterDescriptor {
    const parsed = rawRegisterSchema.safeParse(input);
    if (!parsed.success) {
        throw new RegisterMapError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`), input.name);
    }
    const issues: string[] = [];
    const descriptor = resolveRegister(parsed.data, parsed.data.name, issues, logger);
    if (issues.length > 0) {
        throw new RegisterMapError(issues, input.name);
    }
    return descriptor;
}

/**
 * Return the first existing candidate for a register map file name.
 * Falls back to the bare name so the subsequent read reports the missing file.
 */
export function resolveRegisterMapPath(
    fileName: string = CONST.REGISTER_MAP_FILE,
    searchDirs: string[] = [process.cwd(), path.join(__dirname, '..', 'config')]
): string {
    if (path.isAbsolute(fileName)) return fileName;
    for (const dir of searchDirs) {
        const candidate = path.join(dir, fileName);
        if (fs.existsSync(candidate)) {
            return candidate;
        }
    }
    return fileName;
}

export function loadRegisterMap(filePath: string = resolveRegisterMapPath(), logger: Logger = silentLogger): RegisterMap {
    let document: unknown;
    try {
        document = fs.readJsonSync(filePath);
    } catch (e: unknown) {
        const message = e instanceof Error ? e.message : String(e);
        throw new RegisterMapError([`cannot read file: ${message}`], filePath);
    }
    const map = parseRegisterMap(document, filePath, logger);
    logger.log(`Loaded ${map.registers.length} registers from ${filePath} (slave ${map.slaveId}, ${map.endianness}-endian)`);
    return map;
}

export function findRegister(map: RegisterMap, name: string): RegisterDescriptor {
    const found = map.registers.find(r => r.name === name);
    if (!found) {
        throw new RegisterNotFoundError(name);
    }
    return found;
}
