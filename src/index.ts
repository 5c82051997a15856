export * from './acquisition';
export * from './codec';
export * from './crystal';
export * from './discovery';
export * from './errors';
export * from './event-queue';
export * from './logger';
export * from './poller';
export * from './register-map';
export * from './rtu-client';
export { parseBooleanText, parseParity, withTimeout } from './utils';
export type { Parity } from './utils';
export * as CONST from './constants';
