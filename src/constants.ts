/**
 * Acquisition Constants
 * Centralized definitions for protocol values and loop timing
 */

// Modbus Function Codes
export const FC_READ_HOLDING = 3;              // Read holding registers
export const FC_READ_INPUT = 4;                // Read input registers
export const FC_WRITE_SINGLE = 6;              // Write single register

// Register Word Masks
export const WORD_MASK = 0xFFFF;               // One 16-bit register
export const INT16_SIGN_BIT = 0x8000;          // Sign bit of a 16-bit word
export const UINT16_RANGE = 0x10000;           // 2^16
export const INT32_SIGN_BIT = 0x80000000;      // Sign bit of a 32-bit value
export const UINT32_RANGE = 0x100000000;       // 2^32

// Register Size Multipliers
export const REG_SIZE_16 = 1;                  // 16-bit family = 1 register
export const REG_SIZE_32 = 2;                  // uint32/int32/ip32 = 2 registers
export const REG_SIZE_MAC48 = 3;               // MAC address = 3 registers

// Serial Line Defaults
export const DEFAULT_DATA_BITS = 8;
export const DEFAULT_STOP_BITS = 1;
export const DEFAULT_TIMEOUT = 200;            // Per-transaction RTU timeout (ms)
export const OPEN_TIMEOUT = 1000;             // Guard on opening/closing the port (ms)
export const DEFAULT_PROBE_SETTLE = 50;        // Pause after opening a probe port (ms)

// Discovery Candidates (descending preference)
export const COMMON_BAUDS = [115200, 57600, 38400, 19200, 9600] as const;
export const COMMON_PARITIES = ['none'] as const; // extend with 'even', 'odd' if needed

// Poll Loop Timing (ms)
export const SCAN_INTERVAL = 2000;             // Wait between discovery sweeps
export const SAMPLE_PERIOD = 300;              // Wait between acquisition passes
export const MAX_QUEUED_EVENTS = 1000;         // Oldest events dropped beyond this

// Unit ID Ranges
export const MIN_UNIT_ID = 1;                  // Minimum valid Modbus slave id
export const MAX_UNIT_ID = 247;                // Maximum valid Modbus slave id

// Register Map File
export const REGISTER_MAP_FILE = 'registers.json';
