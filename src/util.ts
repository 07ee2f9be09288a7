import { MideaError } from './errors';

const TRUE_VALUES = ['y', 'yes', 't', 'true', 'on', '1'];
const FALSE_VALUES = ['n', 'no', 'f', 'false', 'off', '0'];

/**
 * Replaces a value with a default when it is undefined
 */
export function isNull<T>(val: T | undefined, nullVal: T): T {
  return val === undefined ? nullVal : val;
}

/**
 * Converts user input to a boolean.
 * Strings follow the usual truth table (yes/no, on/off, 1/0, ...), anything
 * else is coerced.
 */
export function asBool(value: string | number | boolean): boolean {
  if (typeof value !== 'string') {
    return Boolean(value);
  }
  const lower = value.toLowerCase();
  if (TRUE_VALUES.includes(lower)) {
    return true;
  }
  if (FALSE_VALUES.includes(lower)) {
    return false;
  }
  throw new MideaError(`Invalid boolean value: ${value}`);
}

/**
 * Converts user input to a number, rejecting anything that is not numeric
 */
export function asNumber(value: string | number | boolean): number {
  if (typeof value === 'string' && value.trim() === '') {
    throw new MideaError('Invalid numeric value: empty string');
  }
  const result = Number(value);
  if (Number.isNaN(result)) {
    throw new MideaError(`Invalid numeric value: ${value}`);
  }
  return result;
}

/**
 * Hides all but the last `keep` characters of a sensitive value.
 * A negative keep hides everything.
 */
export function redact(value: string | undefined | null, keep = 4): string {
  if (value === undefined || value === null) {
    return 'None';
  }
  if (keep <= 0) {
    return '*'.repeat(value.length);
  }
  if (value.length <= keep) {
    return value;
  }
  return '*'.repeat(value.length - keep) + value.slice(-keep);
}

/** Two digit uppercase hex of a single byte */
export function hexByte(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Promise based sleep, in seconds
 */
export function sleep(seconds: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, seconds * 1000)));
}

/**
 * Writes a decimal appliance id as an unsigned integer of `length` bytes
 */
export function idToBytes(id: string, length: number, endian: 'little' | 'big'): Buffer {
  if (!/^\d+$/.test(id)) {
    throw new MideaError(`Invalid appliance id: ${id}`);
  }
  let value = BigInt(id);
  const out = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    const index = endian === 'little' ? i : length - 1 - i;
    out[index] = Number(value & 0xFFn);
    value >>= 8n;
  }
  return out;
}

/**
 * Reads a little-endian unsigned integer of any width as a decimal string
 */
export function bytesToId(data: Buffer): string {
  let value = 0n;
  for (let i = data.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(data[i]);
  }
  return value.toString();
}
