import crc8Table from './crc8Table.json';

/**
 * Table driven CRC8 (Dallas/Maxim polynomial, seed 0) used as the second to
 * last byte of every command.
 */
export function crc8(data: Uint8Array): number {
  let crc = 0;
  for (let i = 0; i < data.length; i++) {
    crc = crc8Table[crc ^ data[i]];
  }
  return crc;
}

/**
 * Two's complement of the byte sum, the last byte of every command
 */
export function frameChecksum(data: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < data.length; i++) {
    sum += data[i];
  }
  return (~sum + 1) & 0b11111111;
}
