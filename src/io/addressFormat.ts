import type { PointDataType } from '../types';

// Addresses are bit offsets into the PLC memory area; a REAL occupies one double word.
export const DATA_WIDTH_BITS: Record<PointDataType, number> = {
  BOOL: 1,
  REAL: 32
};

const BOOL_COMM_BASE = 3001;
const REAL_COMM_BASE = 43001;

export function dataTypeWidth(dataType: PointDataType): number {
  return DATA_WIDTH_BITS[dataType];
}

export function formatPlcAddress(address: number, dataType: PointDataType): string {
  const byteOffset = Math.floor(address / 8);
  if (dataType === 'REAL') {
    return `%MD${byteOffset}`;
  }
  return `%MX${byteOffset}.${address % 8}`;
}

/**
 * Host-side communication address of a point: coils count bits from 3001,
 * holding registers count 16-bit words from 43001.
 */
export function toCommAddress(address: number, dataType: PointDataType): number {
  if (dataType === 'REAL') {
    return Math.floor(Math.floor(address / 8) / 2) + REAL_COMM_BASE;
  }
  return address + BOOL_COMM_BASE;
}

/**
 * Inverse of formatPlcAddress, used for catalog entries written as `%MX20.0` / `%MD100`.
 */
export function parsePlcAddress(text: string): number | undefined {
  const trimmed = text.trim().toUpperCase();
  const bit = /^%MX(\d+)\.([0-7])$/.exec(trimmed);
  if (bit) {
    return Number.parseInt(bit[1] ?? '', 10) * 8 + Number.parseInt(bit[2] ?? '', 10);
  }
  const word = /^%MD(\d+)$/.exec(trimmed);
  if (word) {
    return Number.parseInt(word[1] ?? '', 10) * 8;
  }
  return undefined;
}
