import { MAX_2_BYTE } from "./constants.js";
import { ArchiveTooLargeError } from "./errors.js";

/**
 * Convert a Date to MS-DOS time format (2 second resolution).
 * - Bits 15-11: Hours (0-23)
 * - Bits 10-5: Minutes (0-59)
 * - Bits 4-0: Seconds/2 (0-29)
 */
export function getDosTime(date: Date): number {
  if (date.getFullYear() < 1980) return 0;
  return (
    (date.getHours() << 11) |
    (date.getMinutes() << 5) |
    (date.getSeconds() >> 1)
  );
}

/**
 * Convert a Date to MS-DOS date format. Dates before 1980 clamp to
 * 1980-01-01.
 * - Bits 15-9: Year offset from 1980 (0-127)
 * - Bits 8-5: Month (1-12)
 * - Bits 4-0: Day (1-31)
 */
export function getDosDate(date: Date): number {
  if (date.getFullYear() < 1980) return (1 << 5) | 1;
  return (
    ((date.getFullYear() - 1980) << 9) |
    ((date.getMonth() + 1) << 5) |
    date.getDate()
  );
}

/**
 * Validates that a modification date can be encoded in MS-DOS format. Dates
 * before 1980 are clamped rather than rejected.
 */
export function validateDate(date: Date): void {
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`File date is not a valid date (got ${String(date)})`);
  }
  if (date.getFullYear() > 2107) {
    throw new RangeError(
      `File date must be no later than the year 2107 (got ${date.getFullYear()})`
    );
  }
}

/**
 * Validates entry options to ensure they are within the limits of our encoding.
 * Throws an error if any field exceeds the maximum allowed size.
 */
export function validateEntryOptions({
  nameBytes,
  modificationTime,
  modificationDate,
}: {
  nameBytes: Uint8Array;
  modificationTime: number;
  modificationDate: number;
}): void {
  if (nameBytes.length > MAX_2_BYTE) {
    throw new RangeError(
      `File name exceeds maximum length of 65535 bytes (got ${nameBytes.length} bytes)`
    );
  }

  for (const [field, value] of [
    ["modification time", modificationTime],
    ["modification date", modificationDate],
  ] as const) {
    if (!Number.isInteger(value) || value < 0 || value > MAX_2_BYTE) {
      throw new RangeError(
        `File ${field} must be an integer between 0 and 65535 (got ${value})`
      );
    }
  }
}

/**
 * Throws ArchiveTooLargeError if value does not fit in a field holding at
 * most limit.
 */
export function assertFits(field: string, value: number, limit: number): void {
  if (value > limit) {
    throw new ArchiveTooLargeError(field, value, limit);
  }
}

export const UINT16 = "setUint16";
export const UINT32 = "setUint32";
type Ints = typeof UINT16 | typeof UINT32;

type DataViewValue = [Ints, number, boolean];

const OFFSETS = {
  setUint16: 2,
  setUint32: 4,
} satisfies Record<Ints, number>;

export function writeDataView(
  view: DataView,
  values: DataViewValue[],
  offset: number = 0
): number {
  for (const [method, value, littleEndian] of values) {
    view[method](offset, value, littleEndian);
    offset += OFFSETS[method];
  }
  return offset;
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}
