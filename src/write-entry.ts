import { CompressionMethod } from "./compression.js";
import {
  LOCAL_FILE_HEADER_SIGNATURE,
  VERSION_NEEDED_STORE,
  VERSION_NEEDED_DEFLATE,
  GENERAL_PURPOSE_FLAGS,
  LOCAL_FILE_HEADER_SIZE,
  MAX_4_BYTE,
  LITTLE_ENDIAN,
  BIG_ENDIAN,
} from "./constants.js";
import type { ResolvedEntry } from "./types.js";
import { assertFits, writeDataView, UINT16, UINT32 } from "./utils.js";

export function getVersionNeeded(method: CompressionMethod): number {
  return method === CompressionMethod.Deflate
    ? VERSION_NEEDED_DEFLATE
    : VERSION_NEEDED_STORE;
}

/**
 * Throws if the entry's sizes do not fit the 32-bit header fields.
 */
export function assertEntryFits(entry: ResolvedEntry): void {
  assertFits(
    `Uncompressed size of "${entry.path}"`,
    entry.uncompressedData.length,
    MAX_4_BYTE
  );
  assertFits(
    `Compressed size of "${entry.path}"`,
    entry.compressedData.length,
    MAX_4_BYTE
  );
}

export function getLocalFileHeader(entry: ResolvedEntry): Uint8Array {
  assertEntryFits(entry);
  const headerSize = LOCAL_FILE_HEADER_SIZE + entry.nameBytes.length;
  const header = new Uint8Array(headerSize);
  const view = new DataView(header.buffer);

  const offset = writeDataView(view, [
    // Local file header signature
    [UINT32, LOCAL_FILE_HEADER_SIGNATURE, BIG_ENDIAN],
    // Version needed to extract
    [UINT16, getVersionNeeded(entry.method), LITTLE_ENDIAN],
    // General purpose bit flag
    [UINT16, GENERAL_PURPOSE_FLAGS, LITTLE_ENDIAN],
    // Compression method
    [UINT16, entry.method, LITTLE_ENDIAN],
    // Last mod file time & date (MS-DOS format)
    [UINT16, entry.modificationTime, LITTLE_ENDIAN],
    [UINT16, entry.modificationDate, LITTLE_ENDIAN],
    // CRC-32
    [UINT32, entry.crc32, LITTLE_ENDIAN],
    // Compressed size
    [UINT32, entry.compressedData.length, LITTLE_ENDIAN],
    // Uncompressed size
    [UINT32, entry.uncompressedData.length, LITTLE_ENDIAN],
    // File name length
    [UINT16, entry.nameBytes.length, LITTLE_ENDIAN],
    // Extra field length
    [UINT16, 0, LITTLE_ENDIAN],
  ]);

  // File name
  header.set(entry.nameBytes, offset);
  return header;
}
