import {
  CENTRAL_DIRECTORY_SIGNATURE,
  END_OF_CENTRAL_DIR_SIGNATURE,
  VERSION_MADE_BY,
  GENERAL_PURPOSE_FLAGS,
  EXTERNAL_FILE_ATTRIBUTES,
  CENTRAL_DIRECTORY_HEADER_SIZE,
  EOCD_SIZE,
  MAX_2_BYTE,
  MAX_4_BYTE,
  BIG_ENDIAN,
  LITTLE_ENDIAN,
} from "./constants.js";
import type { ResolvedEntry } from "./types.js";
import { assertFits, writeDataView, UINT16, UINT32 } from "./utils.js";
import { assertEntryFits, getVersionNeeded } from "./write-entry.js";

/**
 * Generate the Central Directory File Header for the given entry, pointing
 * at the local file header that starts at localHeaderOffset.
 */
export function getCDFH(
  entry: ResolvedEntry,
  localHeaderOffset: number
): Uint8Array {
  assertEntryFits(entry);
  assertFits(
    `Local header offset of "${entry.path}"`,
    localHeaderOffset,
    MAX_4_BYTE
  );

  const headerSize = CENTRAL_DIRECTORY_HEADER_SIZE + entry.nameBytes.length;
  const header = new Uint8Array(headerSize);
  const view = new DataView(header.buffer);

  const offset = writeDataView(view, [
    // Central directory file header signature
    [UINT32, CENTRAL_DIRECTORY_SIGNATURE, BIG_ENDIAN],
    // Version made by
    [UINT16, VERSION_MADE_BY, LITTLE_ENDIAN],
    // Version needed to extract
    [UINT16, getVersionNeeded(entry.method), LITTLE_ENDIAN],
    // General purpose bit flag
    [UINT16, GENERAL_PURPOSE_FLAGS, LITTLE_ENDIAN],
    // Compression method
    [UINT16, entry.method, LITTLE_ENDIAN],
    // Last mod file time & date
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
    // File comment length
    [UINT16, 0, LITTLE_ENDIAN],
    // Disk number start
    [UINT16, 0, LITTLE_ENDIAN],
    // Internal file attributes
    [UINT16, 0, LITTLE_ENDIAN],
    // External file attributes (Unix regular file, 0644)
    [UINT32, EXTERNAL_FILE_ATTRIBUTES, LITTLE_ENDIAN],
    // Relative offset of local header
    [UINT32, localHeaderOffset, LITTLE_ENDIAN],
  ]);

  // File name
  header.set(entry.nameBytes, offset);
  return header;
}

/**
 * Generate the End of Central Directory record (single volume, no comment).
 */
export function getEOCD({
  entriesCount,
  centralDirectoryOffset,
  centralDirectorySize,
}: {
  entriesCount: number;
  centralDirectoryOffset: number;
  centralDirectorySize: number;
}): Uint8Array {
  assertFits("Number of entries", entriesCount, MAX_2_BYTE);
  assertFits("Central directory offset", centralDirectoryOffset, MAX_4_BYTE);
  assertFits("Central directory size", centralDirectorySize, MAX_4_BYTE);

  const eocd = new Uint8Array(EOCD_SIZE);
  const view = new DataView(eocd.buffer);

  writeDataView(view, [
    // End of central dir signature
    [UINT32, END_OF_CENTRAL_DIR_SIGNATURE, BIG_ENDIAN],
    // Number of this disk
    [UINT16, 0, LITTLE_ENDIAN],
    // Disk where central directory starts
    [UINT16, 0, LITTLE_ENDIAN],
    // Number of central directory records on this disk
    [UINT16, entriesCount, LITTLE_ENDIAN],
    // Total number of central directory records
    [UINT16, entriesCount, LITTLE_ENDIAN],
    // Size of central directory
    [UINT32, centralDirectorySize, LITTLE_ENDIAN],
    // Offset of start of central directory
    [UINT32, centralDirectoryOffset, LITTLE_ENDIAN],
    // ZIP file comment length
    [UINT16, 0, LITTLE_ENDIAN],
  ]);

  return eocd;
}
