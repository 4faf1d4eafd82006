import yauzl from "yauzl-promise";
import { createHash } from "crypto";

export interface ZipEntryInfo {
  filename: string;
  compressionMethod: number;
  compressedSize: number;
  uncompressedSize: number;
  crc32: number;
  sha256: string;
}

/**
 * Read a ZIP archive with yauzl-promise, decompressing every entry.
 * Returns entry information including SHA256 hashes of content.
 */
export async function validateZip(
  zipBuffer: Uint8Array
): Promise<ZipEntryInfo[]> {
  const buffer = Buffer.from(
    zipBuffer.buffer,
    zipBuffer.byteOffset,
    zipBuffer.byteLength
  );
  const zipFile = await yauzl.fromBuffer(buffer);
  const entries: ZipEntryInfo[] = [];

  try {
    for await (const entry of zipFile) {
      const readStream = await entry.openReadStream();
      const hash = createHash("sha256");
      for await (const chunk of readStream) {
        hash.update(chunk);
      }
      entries.push({
        filename: entry.filename,
        compressionMethod: entry.compressionMethod,
        compressedSize: entry.compressedSize,
        uncompressedSize: entry.uncompressedSize,
        crc32: entry.crc32,
        sha256: hash.digest("hex"),
      });
    }
  } finally {
    await zipFile.close();
  }

  return entries;
}

export function sha256(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Helper to collect a ReadableStream into a Uint8Array
 */
export async function collectStream(
  stream: ReadableStream<Uint8Array>
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  const reader = stream.getReader();

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }

  const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

const textDecoder = new TextDecoder();

function viewOf(zip: Uint8Array): DataView {
  return new DataView(zip.buffer, zip.byteOffset, zip.byteLength);
}

export function signatureAt(zip: Uint8Array, offset: number): number[] {
  return Array.from(zip.subarray(offset, offset + 4));
}

export interface LocalFileHeader {
  versionNeeded: number;
  flags: number;
  method: number;
  modificationTime: number;
  modificationDate: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  extraLength: number;
  name: string;
  /** Stored (possibly compressed) bytes following the header */
  data: Uint8Array;
}

/**
 * Decode the local file header that starts at offset.
 */
export function readLocalFileHeader(
  zip: Uint8Array,
  offset: number
): LocalFileHeader {
  const view = viewOf(zip);
  const nameLength = view.getUint16(offset + 26, true);
  const extraLength = view.getUint16(offset + 28, true);
  const compressedSize = view.getUint32(offset + 18, true);
  const nameStart = offset + 30;
  const dataStart = nameStart + nameLength + extraLength;
  return {
    versionNeeded: view.getUint16(offset + 4, true),
    flags: view.getUint16(offset + 6, true),
    method: view.getUint16(offset + 8, true),
    modificationTime: view.getUint16(offset + 10, true),
    modificationDate: view.getUint16(offset + 12, true),
    crc32: view.getUint32(offset + 14, true),
    compressedSize,
    uncompressedSize: view.getUint32(offset + 22, true),
    extraLength,
    name: textDecoder.decode(zip.subarray(nameStart, nameStart + nameLength)),
    data: zip.subarray(dataStart, dataStart + compressedSize),
  };
}

export interface EndOfCentralDirectory {
  offset: number;
  diskNumber: number;
  centralDirectoryDisk: number;
  entriesOnDisk: number;
  totalEntries: number;
  centralDirectorySize: number;
  centralDirectoryOffset: number;
  commentLength: number;
}

/**
 * Decode the end of central directory record, which ends the archive (no
 * archive comment is ever written).
 */
export function readEOCD(zip: Uint8Array): EndOfCentralDirectory {
  const view = viewOf(zip);
  const offset = zip.length - 22;
  return {
    offset,
    diskNumber: view.getUint16(offset + 4, true),
    centralDirectoryDisk: view.getUint16(offset + 6, true),
    entriesOnDisk: view.getUint16(offset + 8, true),
    totalEntries: view.getUint16(offset + 10, true),
    centralDirectorySize: view.getUint32(offset + 12, true),
    centralDirectoryOffset: view.getUint32(offset + 16, true),
    commentLength: view.getUint16(offset + 20, true),
  };
}

export interface CentralDirectoryHeader {
  signature: number[];
  versionMadeBy: number;
  versionNeeded: number;
  flags: number;
  method: number;
  modificationTime: number;
  modificationDate: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  extraLength: number;
  commentLength: number;
  diskNumberStart: number;
  internalAttributes: number;
  externalAttributes: number;
  localHeaderOffset: number;
  name: string;
  nameBytes: Uint8Array;
}

/**
 * Decode every central directory header, in the order they are stored.
 */
export function readCentralDirectory(
  zip: Uint8Array
): CentralDirectoryHeader[] {
  const view = viewOf(zip);
  const eocd = readEOCD(zip);
  const headers: CentralDirectoryHeader[] = [];
  let offset = eocd.centralDirectoryOffset;
  for (let i = 0; i < eocd.totalEntries; i++) {
    const nameLength = view.getUint16(offset + 28, true);
    const extraLength = view.getUint16(offset + 30, true);
    const commentLength = view.getUint16(offset + 32, true);
    const nameBytes = zip.subarray(offset + 46, offset + 46 + nameLength);
    headers.push({
      signature: signatureAt(zip, offset),
      versionMadeBy: view.getUint16(offset + 4, true),
      versionNeeded: view.getUint16(offset + 6, true),
      flags: view.getUint16(offset + 8, true),
      method: view.getUint16(offset + 10, true),
      modificationTime: view.getUint16(offset + 12, true),
      modificationDate: view.getUint16(offset + 14, true),
      crc32: view.getUint32(offset + 16, true),
      compressedSize: view.getUint32(offset + 20, true),
      uncompressedSize: view.getUint32(offset + 24, true),
      extraLength,
      commentLength,
      diskNumberStart: view.getUint16(offset + 34, true),
      internalAttributes: view.getUint16(offset + 36, true),
      externalAttributes: view.getUint32(offset + 38, true),
      localHeaderOffset: view.getUint32(offset + 42, true),
      name: textDecoder.decode(nameBytes),
      nameBytes,
    });
    offset += 46 + nameLength + extraLength + commentLength;
  }
  return headers;
}
