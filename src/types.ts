import type {
  CompressionLevel,
  CompressionMethod,
  Compressor,
} from "./compression.js";

export interface FileEntry {
  /** Archive-relative path, forward-slash separated */
  path: string;
  /** Uncompressed file data */
  data: Uint8Array;
  /**
   * Requested compression method (defaults to `Deflate`). `Deflate` is only
   * used if it makes the entry smaller.
   */
  compression?: CompressionMethod;
  /** Last modification time (MS-DOS format) */
  modificationTime?: number;
  /** Last modification date (MS-DOS format) */
  modificationDate?: number;
  /** Modification date, used for any MS-DOS field not given explicitly */
  date?: Date;
}

/** @private */
export interface PendingEntry {
  path: string;
  /** Encoded entry path */
  nameBytes: Uint8Array;
  data: Uint8Array;
  /** Compress if it makes the entry smaller */
  compress: boolean;
  modificationTime: number;
  modificationDate: number;
}

/** @private */
export interface ResolvedEntry {
  path: string;
  /** Encoded entry path */
  nameBytes: Uint8Array;
  uncompressedData: Uint8Array;
  /** Bytes written after the local file header */
  compressedData: Uint8Array;
  method: CompressionMethod;
  /** CRC-32 of the uncompressed data */
  crc32: number;
  modificationTime: number;
  modificationDate: number;
}

export interface ArchiveOptions {
  /** CRC-32 function. Defaults to the built-in table implementation. */
  crc32?: (data: Uint8Array, value?: number) => number;
  /** Raw DEFLATE compressor. Defaults to fflate. */
  compress?: Compressor;
  /** Compression level passed to the compressor (defaults to `"balanced"`) */
  level?: CompressionLevel;
}
