import {
  CompressionMethod,
  type CompressionLevel,
  type Compressor,
} from "./compression.js";
import type { PendingEntry, ResolvedEntry } from "./types.js";

export interface ResolveOptions {
  crc32: (data: Uint8Array, value?: number) => number;
  compress: Compressor;
  level: CompressionLevel;
}

/**
 * Compute the checksum and final stored bytes of an entry. Deflated output is
 * only kept when strictly smaller than the input; otherwise the entry is
 * stored with the caller's bytes unchanged.
 */
export function resolveEntry(
  entry: PendingEntry,
  { crc32, compress, level }: ResolveOptions
): ResolvedEntry {
  const { data, compress: wantsCompression, ...rest } = entry;
  const resolved = {
    ...rest,
    uncompressedData: data,
    crc32: crc32(data),
  };

  if (wantsCompression && data.length > 0) {
    const deflated = compress(data, level);
    if (deflated.length < data.length) {
      return {
        ...resolved,
        compressedData: deflated,
        method: CompressionMethod.Deflate,
      };
    }
  }

  return {
    ...resolved,
    compressedData: data,
    method: CompressionMethod.Stored,
  };
}
