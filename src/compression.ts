import { deflateSync, type DeflateOptions } from "fflate";

/**
 * Compression methods permitted by ISO/IEC 21320-1. Values are the ZIP
 * "compression method" field.
 */
export const CompressionMethod = {
  /** Data is stored as-is */
  Stored: 0,
  /** Raw DEFLATE stream (RFC 1951) */
  Deflate: 8,
} as const;

export type CompressionMethod =
  (typeof CompressionMethod)[keyof typeof CompressionMethod];

/** Speed/size tradeoff requested from the compressor */
export type CompressionLevel = "fastest" | "balanced" | "best";

/**
 * Synchronous raw DEFLATE compressor (no zlib or gzip wrapper).
 */
export type Compressor = (
  data: Uint8Array,
  level: CompressionLevel
) => Uint8Array;

const DEFLATE_LEVELS = {
  fastest: 1,
  balanced: 6,
  best: 9,
} satisfies Record<CompressionLevel, NonNullable<DeflateOptions["level"]>>;

/**
 * Default compressor, backed by fflate.
 */
export const deflateRaw: Compressor = (data, level) =>
  deflateSync(data, { level: DEFLATE_LEVELS[level] });
