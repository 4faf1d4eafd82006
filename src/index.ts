import { crc32 as crc32Default } from "./crc32.js";
import {
  CompressionMethod,
  deflateRaw,
  type CompressionLevel,
  type Compressor,
} from "./compression.js";
import { DOS_EPOCH_DATE, DOS_EPOCH_TIME, MAX_2_BYTE } from "./constants.js";
import { ArchiveTooLargeError } from "./errors.js";
import { readableFromIterator } from "./readable-from-iterator.js";
import { resolveEntry, type ResolveOptions } from "./resolve-entry.js";
import type { ArchiveOptions, FileEntry, PendingEntry } from "./types.js";
import {
  assertFits,
  concatBytes,
  getDosDate,
  getDosTime,
  validateDate,
  validateEntryOptions,
} from "./utils.js";
import { writeArchive } from "./write-archive.js";

export { crc32 } from "./crc32.js";
export { CompressionMethod, deflateRaw, ArchiveTooLargeError };
export { getDosDate, getDosTime };
export type { ArchiveOptions, CompressionLevel, Compressor, FileEntry };

const textEncoder = new TextEncoder();

/**
 * Writer for ISO/IEC 21320-1 document containers (the ZIP subset used by
 * EPUB, ODF and OOXML): stored or deflated entries only, single volume, no
 * encryption, no ZIP64.
 *
 * Entries are written in the order they are added. Formats that require a
 * particular first entry (such as the EPUB `mimetype` file) must add it
 * first.
 *
 * @example
 * ```ts
 * const archive = new DocumentArchive();
 * archive.addText("mimetype", "application/epub+zip", false);
 * archive.addText("META-INF/container.xml", containerXml);
 * const bytes = archive.finalize();
 * ```
 */
export class DocumentArchive {
  #entries: PendingEntry[] = [];
  #options: ResolveOptions;
  #finalized = false;

  /**
   * @param options.crc32 Optional CRC-32 function to use.
   * @param options.compress Optional raw DEFLATE compressor. Defaults to fflate.
   * @param options.level Compression level requested from the compressor.
   */
  constructor({
    crc32 = crc32Default,
    compress = deflateRaw,
    level = "balanced",
  }: ArchiveOptions = {}) {
    this.#options = { crc32, compress, level };
  }

  /** Number of entries added so far */
  get size(): number {
    return this.#entries.length;
  }

  /**
   * Add a file to the archive. The data is copied, so the caller may reuse
   * or modify it afterwards.
   *
   * @param path Path within the archive, using forward slashes
   * @param data File contents
   * @param compress Deflate the entry if that makes it smaller (default true)
   */
  add(path: string, data: Uint8Array, compress: boolean = true): void {
    this.addFile({
      path,
      data,
      compression: compress
        ? CompressionMethod.Deflate
        : CompressionMethod.Stored,
    });
  }

  /**
   * Add a file with string content, encoded as UTF-8.
   */
  addText(path: string, content: string, compress: boolean = true): void {
    this.add(path, textEncoder.encode(content), compress);
  }

  /**
   * Add a file with explicit compression and modification time. Entries
   * without a time are stamped 1980-01-01 00:00:00.
   */
  addFile({
    path,
    data,
    compression = CompressionMethod.Deflate,
    modificationTime,
    modificationDate,
    date,
  }: FileEntry): void {
    if (this.#finalized) {
      throw new TypeError("Cannot add entry after finalize() has been called");
    }
    if (date) {
      validateDate(date);
    }
    const entry: PendingEntry = {
      path,
      // Encode now to catch range errors synchronously
      nameBytes: textEncoder.encode(path),
      data: data.slice(),
      compress: compression === CompressionMethod.Deflate,
      modificationTime:
        modificationTime ?? (date ? getDosTime(date) : DOS_EPOCH_TIME),
      modificationDate:
        modificationDate ?? (date ? getDosDate(date) : DOS_EPOCH_DATE),
    };
    validateEntryOptions(entry);
    this.#entries.push(entry);
  }

  /**
   * Compress and checksum every entry and return the complete ZIP archive.
   * The archive cannot be used after this has been called.
   */
  finalize(): Uint8Array {
    const entries = this.#consume();
    const resolved = entries.map((entry) => resolveEntry(entry, this.#options));
    return concatBytes([...writeArchive(resolved)]);
  }

  /**
   * Stream the ZIP archive. Entries are compressed as the stream reaches
   * them, so output starts before later entries have been processed. The
   * bytes are identical to those returned by finalize(), and the archive
   * cannot be used after this has been called.
   */
  readable(): ReadableStream<Uint8Array> {
    const entries = this.#consume();
    const options = this.#options;
    function* resolveLazily() {
      for (const entry of entries) {
        yield resolveEntry(entry, options);
      }
    }
    return readableFromIterator(writeArchive(resolveLazily()));
  }

  #consume(): PendingEntry[] {
    if (this.#finalized) {
      throw new TypeError("finalize() has already been called");
    }
    this.#finalized = true;
    assertFits("Number of entries", this.#entries.length, MAX_2_BYTE);
    const entries = this.#entries;
    this.#entries = [];
    return entries;
  }
}
