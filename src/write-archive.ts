import type { ResolvedEntry } from "./types.js";
import { getLocalFileHeader } from "./write-entry.js";
import { getCDFH, getEOCD } from "./write-central-directory.js";

/**
 * Serialize entries into the chunks of a ZIP archive, in order: each local
 * file header followed by its data, then the central directory, then the end
 * of central directory record. Offsets are tracked as chunks are emitted, so
 * entries can be resolved lazily by the iterable.
 */
export function* writeArchive(
  entries: Iterable<ResolvedEntry>
): Generator<Uint8Array, void> {
  const written: { entry: ResolvedEntry; startOffset: number }[] = [];
  let offset = 0;

  // -- Local file headers and data --
  for (const entry of entries) {
    const header = getLocalFileHeader(entry);
    written.push({ entry, startOffset: offset });
    yield header;
    offset += header.length;
    if (entry.compressedData.length > 0) {
      yield entry.compressedData;
      offset += entry.compressedData.length;
    }
  }

  // -- Central directory --
  const centralDirectoryOffset = offset;
  for (const { entry, startOffset } of written) {
    const cdfh = getCDFH(entry, startOffset);
    yield cdfh;
    offset += cdfh.length;
  }

  // -- End of central directory --
  yield getEOCD({
    entriesCount: written.length,
    centralDirectoryOffset,
    centralDirectorySize: offset - centralDirectoryOffset,
  });
}
