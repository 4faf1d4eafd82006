/**
 * Thrown when a size, offset or count would overflow its ZIP field. ZIP64 is
 * not supported, so archives and entries must stay under 4 GiB and archives
 * under 65536 entries.
 */
export class ArchiveTooLargeError extends RangeError {
  readonly code = "ERR_ARCHIVE_TOO_LARGE";

  constructor(
    /** Name of the field that overflowed */
    readonly field: string,
    /** Value that could not be encoded */
    readonly value: number,
    /** Largest value the field can hold */
    readonly limit: number
  ) {
    super(
      `${field} exceeds the maximum of ${limit} without ZIP64 (got ${value})`
    );
    this.name = "ArchiveTooLargeError";
  }
}
