const POLYNOMIAL = 0xedb88320;

const lookup = new Uint32Array(0x100);

for (let i = 0; i <= 0xff; i++) {
  let crc = i;

  for (let j = 0; j < 8; j++) {
    crc = (crc >>> 1) ^ ((crc & 1) * POLYNOMIAL);
  }

  lookup[i] = crc;
}

/**
 * Computes the CRC-32 (IEEE 802.3, as used by ZIP, gzip and PNG) of data. If
 * value is specified, it is used as the starting value of the checksum, so
 * that data can be checksummed in chunks; otherwise, 0 is used.
 *
 * @param data - The input data to compute the checksum for.
 * @param value - An optional previous checksum to continue from. It must be a 32-bit unsigned integer. Default: 0
 * @returns The computed CRC-32 checksum, as an unsigned 32-bit integer.
 */
export function crc32(data: Uint8Array, value: number = 0): number {
  let crc = ~value;

  for (let i = 0; i < data.byteLength; i++) {
    crc = (crc >>> 8) ^ lookup[(crc ^ data[i]) & 0xff];
  }

  return ~crc >>> 0;
}
