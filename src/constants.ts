// ZIP format constants (stored in file byte order)
export const LOCAL_FILE_HEADER_SIGNATURE = 0x504b0304; // "PK\x03\x04"
export const CENTRAL_DIRECTORY_SIGNATURE = 0x504b0102; // "PK\x01\x02"
export const END_OF_CENTRAL_DIR_SIGNATURE = 0x504b0506; // "PK\x05\x06"

// Version constants
export const VERSION_MADE_BY = 0x031e; // Unix, version 3.0
export const VERSION_NEEDED_STORE = 10; // Version 1.0
export const VERSION_NEEDED_DEFLATE = 20; // Version 2.0

// Flags: no data descriptor, no encryption, no UTF-8 bit
export const GENERAL_PURPOSE_FLAGS = 0;

// Unix regular file (S_IFREG) with 0644 permissions, in the upper 16 bits
export const EXTERNAL_FILE_ATTRIBUTES = 0x81a40000;

// MS-DOS epoch: 1980-01-01 00:00:00
export const DOS_EPOCH_TIME = 0x0000;
export const DOS_EPOCH_DATE = 0x0021;

// Size constants
export const LOCAL_FILE_HEADER_SIZE = 30;
export const CENTRAL_DIRECTORY_HEADER_SIZE = 46;
export const EOCD_SIZE = 22;

// Limits
export const MAX_2_BYTE = 0xffff;
export const MAX_4_BYTE = 0xffffffff;

/** Little-endian for DataView methods */
export const LITTLE_ENDIAN = true;
/** Big-endian for DataView methods */
export const BIG_ENDIAN = false;
