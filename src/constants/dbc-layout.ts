/**
 * Byte layout of a DBC file. All integers are little-endian.
 *
 *   [0..3]    magic              4 raw bytes ('WDBC')
 *   [4..7]    record_count       u32
 *   [8..11]   field_count        u32
 *   [12..15]  record_size        u32
 *   [16..19]  string_block_size  u32
 *   [20..]    record_count × field_count × 4 bytes, then the string block
 */

export const DBC_MAGIC = 'WDBC';

export const HEADER_SIZE = 20;

export const OFFSET_MAGIC = 0x00;
export const OFFSET_RECORD_COUNT = 0x04;
export const OFFSET_FIELD_COUNT = 0x08;
export const OFFSET_RECORD_SIZE = 0x0c;
export const OFFSET_STRING_BLOCK_SIZE = 0x10;

export const MAGIC_LENGTH = 4;

/** Every slot is four bytes whatever its logical type. */
export const SLOT_SIZE = 4;

export const UINT32_MAX = 0xffffffff;
export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
