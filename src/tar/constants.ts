/**
 * TAR Format Constants
 *
 * Field layout of the 512-byte header block per POSIX USTAR, plus the GNU
 * sparse map fields and the type flags this reader understands.
 */

export const HEADER_SIZE = 512;
export const BLOCK_SIZE = 512;

// [offset, size] of each header field
export const NAME_OFFSET = 0;
export const NAME_SIZE = 100;
export const MODE_OFFSET = 100;
export const MODE_SIZE = 8;
export const UID_OFFSET = 108;
export const UID_SIZE = 8;
export const GID_OFFSET = 116;
export const GID_SIZE = 8;
export const SIZE_OFFSET = 124;
export const SIZE_SIZE = 12;
export const MTIME_OFFSET = 136;
export const MTIME_SIZE = 12;
export const CHECKSUM_OFFSET = 148;
export const CHECKSUM_SIZE = 8;
export const TYPEFLAG_OFFSET = 156;
export const LINKNAME_OFFSET = 157;
export const LINKNAME_SIZE = 100;
export const MAGIC_OFFSET = 257;
export const VERSION_OFFSET = 263;
export const UNAME_OFFSET = 265;
export const UNAME_SIZE = 32;
export const GNAME_OFFSET = 297;
export const GNAME_SIZE = 32;
export const DEVMAJOR_OFFSET = 329;
export const DEVMAJOR_SIZE = 8;
export const DEVMINOR_OFFSET = 337;
export const DEVMINOR_SIZE = 8;
export const PREFIX_OFFSET = 345;
export const PREFIX_SIZE = 155;

// Old GNU sparse map: up to 4 (offset, numbytes) pairs in the header,
// 21 more per extended block
export const SPARSE_OFFSET = 386;
export const SPARSE_ENTRY_SIZE = 24;
export const SPARSE_ENTRY_OFFSET_SIZE = 12;
export const SPARSE_ENTRY_NUMBYTES_SIZE = 12;
export const SPARSE_ENTRIES_IN_HEADER = 4;
export const SPARSE_ISEXTENDED_OFFSET = 482;
export const SPARSE_REALSIZE_OFFSET = 483;
export const SPARSE_REALSIZE_SIZE = 12;
export const SPARSE_EXTENDED_ENTRIES = 21;
export const SPARSE_EXTENDED_ISEXTENDED_OFFSET = 504;

export const USTAR_MAGIC = Buffer.from('ustar\0', 'latin1');
export const GNU_MAGIC = Buffer.from('ustar ', 'latin1');
export const GNU_VERSION = Buffer.from(' \0', 'latin1');

export type TarEntryType =
  | 'file'
  | 'old-file'
  | 'link'
  | 'symlink'
  | 'character-device'
  | 'block-device'
  | 'directory'
  | 'fifo'
  | 'contiguous-file'
  | 'gnu-long-path'
  | 'gnu-long-link-path'
  | 'gnu-sparse'
  | 'gnu-dumpdir'
  | 'gnu-multivol'
  | 'gnu-volume-header'
  | 'pax-header'
  | 'pax-global-header';

// Raw typeflag byte -> entry type. NUL is the pre-POSIX regular file, kept
// apart from '0' because only NUL entries named with a trailing '/' are directories.
export const TYPE_FLAGS: ReadonlyMap<number, TarEntryType> = new Map<number, TarEntryType>([
  [0, 'old-file'],
  [0x30, 'file'], // '0'
  [0x31, 'link'], // '1'
  [0x32, 'symlink'], // '2'
  [0x33, 'character-device'], // '3'
  [0x34, 'block-device'], // '4'
  [0x35, 'directory'], // '5'
  [0x36, 'fifo'], // '6'
  [0x37, 'contiguous-file'], // '7'
  [0x4c, 'gnu-long-path'], // 'L'
  [0x4b, 'gnu-long-link-path'], // 'K'
  [0x53, 'gnu-sparse'], // 'S'
  [0x44, 'gnu-dumpdir'], // 'D'
  [0x4d, 'gnu-multivol'], // 'M'
  [0x56, 'gnu-volume-header'], // 'V'
  [0x78, 'pax-header'], // 'x'
  [0x67, 'pax-global-header'], // 'g'
]);
