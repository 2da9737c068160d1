/**
 * TAR Header Parsing
 */

import {
  CHECKSUM_OFFSET,
  CHECKSUM_SIZE,
  DEVMAJOR_OFFSET,
  DEVMAJOR_SIZE,
  DEVMINOR_OFFSET,
  DEVMINOR_SIZE,
  GID_OFFSET,
  GID_SIZE,
  GNAME_OFFSET,
  GNAME_SIZE,
  GNU_MAGIC,
  GNU_VERSION,
  HEADER_SIZE,
  LINKNAME_OFFSET,
  LINKNAME_SIZE,
  MAGIC_OFFSET,
  MODE_OFFSET,
  MODE_SIZE,
  MTIME_OFFSET,
  MTIME_SIZE,
  NAME_OFFSET,
  NAME_SIZE,
  PREFIX_OFFSET,
  PREFIX_SIZE,
  SIZE_OFFSET,
  SIZE_SIZE,
  TYPE_FLAGS,
  type TarEntryType,
  TYPEFLAG_OFFSET,
  UID_OFFSET,
  UID_SIZE,
  UNAME_OFFSET,
  UNAME_SIZE,
  USTAR_MAGIC,
  VERSION_OFFSET,
} from './constants.ts';
import { createTarError, TarErrorCode } from './errors.ts';

export interface TarHeader {
  name: string;
  mode: number;
  uid: number;
  gid: number;
  size: number;
  mtime: Date;
  /** null for typeflags this reader does not know */
  type: TarEntryType | null;
  linkname: string | null;
  uname: string;
  gname: string;
  devmajor: number;
  devminor: number;
  pax: Record<string, string> | null;
}

export interface ParseOptions {
  filenameEncoding?: BufferEncoding;
  allowUnknownFormat?: boolean;
}

export function toType(flag: number): TarEntryType | null {
  return TYPE_FLAGS.get(flag) ?? null;
}

function decodeStr(buf: Buffer, offset: number, length: number, encoding: BufferEncoding = 'utf8'): string {
  const field = buf.subarray(offset, offset + length);
  const nul = field.indexOf(0);
  return (nul === -1 ? field : field.subarray(0, nul)).toString(encoding);
}

/**
 * Base-256 numbers (GNU extension for values that do not fit in octal).
 * Bit 7 of the first byte marks the encoding, bit 6 is the sign.
 */
function parse256(field: Buffer): number {
  const negative = (field[0] & 0x40) !== 0;
  let value = 0;
  for (let i = 1; i < field.length; i++) {
    value = value * 256 + (negative ? 0xff - field[i] : field[i]);
  }
  return negative ? -value : value;
}

/**
 * Decode an octal field, tolerating leading spaces and space/NUL terminators
 */
export function decodeOct(buf: Buffer, offset: number, length: number): number {
  const field = buf.subarray(offset, offset + length);
  if (field[0] & 0x80) return parse256(field);
  const digits = /^ *([0-7]*)/.exec(field.toString('latin1'))?.[1];
  return digits ? parseInt(digits, 8) : 0;
}

/**
 * Header checksums with the checksum field counted as spaces. Some old tar
 * implementations summed signed bytes, so both sums are returned.
 */
export function checksums(buf: Buffer): [unsigned: number, signed: number] {
  let unsigned = 8 * 0x20;
  let signed = 8 * 0x20;
  for (let i = 0; i < HEADER_SIZE; i++) {
    if (i >= CHECKSUM_OFFSET && i < CHECKSUM_OFFSET + CHECKSUM_SIZE) continue;
    unsigned += buf[i];
    signed += buf[i] > 127 ? buf[i] - 256 : buf[i];
  }
  return [unsigned, signed];
}

export function checksum(buf: Buffer): number {
  return checksums(buf)[0];
}

export function isZeroBlock(buf: Buffer): boolean {
  for (let i = 0; i < HEADER_SIZE; i++) {
    if (buf[i] !== 0) return false;
  }
  return true;
}

export function isUstar(buf: Buffer): boolean {
  return buf.subarray(MAGIC_OFFSET, MAGIC_OFFSET + USTAR_MAGIC.length).equals(USTAR_MAGIC);
}

export function isGnu(buf: Buffer): boolean {
  return buf.subarray(MAGIC_OFFSET, MAGIC_OFFSET + GNU_MAGIC.length).equals(GNU_MAGIC) && buf.subarray(VERSION_OFFSET, VERSION_OFFSET + GNU_VERSION.length).equals(GNU_VERSION);
}

/**
 * Parse a 512-byte TAR header
 *
 * @returns Parsed header, or null for an all-zero block (end of archive)
 */
export function parseHeader(buf: Buffer, options: ParseOptions = {}): TarHeader | null {
  if (isZeroBlock(buf)) return null;

  const stored = decodeOct(buf, CHECKSUM_OFFSET, CHECKSUM_SIZE);
  if (checksums(buf).indexOf(stored) === -1) {
    throw createTarError('Invalid tar header. Maybe the tar is corrupted or it needs to be gunzipped?', TarErrorCode.INVALID_CHECKSUM);
  }

  const encoding = options.filenameEncoding || 'utf8';
  let name = decodeStr(buf, NAME_OFFSET, NAME_SIZE, encoding);
  if (isUstar(buf)) {
    if (buf[PREFIX_OFFSET] !== 0) name = `${decodeStr(buf, PREFIX_OFFSET, PREFIX_SIZE, encoding)}/${name}`;
  } else if (!isGnu(buf) && !options.allowUnknownFormat) {
    throw createTarError('Invalid tar header: unknown format.', TarErrorCode.INVALID_FORMAT);
  }

  // A trailing '/' on a regular file is resolved to a directory only after
  // GNU/PAX extensions have supplied the final name (see applyExtensions)
  return {
    name,
    mode: decodeOct(buf, MODE_OFFSET, MODE_SIZE),
    uid: decodeOct(buf, UID_OFFSET, UID_SIZE),
    gid: decodeOct(buf, GID_OFFSET, GID_SIZE),
    size: decodeOct(buf, SIZE_OFFSET, SIZE_SIZE),
    mtime: new Date(1000 * decodeOct(buf, MTIME_OFFSET, MTIME_SIZE)),
    type: toType(buf[TYPEFLAG_OFFSET]),
    linkname: buf[LINKNAME_OFFSET] === 0 ? null : decodeStr(buf, LINKNAME_OFFSET, LINKNAME_SIZE, encoding),
    uname: decodeStr(buf, UNAME_OFFSET, UNAME_SIZE),
    gname: decodeStr(buf, GNAME_OFFSET, GNAME_SIZE),
    devmajor: decodeOct(buf, DEVMAJOR_OFFSET, DEVMAJOR_SIZE),
    devminor: decodeOct(buf, DEVMINOR_OFFSET, DEVMINOR_SIZE),
    pax: null,
  };
}

/**
 * Decode PAX extended attributes
 * Format: "length key=value\n" repeated, length counting the whole record
 */
export function decodePax(buf: Buffer): Record<string, string> {
  const result: Record<string, string> = {};
  let pos = 0;

  while (pos < buf.length) {
    const space = buf.indexOf(0x20, pos);
    if (space === -1) break;
    const length = parseInt(buf.subarray(pos, space).toString('latin1'), 10);
    if (!(length > 0)) break;

    const record = buf.subarray(space + 1, pos + length - 1).toString('utf8');
    const eq = record.indexOf('=');
    if (eq === -1) break;
    result[record.slice(0, eq)] = record.slice(eq + 1);
    pos += length;
  }

  return result;
}

/**
 * Decode GNU long path/linkname (NUL-terminated)
 */
export function decodeLongPath(buf: Buffer, encoding?: BufferEncoding): string {
  return decodeStr(buf, 0, buf.length, encoding);
}

/**
 * Number of padding bytes to reach 512-byte block alignment
 */
export function overflow(size: number): number {
  const remainder = size % 512;
  return remainder ? 512 - remainder : 0;
}
