/**
 * GNU Sparse File Support
 *
 * Old GNU sparse entries (type 'S') store only the non-hole regions of a
 * file. The sparse map lives in the header (up to 4 entries) and in extended
 * 512-byte blocks that follow it (21 entries each). The member data is the
 * concatenation of those regions; the holes between them read as zeros.
 */

import { SPARSE_ENTRIES_IN_HEADER, SPARSE_ENTRY_NUMBYTES_SIZE, SPARSE_ENTRY_OFFSET_SIZE, SPARSE_ENTRY_SIZE, SPARSE_EXTENDED_ENTRIES, SPARSE_EXTENDED_ISEXTENDED_OFFSET, SPARSE_ISEXTENDED_OFFSET, SPARSE_OFFSET, SPARSE_REALSIZE_OFFSET, SPARSE_REALSIZE_SIZE } from './constants.ts';
import { decodeOct } from './headers.ts';

/**
 * A region of actual data in a sparse file
 */
export interface SparseEntry {
  /** Offset in the reconstructed file */
  offset: number;
  numbytes: number;
}

export interface SparseInfo {
  /** Size of the reconstructed file */
  realSize: number;
  entries: SparseEntry[];
  /** More entries follow in an extended block */
  isExtended: boolean;
}

// stops at the first all-zero pair
function parseSparseEntries(buf: Buffer, startOffset: number, maxEntries: number): SparseEntry[] {
  const entries: SparseEntry[] = [];
  for (let i = 0; i < maxEntries; i++) {
    const at = startOffset + i * SPARSE_ENTRY_SIZE;
    const offset = decodeOct(buf, at, SPARSE_ENTRY_OFFSET_SIZE);
    const numbytes = decodeOct(buf, at + SPARSE_ENTRY_OFFSET_SIZE, SPARSE_ENTRY_NUMBYTES_SIZE);
    if (offset === 0 && numbytes === 0) break;
    entries.push({ offset, numbytes });
  }
  return entries;
}

export function parseGnuSparseHeader(headerBuf: Buffer): SparseInfo {
  return {
    realSize: decodeOct(headerBuf, SPARSE_REALSIZE_OFFSET, SPARSE_REALSIZE_SIZE),
    entries: parseSparseEntries(headerBuf, SPARSE_OFFSET, SPARSE_ENTRIES_IN_HEADER),
    isExtended: headerBuf[SPARSE_ISEXTENDED_OFFSET] !== 0,
  };
}

export function parseGnuSparseExtended(extBuf: Buffer): { entries: SparseEntry[]; isExtended: boolean } {
  return {
    entries: parseSparseEntries(extBuf, 0, SPARSE_EXTENDED_ENTRIES),
    isExtended: extBuf[SPARSE_EXTENDED_ISEXTENDED_OFFSET] !== 0,
  };
}

/**
 * Bytes stored in the archive for a sparse map (sum of all numbytes)
 */
export function sparseDataSize(entries: SparseEntry[]): number {
  let total = 0;
  for (const entry of entries) total += entry.numbytes;
  return total;
}

/**
 * Check that a sparse map can be replayed against the stored data
 *
 * @returns the reason the map is unusable, or null
 */
export function validateSparseMap(info: SparseInfo, storedSize: number): string | null {
  if (!Number.isSafeInteger(info.realSize) || info.realSize < 0) return `invalid sparse real size ${info.realSize}`;
  if (sparseDataSize(info.entries) !== storedSize) return `sparse map covers ${sparseDataSize(info.entries)} bytes but ${storedSize} are stored`;
  let end = 0;
  for (const entry of info.entries) {
    if (entry.offset < end) return `sparse region at ${entry.offset} overlaps the previous region`;
    end = entry.offset + entry.numbytes;
    if (end > info.realSize) return `sparse region at ${entry.offset} extends past the real size ${info.realSize}`;
  }
  return null;
}

export interface SparseSegment {
  kind: 'hole' | 'data';
  length: number;
}

/**
 * Position within a reconstructed sparse file. peek() describes what comes
 * next without moving; consume() moves past bytes that were delivered.
 */
export class SparseCursor {
  private entries: SparseEntry[];
  private realSize: number;
  private index = 0;
  private position = 0;

  constructor(info: SparseInfo) {
    this.entries = info.entries;
    this.realSize = info.realSize;
  }

  peek(max: number): SparseSegment | null {
    if (this.position >= this.realSize) return null;

    let entry: SparseEntry | undefined = this.entries[this.index];
    while (entry && entry.offset + entry.numbytes <= this.position) entry = this.entries[++this.index];

    if (!entry || this.position < entry.offset) {
      const holeEnd = entry ? entry.offset : this.realSize;
      return { kind: 'hole', length: Math.min(max, holeEnd - this.position) };
    }
    return { kind: 'data', length: Math.min(max, entry.offset + entry.numbytes - this.position) };
  }

  consume(length: number): void {
    this.position += length;
  }
}
