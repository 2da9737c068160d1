/**
 * TarWalker - pull-based TAR parsing over an ArchiveHandle
 *
 * Each call to next() moves past whatever is left of the current entry's
 * data and padding, then reads headers until it reaches an entry a consumer
 * can see:
 * ```
 *  HEADER ─┬─ [zero block / clean end of input] ──> END
 *          ├─ [gnu-long-path / gnu-long-link / pax] ──> collect body ──> HEADER
 *          ├─ [gnu-sparse] ──> extended sparse blocks ──> ENTRY
 *          └─ [anything else] ──> ENTRY
 * ```
 * Member data is read through readData() while the entry is current.
 * Operations run one at a time, in call order, so a pending data read always
 * completes before the walker skips ahead.
 *
 * The first failure is sticky: every later operation reports it.
 */

import once from 'call-once-fn';

import type ArchiveHandle from '../ArchiveHandle.ts';
import type { ChunkCallback } from '../ArchiveHandle.ts';
import toError from '../lib/toError.ts';
import { BLOCK_SIZE, HEADER_SIZE } from './constants.ts';
import { createTarError, TarErrorCode } from './errors.ts';
import { applyExtensions, collectExtension, createExtensionState, type ExtensionState, isExtensionType } from './Extensions.ts';
import { overflow, type ParseOptions, parseHeader, type TarHeader } from './headers.ts';
import { parseGnuSparseExtended, parseGnuSparseHeader, type SparseInfo, validateSparseMap } from './sparse.ts';

export interface MemberEntry {
  /** Position of the entry in the archive, starting at 1 */
  id: number;
  header: TarHeader;
  /** Bytes stored in the archive for this entry */
  dataSize: number;
  sparse: SparseInfo | null;
  /** Why the entry's data cannot be read, or null */
  defect: string | null;
}

export type EntryCallback = (error: Error | null, entry: MemberEntry | null) => void;

type Operation = (release: () => void) => void;

function isValidSize(size: number): boolean {
  return Number.isSafeInteger(size) && size >= 0;
}

export default class TarWalker {
  readonly handle: ArchiveHandle;
  private options: ParseOptions;
  private extensions: ExtensionState = createExtensionState();

  private memberId = 0;
  private memberName = '';
  private dataRemaining = 0;
  private paddingRemaining = 0;
  /** the current entry's data region has no usable size */
  private lost = false;
  private finished = false;
  private error: Error | null = null;

  private operations: Operation[] = [];
  private busy = false;

  constructor(handle: ArchiveHandle, options: ParseOptions = {}) {
    this.handle = handle;
    this.options = options;
  }

  /**
   * Move to the next entry; null once the archive is exhausted
   */
  next(callback: EntryCallback): void {
    this.schedule((release) => {
      const done = (err: Error | null, entry: MemberEntry | null): void => {
        if (err && !this.error) this.error = err;
        callback(err, entry);
        release();
      };

      if (this.error) return done(this.error, null);
      if (this.finished) return done(null, null);
      if (this.lost) {
        const sourcePath = this.handle.sourcePath;
        return done(createTarError(`Cannot locate the entry after ${this.memberName} in tar archive ${sourcePath}`, TarErrorCode.INVALID_SIZE, { sourcePath, memberName: this.memberName }), null);
      }

      this.handle.skip(this.dataRemaining + this.paddingRemaining, (err) => {
        if (err) return done(err, null);
        this.dataRemaining = 0;
        this.paddingRemaining = 0;
        this.readEntry(done);
      });
    });
  }

  /**
   * Read up to `max` bytes of member `memberId`. Calls back with null when
   * that member's data is exhausted or it is no longer the current entry.
   */
  readData(memberId: number, max: number, callback: ChunkCallback): void {
    this.schedule((release) => {
      const done = (err: Error | null, chunk: Buffer | null): void => {
        if (err && !this.error) this.error = err;
        callback(err, chunk);
        release();
      };

      if (this.error) return done(this.error, null);
      if (memberId !== this.memberId || this.dataRemaining === 0) return done(null, null);

      this.handle.read(Math.min(max, this.dataRemaining), (err, chunk) => {
        if (err) return done(err, null);
        if (!chunk) {
          const sourcePath = this.handle.sourcePath;
          return done(createTarError(`Unexpected end of data in ${this.memberName} of tar archive ${sourcePath}`, TarErrorCode.TRUNCATED, { sourcePath, memberName: this.memberName }), null);
        }
        this.dataRemaining -= chunk.length;
        done(null, chunk);
      });
    });
  }

  private readEntry(done: EntryCallback): void {
    this.handle.readBlock(HEADER_SIZE, (err, block) => {
      if (err) return done(err, null);
      if (!block) {
        this.finished = true;
        return done(null, null);
      }

      let header: TarHeader | null;
      try {
        header = parseHeader(block, this.options);
      } catch (err) {
        return done(toError(err), null);
      }
      if (!header) {
        this.finished = true;
        return done(null, null);
      }

      if (isExtensionType(header.type)) return this.readExtension(header, done);
      if (header.type === 'gnu-sparse') return this.readSparse(header, parseGnuSparseHeader(block), done);

      applyExtensions(header, this.extensions);
      this.begin(header, header.size, null, null, done);
    });
  }

  private readExtension(header: TarHeader, done: EntryCallback): void {
    const size = header.size;
    if (!isValidSize(size)) return done(this.invalidSize(header), null);

    this.handle.readBlock(size, (err, body) => {
      if (err) return done(err, null);
      if (!body) return done(this.truncated(), null);
      this.handle.skip(overflow(size), (err) => {
        if (err) return done(err, null);
        collectExtension(this.extensions, header, body, this.options.filenameEncoding || 'utf8');
        this.readEntry(done);
      });
    });
  }

  private readSparse(header: TarHeader, info: SparseInfo, done: EntryCallback): void {
    if (info.isExtended) {
      this.handle.readBlock(BLOCK_SIZE, (err, block) => {
        if (err) return done(err, null);
        if (!block) return done(this.truncated(), null);
        const extended = parseGnuSparseExtended(block);
        info.entries.push(...extended.entries);
        info.isExtended = extended.isExtended;
        this.readSparse(header, info, done);
      });
      return;
    }

    applyExtensions(header, this.extensions);
    // the size field holds the stored bytes; consumers see the reconstructed size
    const stored = header.size;
    header.size = info.realSize;
    this.begin(header, stored, info, isValidSize(stored) ? validateSparseMap(info, stored) : null, done);
  }

  private begin(header: TarHeader, dataSize: number, sparse: SparseInfo | null, defect: string | null, done: EntryCallback): void {
    this.memberId++;
    this.memberName = header.name;

    if (!isValidSize(dataSize)) {
      this.lost = true;
      return done(null, { id: this.memberId, header, dataSize: 0, sparse, defect: `invalid size ${dataSize}` });
    }

    this.dataRemaining = dataSize;
    this.paddingRemaining = overflow(dataSize);
    done(null, { id: this.memberId, header, dataSize, sparse, defect });
  }

  private schedule(operation: Operation): void {
    this.operations.push(operation);
    this.drain();
  }

  private drain(): void {
    if (this.busy) return;
    const operation = this.operations.shift();
    if (!operation) return;

    this.busy = true;
    const release = once(() => {
      this.busy = false;
      this.drain();
    });
    operation(() => release());
  }

  private invalidSize(header: TarHeader): Error {
    const sourcePath = this.handle.sourcePath;
    return createTarError(`Invalid size ${header.size} for ${header.name} in tar archive ${sourcePath}`, TarErrorCode.INVALID_SIZE, { sourcePath, memberName: header.name });
  }

  private truncated(): Error {
    const sourcePath = this.handle.sourcePath;
    return createTarError(`Unexpected end of data in tar archive ${sourcePath}`, TarErrorCode.TRUNCATED, { sourcePath });
  }
}
