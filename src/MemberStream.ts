import { Readable } from 'stream';

import { createTarError, TarErrorCode } from './tar/errors.ts';
import { SparseCursor } from './tar/sparse.ts';
import type TarWalker from './tar/TarWalker.ts';
import type { MemberEntry } from './tar/TarWalker.ts';

/**
 * Byte stream over one regular-file member of an open archive.
 *
 * The stream borrows the archive: it keeps a reference to the walker, not
 * ownership of the handle, and reads member data only while that member is
 * the walker's current entry. When the reader advances, detach() is called;
 * a stream that has not read all of its data by then is destroyed.
 */
export default class MemberStream extends Readable {
  readonly memberName: string;
  readonly sourcePath: string;
  private walker: TarWalker | null;
  private memberId: number;
  private dataRemaining: number;
  private sparse: SparseCursor | null;

  constructor(walker: TarWalker, entry: MemberEntry) {
    super();
    this.walker = walker;
    this.memberId = entry.id;
    this.memberName = entry.header.name;
    this.sourcePath = walker.handle.sourcePath;
    this.dataRemaining = entry.dataSize;
    this.sparse = entry.sparse ? new SparseCursor(entry.sparse) : null;
  }

  _read(size: number): void {
    if (this.sparse) {
      const segment = this.sparse.peek(size);
      if (!segment) {
        this.push(null);
      } else if (segment.kind === 'hole') {
        this.sparse.consume(segment.length);
        this.push(Buffer.alloc(segment.length));
      } else {
        this.pull(segment.length);
      }
      return;
    }

    if (this.dataRemaining === 0) {
      this.push(null);
      return;
    }
    this.pull(size);
  }

  _destroy(err: Error | null, callback: (error?: Error | null) => void): void {
    this.walker = null;
    callback(err);
  }

  /**
   * Called when the reader moves past this member
   */
  detach(): void {
    this.walker = null;
    if (this.dataRemaining > 0 && !this.destroyed) this.destroy();
  }

  private pull(size: number): void {
    const walker = this.walker;
    if (!walker) {
      this.destroy(this.detached());
      return;
    }

    walker.readData(this.memberId, Math.min(size, this.dataRemaining), (err, chunk) => {
      if (this.destroyed) return;
      if (err) {
        this.destroy(err);
        return;
      }
      if (!chunk) {
        this.destroy(this.detached());
        return;
      }

      this.dataRemaining -= chunk.length;
      if (this.sparse) this.sparse.consume(chunk.length);
      this.push(chunk);
    });
  }

  private detached(): Error {
    return createTarError(`${this.memberName} of tar archive ${this.sourcePath} is no longer readable`, TarErrorCode.STREAM_DETACHED, { sourcePath: this.sourcePath, memberName: this.memberName });
  }
}
