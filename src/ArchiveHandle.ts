import type { Readable } from 'stream';

import BufferList from './tar/BufferList.ts';
import { createTarError, TarErrorCode } from './tar/errors.ts';

export type ChunkCallback = (error: Error | null, chunk: Buffer | null) => void;
export type DoneCallback = (error: Error | null) => void;

/**
 * An open archive: the byte source of one tar container, read on demand.
 *
 * `output` is the stream the tar bytes come out of (the file stream, or a
 * decompressor fed by it). `upstream` lists the streams feeding `output`;
 * errors on any of them fail the handle and close() destroys all of them.
 *
 * Only one read may be outstanding at a time; TarWalker serializes access.
 */
export default class ArchiveHandle {
  readonly sourcePath: string;
  private output: Readable;
  private streams: Readable[];
  private buffered = new BufferList();
  private ended = false;
  private closed = false;
  private error: Error | null = null;
  private waiting: (() => void) | null = null;

  constructor(sourcePath: string, output: Readable, upstream: Readable[] = []) {
    this.sourcePath = sourcePath;
    this.output = output;
    this.streams = upstream.concat(output);

    // Listen for errors on every stream (errors don't propagate through pipe)
    const onError = (err: Error): void => {
      if (!this.error) this.error = err;
      this.wake();
    };
    for (const stream of this.streams) stream.on('error', onError);
    output.on('readable', () => this.wake());
    output.on('end', () => {
      this.ended = true;
      this.wake();
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Read exactly `size` bytes. Calls back with null when the input ends
   * cleanly before the first byte, and fails with TAR_TRUNCATED when it ends
   * part way through.
   */
  readBlock(size: number, callback: ChunkCallback): void {
    if (size === 0) return callback(null, Buffer.alloc(0));
    this.fill(size, (err) => {
      if (err) return callback(err, null);
      if (this.buffered.length === 0) return callback(null, null);
      if (!this.buffered.has(size)) return callback(this.truncated(), null);
      callback(null, this.buffered.consume(size));
    });
  }

  /**
   * Read up to `max` bytes; null at the end of input
   */
  read(max: number, callback: ChunkCallback): void {
    this.fill(1, (err) => {
      if (err) return callback(err, null);
      if (this.buffered.length === 0) return callback(null, null);
      callback(null, this.buffered.take(max));
    });
  }

  /**
   * Discard exactly `size` bytes
   */
  skip(size: number, callback: DoneCallback): void {
    if (size <= 0) return callback(null);
    this.fill(1, (err) => {
      if (err) return callback(err);
      if (this.buffered.length === 0) return callback(this.truncated());
      const dropped = this.buffered.drop(size);
      this.skip(size - dropped, callback);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffered.clear();
    // source first so no more data flows into the rest of the chain
    for (const stream of this.streams) stream.destroy();
    this.wake();
  }

  private fill(want: number, callback: DoneCallback): void {
    while (!this.buffered.has(want)) {
      if (this.error) return callback(this.error);
      if (this.closed) return callback(createTarError(`Tar archive ${this.sourcePath} is closed`, TarErrorCode.CLOSED, { sourcePath: this.sourcePath }));

      const chunk: Buffer | null = this.output.read();
      if (chunk !== null) {
        this.buffered.append(chunk);
        continue;
      }
      if (this.ended) break;

      this.waiting = () => this.fill(want, callback);
      return;
    }
    callback(null);
  }

  private wake(): void {
    const waiting = this.waiting;
    this.waiting = null;
    if (waiting) waiting();
  }

  private truncated(): Error {
    return createTarError(`Unexpected end of data in tar archive ${this.sourcePath}`, TarErrorCode.TRUNCATED, { sourcePath: this.sourcePath });
  }
}
