import type { PathSource } from '../types.ts';
import toError from './toError.ts';

export type PullCallback = (error: Error | null, result?: IteratorResult<unknown>) => void;

function isAsyncIterable(source: PathSource): source is AsyncIterable<unknown> {
  return typeof source === 'object' && Symbol.asyncIterator in source;
}

/**
 * Pulls path identifiers from a sync or async iterable, one per call.
 * The iterator is created on the first pull.
 */
export default class Upstream {
  private source: PathSource;
  private iterator: Iterator<unknown> | null = null;
  private asyncIterator: AsyncIterator<unknown> | null = null;
  private closed = false;

  constructor(source: PathSource) {
    this.source = source;
  }

  pull(callback: PullCallback): void {
    if (this.closed) return callback(null, { done: true, value: undefined });

    let pending: Promise<IteratorResult<unknown>> | null = null;
    let result: IteratorResult<unknown> | null = null;
    try {
      this.start();
      if (this.asyncIterator) pending = this.asyncIterator.next();
      else if (this.iterator) result = this.iterator.next();
    } catch (err) {
      return callback(toError(err));
    }

    if (pending) {
      pending.then(
        (value) => callback(null, value),
        (err: unknown) => callback(toError(err))
      );
      return;
    }
    callback(null, result || { done: true, value: undefined });
  }

  /**
   * Stop early, letting the source release what it holds
   *
   * @param onError - receives a failure of the source's return()
   */
  close(onError: (err: Error) => void): void {
    if (this.closed) return;
    this.closed = true;
    const iterator = this.iterator;
    const asyncIterator = this.asyncIterator;
    this.iterator = null;
    this.asyncIterator = null;

    try {
      if (iterator && iterator.return) iterator.return();
      if (asyncIterator && asyncIterator.return) asyncIterator.return().then(undefined, (err: unknown) => onError(toError(err)));
    } catch (err) {
      onError(toError(err));
    }
  }

  private start(): void {
    if (this.iterator || this.asyncIterator) return;
    if (isAsyncIterable(this.source)) this.asyncIterator = this.source[Symbol.asyncIterator]();
    else this.iterator = this.source[Symbol.iterator]();
  }
}
