/**
 * BufferList - linked list of chunks read from an archive but not yet handed out
 */

interface BufferNode {
  data: Buffer;
  next: BufferNode | null;
}

export default class BufferList {
  private head: BufferNode | null = null;
  private tail: BufferNode | null = null;
  length = 0;

  append(buf: Buffer): void {
    if (buf.length === 0) return;
    const node: BufferNode = { data: buf, next: null };
    if (this.tail) this.tail.next = node;
    else this.head = node;
    this.tail = node;
    this.length += buf.length;
  }

  /**
   * Remove exactly n bytes from the front
   */
  consume(n: number): Buffer {
    if (n > this.length) throw new Error('Not enough data in buffer');

    // fast path: the front chunk already holds everything
    if (this.head && this.head.data.length >= n) return this.shift(n);

    const parts: Buffer[] = [];
    let remaining = n;
    while (remaining > 0) {
      const part = this.shift(remaining);
      parts.push(part);
      remaining -= part.length;
    }
    return Buffer.concat(parts, n);
  }

  /**
   * Remove up to max bytes from the front, without copying across chunks
   */
  take(max: number): Buffer {
    return this.shift(max);
  }

  /**
   * Discard up to n bytes from the front
   *
   * @returns the number of bytes discarded
   */
  drop(n: number): number {
    let dropped = 0;
    while (dropped < n && this.head) dropped += this.shift(n - dropped).length;
    return dropped;
  }

  clear(): void {
    this.head = null;
    this.tail = null;
    this.length = 0;
  }

  has(n: number): boolean {
    return this.length >= n;
  }

  // up to max bytes from the front chunk only
  private shift(max: number): Buffer {
    const node = this.head;
    if (!node || max <= 0) return Buffer.alloc(0);

    if (node.data.length <= max) {
      this.head = node.next;
      if (!this.head) this.tail = null;
      this.length -= node.data.length;
      return node.data;
    }

    const out = node.data.subarray(0, max);
    node.data = node.data.subarray(max);
    this.length -= max;
    return out;
  }
}
