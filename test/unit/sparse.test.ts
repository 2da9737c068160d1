import assert from 'assert';

import { parseGnuSparseHeader, SparseCursor, sparseDataSize, validateSparseMap } from '../../src/tar/sparse.ts';
import { createHeader, writeOctal } from '../lib/tar.ts';

describe('GNU sparse', () => {
  it('parses the map from the header', () => {
    const buf = createHeader({ name: 'holes.bin', typeflag: 'S', size: 1024, format: 'gnu' }, (b) => {
      writeOctal(b, 386, 12, 1024);
      writeOctal(b, 398, 12, 512);
      writeOctal(b, 410, 12, 2560);
      writeOctal(b, 422, 12, 512);
      writeOctal(b, 483, 12, 3072);
    });

    const info = parseGnuSparseHeader(buf);
    assert.deepStrictEqual(info, {
      realSize: 3072,
      entries: [
        { offset: 1024, numbytes: 512 },
        { offset: 2560, numbytes: 512 },
      ],
      isExtended: false,
    });
    assert.strictEqual(sparseDataSize(info.entries), 1024);
  });

  describe('validateSparseMap', () => {
    it('accepts a consistent map', () => {
      const info = { realSize: 100, entries: [{ offset: 10, numbytes: 20 }], isExtended: false };
      assert.strictEqual(validateSparseMap(info, 20), null);
    });

    it('rejects a map that does not cover the stored data', () => {
      const info = { realSize: 100, entries: [{ offset: 10, numbytes: 20 }], isExtended: false };
      assert.strictEqual(validateSparseMap(info, 30), 'sparse map covers 20 bytes but 30 are stored');
    });

    it('rejects overlapping regions', () => {
      const info = {
        realSize: 100,
        entries: [
          { offset: 10, numbytes: 20 },
          { offset: 20, numbytes: 5 },
        ],
        isExtended: false,
      };
      assert.strictEqual(validateSparseMap(info, 25), 'sparse region at 20 overlaps the previous region');
    });

    it('rejects regions past the real size', () => {
      const info = { realSize: 15, entries: [{ offset: 10, numbytes: 20 }], isExtended: false };
      assert.strictEqual(validateSparseMap(info, 20), 'sparse region at 10 extends past the real size 15');
    });
  });

  describe('SparseCursor', () => {
    it('alternates holes and data', () => {
      const cursor = new SparseCursor({ realSize: 50, entries: [{ offset: 10, numbytes: 20 }], isExtended: false });
      const segments: string[] = [];
      for (let segment = cursor.peek(8); segment; segment = cursor.peek(8)) {
        segments.push(`${segment.kind}:${segment.length}`);
        cursor.consume(segment.length);
      }
      assert.deepStrictEqual(segments, ['hole:8', 'hole:2', 'data:8', 'data:8', 'data:4', 'hole:8', 'hole:8', 'hole:4']);
    });

    it('ends immediately for an empty file', () => {
      const cursor = new SparseCursor({ realSize: 0, entries: [], isExtended: false });
      assert.strictEqual(cursor.peek(512), null);
    });
  });
});
