import assert from 'assert';
import path from 'path';

import openArchive, { detectCompression, parseOpenMode } from '../../src/openArchive.ts';
import { TarErrorCode } from '../../src/tar/errors.ts';
import { parseHeader } from '../../src/tar/headers.ts';
import { DATA_DIR } from '../lib/constants.ts';
import { hasCode } from '../lib/streams.ts';

function firstHeaderName(sourcePath: string, mode: string, callback: (err: Error | null, name?: string) => void): void {
  openArchive(sourcePath, mode, (err, handle) => {
    if (err || !handle) return callback(err || new Error('no handle'));
    handle.readBlock(512, (err, block) => {
      handle.close();
      if (err || !block) return callback(err || new Error('no block'));
      const header = parseHeader(block);
      callback(null, header ? header.name : undefined);
    });
  });
}

describe('openArchive', () => {
  describe('parseOpenMode', () => {
    it('reads compression selectors', () => {
      assert.deepStrictEqual(parseOpenMode('r'), { compression: 'auto' });
      assert.deepStrictEqual(parseOpenMode('r:*'), { compression: 'auto' });
      assert.deepStrictEqual(parseOpenMode('r:'), { compression: 'none' });
      assert.deepStrictEqual(parseOpenMode('r:gz'), { compression: 'gzip' });
      assert.deepStrictEqual(parseOpenMode('r:bz2'), { compression: 'bzip2' });
      assert.deepStrictEqual(parseOpenMode('r:xz'), { compression: 'xz' });
    });

    it('treats stream modes like random access modes', () => {
      assert.deepStrictEqual(parseOpenMode('r|*'), { compression: 'auto' });
      assert.deepStrictEqual(parseOpenMode('r|'), { compression: 'none' });
      assert.deepStrictEqual(parseOpenMode('r|gz'), { compression: 'gzip' });
    });

    it('rejects write and append modes', () => {
      assert.throws(() => parseOpenMode('w'), /Open mode 'w' is not a read mode/);
      assert.throws(() => parseOpenMode('a:gz'), hasCode(TarErrorCode.UNSUPPORTED_MODE));
    });

    it('rejects unknown compression', () => {
      assert.throws(() => parseOpenMode('r:zip'), /Unknown compression in open mode 'r:zip'/);
    });

    it('rejects malformed modes', () => {
      assert.throws(() => parseOpenMode(''), /Invalid open mode ''/);
      assert.throws(() => parseOpenMode('rb'), hasCode(TarErrorCode.UNSUPPORTED_MODE));
    });
  });

  describe('detectCompression', () => {
    it('recognizes magic bytes', () => {
      assert.strictEqual(detectCompression(Buffer.from([0x1f, 0x8b, 0x08, 0x00])), 'gzip');
      assert.strictEqual(detectCompression(Buffer.from('BZh91AY')), 'bzip2');
      assert.strictEqual(detectCompression(Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00])), 'xz');
    });

    it('falls back to uncompressed', () => {
      assert.strictEqual(detectCompression(Buffer.from('x.txt\0')), 'none');
      assert.strictEqual(detectCompression(Buffer.from([0x1f])), 'none');
      assert.strictEqual(detectCompression(Buffer.alloc(0)), 'none');
    });
  });

  describe('openArchive', () => {
    it('decodes bzip2 archives', (done) => {
      firstHeaderName(path.join(DATA_DIR, 'sample.tar.bz2'), 'r:*', (err, name) => {
        if (err) return done(err);
        assert.strictEqual(name, 'x.txt');
        done();
      });
    });

    it('decodes xz archives', (done) => {
      firstHeaderName(path.join(DATA_DIR, 'sample.tar.xz'), 'r:xz', (err, name) => {
        if (err) return done(err);
        assert.strictEqual(name, 'x.txt');
        done();
      });
    });

    it('refuses a codec the file does not use', (done) => {
      openArchive(path.join(DATA_DIR, 'sample.tar.bz2'), 'r:gz', (err) => {
        assert.ok(hasCode(TarErrorCode.COMPRESSION_MISMATCH)(err));
        done();
      });
    });
  });
});
