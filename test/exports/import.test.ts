import assert from 'assert';
import BaseIterator from 'extract-base-iterator';

import TarArchiveReader, { ArchiveHandle, detectCompression, isTarError, MemberStream, openArchive, parseHeader, parseOpenMode, TarArchiveReader as NamedReader, TarErrorCode, TarWalker } from '../../src/index.ts';

describe('exports .ts', () => {
  it('signature', () => {
    assert.ok(TarArchiveReader);
    assert.strictEqual(NamedReader, TarArchiveReader);
    assert.ok(ArchiveHandle);
    assert.ok(MemberStream);
    assert.ok(TarWalker);
    assert.strictEqual(typeof openArchive, 'function');
    assert.strictEqual(typeof parseOpenMode, 'function');
    assert.strictEqual(typeof detectCompression, 'function');
    assert.strictEqual(typeof parseHeader, 'function');
    assert.strictEqual(typeof isTarError, 'function');
    assert.strictEqual(TarErrorCode.ARCHIVE_FAILED, 'TAR_ARCHIVE_FAILED');
  });

  it('is a base iterator', () => {
    const reader = new TarArchiveReader([]);
    assert.ok(reader instanceof BaseIterator);
    assert.strictEqual(typeof reader.forEach, 'function');
    assert.strictEqual(typeof reader[Symbol.asyncIterator], 'function');
    reader.destroy();
  });
});
