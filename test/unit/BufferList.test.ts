import assert from 'assert';

import BufferList from '../../src/tar/BufferList.ts';

describe('BufferList', () => {
  it('consumes across chunks', () => {
    const list = new BufferList();
    list.append(Buffer.from('abc'));
    list.append(Buffer.from('def'));

    assert.strictEqual(list.consume(4).toString(), 'abcd');
    assert.strictEqual(list.length, 2);
    assert.strictEqual(list.consume(2).toString(), 'ef');
    assert.strictEqual(list.length, 0);
  });

  it('takes from the front chunk only', () => {
    const list = new BufferList();
    list.append(Buffer.from('abc'));
    list.append(Buffer.from('def'));

    assert.strictEqual(list.take(10).toString(), 'abc');
    assert.strictEqual(list.take(2).toString(), 'de');
    assert.strictEqual(list.take(10).toString(), 'f');
    assert.strictEqual(list.take(10).length, 0);
  });

  it('drops what it has', () => {
    const list = new BufferList();
    list.append(Buffer.from('abc'));
    list.append(Buffer.alloc(0));
    list.append(Buffer.from('def'));

    assert.strictEqual(list.drop(4), 4);
    assert.strictEqual(list.drop(10), 2);
    assert.strictEqual(list.has(1), false);
  });

  it('refuses to consume more than it holds', () => {
    const list = new BufferList();
    list.append(Buffer.from('ab'));
    assert.throws(() => list.consume(3), /Not enough data in buffer/);
    list.clear();
    assert.strictEqual(list.length, 0);
  });
});
