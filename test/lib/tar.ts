/**
 * Builds tar archives in memory for tests
 */

import { checksum } from '../../src/tar/headers.ts';
import { MTIME } from './constants.ts';

export interface HeaderFields {
  name: string;
  size?: number;
  /** single typeflag character, '0' by default */
  typeflag?: string;
  linkname?: string;
  mode?: number;
  uid?: number;
  gid?: number;
  uname?: string;
  gname?: string;
  mtime?: number;
  prefix?: string;
  format?: 'ustar' | 'gnu' | 'v7';
}

export interface SparseRegion {
  offset: number;
  data: Buffer;
}

export function writeOctal(buf: Buffer, offset: number, length: number, value: number): void {
  buf.write(value.toString(8).padStart(length - 1, '0'), offset, length - 1, 'latin1');
  buf[offset + length - 1] = 0;
}

/**
 * @param edit - changes made before the checksum is written
 */
export function createHeader(fields: HeaderFields, edit?: (buf: Buffer) => void): Buffer {
  const buf = Buffer.alloc(512);
  buf.write(fields.name, 0, 100, 'utf8');
  writeOctal(buf, 100, 8, fields.mode === undefined ? 0o644 : fields.mode);
  writeOctal(buf, 108, 8, fields.uid || 0);
  writeOctal(buf, 116, 8, fields.gid || 0);
  writeOctal(buf, 124, 12, fields.size || 0);
  writeOctal(buf, 136, 12, fields.mtime === undefined ? MTIME : fields.mtime);
  buf.write(fields.typeflag || '0', 156, 1, 'latin1');
  if (fields.linkname) buf.write(fields.linkname, 157, 100, 'utf8');

  const format = fields.format || 'ustar';
  if (format === 'ustar') buf.write('ustar\u000000', 257, 8, 'latin1');
  if (format === 'gnu') buf.write('ustar  \u0000', 257, 8, 'latin1');
  if (format !== 'v7') {
    if (fields.uname) buf.write(fields.uname, 265, 32, 'utf8');
    if (fields.gname) buf.write(fields.gname, 297, 32, 'utf8');
  }
  if (fields.prefix) buf.write(fields.prefix, 345, 155, 'utf8');

  if (edit) edit(buf);
  writeOctal(buf, 148, 8, checksum(buf));
  return buf;
}

export function pad(data: Buffer): Buffer {
  const remainder = data.length % 512;
  return remainder ? Buffer.concat([data, Buffer.alloc(512 - remainder)]) : data;
}

export function fileEntry(name: string, content: string | Buffer, fields: Partial<HeaderFields> = {}): Buffer {
  const data = typeof content === 'string' ? Buffer.from(content) : content;
  return Buffer.concat([createHeader({ name, size: data.length, ...fields }), pad(data)]);
}

export function directoryEntry(name: string): Buffer {
  return createHeader({ name, typeflag: '5', mode: 0o755 });
}

export function symlinkEntry(name: string, linkname: string): Buffer {
  return createHeader({ name, typeflag: '2', linkname });
}

export function paxRecord(key: string, value: string): string {
  const body = ` ${key}=${value}\n`;
  const bodyLength = Buffer.byteLength(body);
  // the length prefix counts its own digits
  let length = bodyLength + 1;
  while (String(length).length + bodyLength !== length) length = String(length).length + bodyLength;
  return `${length}${body}`;
}

export function paxEntry(records: Record<string, string>, typeflag = 'x'): Buffer {
  const data = Buffer.from(
    Object.keys(records)
      .map((key) => paxRecord(key, records[key]))
      .join('')
  );
  return Buffer.concat([createHeader({ name: 'PaxHeader', typeflag, size: data.length }), pad(data)]);
}

export function longPathEntry(name: string): Buffer {
  const data = Buffer.from(`${name}\0`);
  return Buffer.concat([createHeader({ name: '././@LongLink', typeflag: 'L', size: data.length, format: 'gnu' }), pad(data)]);
}

/**
 * Old GNU sparse entry with up to 4 regions in the header
 */
export function sparseEntry(name: string, realSize: number, regions: SparseRegion[]): Buffer {
  const data = Buffer.concat(regions.map((region) => region.data));
  const header = createHeader({ name, typeflag: 'S', size: data.length, format: 'gnu' }, (buf) => {
    regions.forEach((region, index) => {
      writeOctal(buf, 386 + index * 24, 12, region.offset);
      writeOctal(buf, 386 + index * 24 + 12, 12, region.data.length);
    });
    writeOctal(buf, 483, 12, realSize);
  });
  return Buffer.concat([header, pad(data)]);
}

/**
 * Entries followed by the two zero blocks that end an archive
 */
export function archive(...entries: Buffer[]): Buffer {
  return Buffer.concat(entries.concat(Buffer.alloc(1024)));
}
