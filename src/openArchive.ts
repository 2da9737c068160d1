import fs from 'fs';
import { PassThrough, Readable } from 'stream';
import bz2 from 'unbzip2-stream';
import xz from 'xz-decompress';
import zlib from 'zlib';

import ArchiveHandle from './ArchiveHandle.ts';
import toError from './lib/toError.ts';
import { createTarError, TarErrorCode } from './tar/errors.ts';

const { XzReadableStream } = xz;

export type Compression = 'none' | 'gzip' | 'bzip2' | 'xz';

export interface OpenMode {
  /** 'auto' picks the compression from the first bytes of the file */
  compression: Compression | 'auto';
}

export type OpenCallback = (error: Error | null, handle?: ArchiveHandle) => void;

/**
 * Opens the archive named by a path identifier. The mode descriptor is passed
 * through verbatim from the reader options.
 */
export type ArchiveOpener = (sourcePath: string, mode: string, callback: OpenCallback) => void;

const SELECTORS = new Map<string, Compression | 'auto'>([
  ['*', 'auto'],
  ['', 'none'],
  ['gz', 'gzip'],
  ['bz2', 'bzip2'],
  ['xz', 'xz'],
]);

// longest magic below (xz)
const PROBE_SIZE = 6;

/**
 * Parse a mode of the form "r[:compression]" or "r|compression"
 */
export function parseOpenMode(mode: string): OpenMode {
  const match = /^([a-z])(?:([:|])(.*))?$/.exec(mode);
  if (!match) throw createTarError(`Invalid open mode '${mode}'`, TarErrorCode.UNSUPPORTED_MODE);
  if (match[1] !== 'r') throw createTarError(`Open mode '${mode}' is not a read mode`, TarErrorCode.UNSUPPORTED_MODE);

  const compression = SELECTORS.get(match[3] === undefined ? '*' : match[3]);
  if (compression === undefined) throw createTarError(`Unknown compression in open mode '${mode}'`, TarErrorCode.UNSUPPORTED_MODE);
  return { compression };
}

export function detectCompression(bytes: Buffer): Compression {
  if (bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b) return 'gzip';
  if (bytes.length >= 3 && bytes.toString('latin1', 0, 3) === 'BZh') return 'bzip2';
  if (bytes.length >= 6 && bytes.subarray(0, 6).equals(Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]))) return 'xz';
  return 'none';
}

/**
 * Pipe a compressed file through its decoder. `upstream` lists the streams
 * feeding the decoded output, for error tracking and cleanup.
 */
function decompress(file: Readable, compression: Compression): { output: Readable; upstream: Readable[] } {
  switch (compression) {
    case 'gzip': {
      const gunzip = zlib.createGunzip();
      file.pipe(gunzip);
      return { output: gunzip, upstream: [file] };
    }
    case 'bzip2': {
      // classic stream without read(); a PassThrough gives the handle one to pull from
      const bunzip = bz2();
      const output = new PassThrough();
      file.pipe(bunzip).pipe(output);
      return { output, upstream: [file, bunzip] };
    }
    case 'xz':
      return { output: Readable.fromWeb(new XzReadableStream(Readable.toWeb(file))), upstream: [file] };
    case 'none':
      return { output: file, upstream: [] };
  }
}

/**
 * Default opener: a local tar file, uncompressed or compressed with gzip,
 * bzip2 or xz
 */
export default function openArchive(sourcePath: string, mode: string, callback: OpenCallback): void {
  let openMode: OpenMode;
  try {
    openMode = parseOpenMode(mode);
  } catch (err) {
    return callback(toError(err));
  }

  fs.open(sourcePath, 'r', (err, fd) => {
    if (err) return callback(err);
    // the primary error is the one reported
    const fail = (error: Error): void => fs.close(fd, () => callback(error));

    const probe = Buffer.alloc(PROBE_SIZE);
    fs.read(fd, probe, 0, PROBE_SIZE, 0, (err, bytesRead) => {
      if (err) return fail(err);
      if (bytesRead === 0) return fail(createTarError(`Tar archive ${sourcePath} is empty`, TarErrorCode.EMPTY_ARCHIVE, { sourcePath }));

      const detected = detectCompression(probe.subarray(0, bytesRead));
      const compression = openMode.compression === 'auto' ? detected : openMode.compression;
      if (compression !== 'none' && compression !== detected) {
        return fail(createTarError(`Tar archive ${sourcePath} is not ${compression} compressed`, TarErrorCode.COMPRESSION_MISMATCH, { sourcePath }));
      }

      const { output, upstream } = decompress(fs.createReadStream(sourcePath, { fd, start: 0 }), compression);
      callback(null, new ArchiveHandle(sourcePath, output, upstream));
    });
  });
}
