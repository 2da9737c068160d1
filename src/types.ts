import type MemberStream from './MemberStream.ts';
import type { ArchiveOpener } from './openArchive.ts';
import type { ParseOptions } from './tar/headers.ts';

export type { ArchiveOpener, OpenCallback } from './openArchive.ts';

/**
 * Any lazy sequence of path identifiers. Values are checked when drawn, so
 * non-string values are allowed by the type and rejected at run time.
 */
export type PathSource = Iterable<unknown> | AsyncIterable<unknown>;

/**
 * One regular file extracted from an archive
 */
export interface ArchiveMember {
  /** Normalized join of the archive path and the member name */
  path: string;
  stream: MemberStream;
  /** Member name inside the archive */
  name: string;
  /** Path identifier of the archive the member came from */
  sourcePath: string;
  size: number;
  mode: number;
  mtime: Date;
}

/** One step of the reader: a member, the end of the sequence, or the error that ended it */
export type ReadResult = { ok: true; done: false; value: ArchiveMember } | { ok: true; done: true } | { ok: false; error: Error };

export type ReadCallback = (result: ReadResult) => void;
export type MemberCallback = (error?: Error | null, result?: IteratorResult<ArchiveMember>) => void;

export interface TarWarning {
  message: string;
  sourcePath?: string;
  memberName?: string;
  cause?: Error;
}

export type WarningHandler = (warning: TarWarning) => void;

export interface ReaderOptions extends ParseOptions {
  /** Open mode descriptor, "r[:compression]" (default 'r:*') */
  mode?: string;
  /** Nominal length reported by length(); -1 leaves it unset */
  length?: number;
  open?: ArchiveOpener;
  onWarning?: WarningHandler;
}

export type ReaderStateKind = 'idle' | 'open-pending' | 'enumerating' | 'exhausted' | 'failed';
