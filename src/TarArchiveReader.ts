import once from 'call-once-fn';
import BaseIterator from 'extract-base-iterator';

import type ArchiveHandle from './ArchiveHandle.ts';
import toError from './lib/toError.ts';
import Upstream from './lib/Upstream.ts';
import MemberStream from './MemberStream.ts';
import nextMember, { innerPath, isRegularFile, nextRegularEntry } from './nextMember.ts';
import openArchive from './openArchive.ts';
import { createTarError, TarErrorCode } from './tar/errors.ts';
import type { ParseOptions } from './tar/headers.ts';
import TarWalker, { type MemberEntry } from './tar/TarWalker.ts';
import type { ArchiveMember, ArchiveOpener, PathSource, ReadCallback, ReaderOptions, ReaderStateKind, ReadResult, TarWarning, WarningHandler } from './types.ts';

interface EnumeratingState {
  kind: 'enumerating';
  sourcePath: string;
  handle: ArchiveHandle;
  walker: TarWalker;
  /** entry read ahead by the open step, not yet visited */
  lookahead: MemberEntry | null;
  /** stream of the member last yielded */
  member: MemberStream | null;
}

type ReaderState = { kind: 'idle' } | { kind: 'open-pending'; sourcePath: string } | EnumeratingState | { kind: 'exhausted' } | { kind: 'failed'; error: Error };

const END: ReadResult = { ok: true, done: true };

function emitProcessWarning(warning: TarWarning): void {
  const detail: string[] = [];
  if (warning.sourcePath !== undefined) detail.push(`source: ${warning.sourcePath}`);
  if (warning.memberName !== undefined) detail.push(`member: ${warning.memberName}`);
  if (warning.cause) detail.push(`cause: ${warning.cause.message}`);
  process.emitWarning(warning.message, { type: 'TarArchiveWarning', detail: detail.length ? detail.join('\n') : undefined });
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Lazily opens each tar archive named by a sequence of path identifiers and
 * yields every regular file in it as `{ path, stream }`.
 *
 * Nothing happens until the first read. At most one archive is open at a
 * time, and each yielded stream reads straight from it: consume a member's
 * stream before asking for the next member, or it is destroyed.
 *
 * Any failure ends the whole sequence. Archive failures are reported to
 * `onWarning` first, and every read after that reports the same error, even
 * after destroy().
 *
 * @example
 * ```ts
 * const reader = new TarArchiveReader(['/data/a.tar', '/data/b.tar.gz']);
 * for await (const member of reader) {
 *   let bytes = 0;
 *   for await (const chunk of member.stream) bytes += chunk.length;
 *   console.log(member.path, bytes);
 * }
 * ```
 */
export default class TarArchiveReader extends BaseIterator<ArchiveMember> {
  private upstream: Upstream;
  private mode: string;
  private lengthHint: number;
  private opener: ArchiveOpener;
  private onWarning: WarningHandler;
  private parseOptions: ParseOptions;

  private current: ReaderState = { kind: 'idle' };
  private destroyed = false;

  constructor(source: PathSource, options: ReaderOptions = {}) {
    super({});
    this.upstream = new Upstream(source);
    this.mode = options.mode || 'r:*';
    this.lengthHint = options.length === undefined ? -1 : options.length;
    this.opener = options.open || openArchive;
    this.onWarning = options.onWarning || emitProcessWarning;
    this.parseOptions = {
      filenameEncoding: options.filenameEncoding || 'utf8',
      allowUnknownFormat: options.allowUnknownFormat === undefined ? true : options.allowUnknownFormat,
    };
    this.push(nextMember);
  }

  get state(): ReaderStateKind {
    return this.current.kind;
  }

  length(): number {
    if (this.lengthHint === -1) throw createTarError(`${this.constructor.name} instance doesn't have valid length`, TarErrorCode.NOT_SUPPORTED);
    return this.lengthHint;
  }

  /**
   * Closes the open archive and the path source. A failed reader keeps its
   * error; any other reader ends the sequence.
   */
  end(err?: Error) {
    if (!this.destroyed) {
      this.destroyed = true;
      this.closeArchive();
      this.closeUpstream();
    }
    // failed is terminal: the iterator stays open so later reads report the error
    if (this.current.kind === 'failed') return;
    this.current = { kind: 'exhausted' };
    super.end(err);
  }

  /**
   * Advance the state machine by one member, the end of the sequence, or the
   * error that ended it.
   * @internal
   */
  step(done: ReadCallback): void {
    const state = this.current;
    if (state.kind === 'failed') return done({ ok: false, error: state.error });
    if (this.destroyed) return done(END);

    switch (state.kind) {
      case 'idle':
        return this.draw(done);
      case 'open-pending':
        return this.open(state.sourcePath, done);
      case 'enumerating':
        return this.enumerate(state, done);
      case 'exhausted':
        return done(END);
    }
  }

  private draw(done: ReadCallback): void {
    this.upstream.pull((err, result) => {
      if (this.destroyed) return done(END);
      if (err) {
        // the source's own failure: reported as is, and the source is not closed
        this.current = { kind: 'failed', error: err };
        return done({ ok: false, error: err });
      }
      if (!result || result.done) {
        this.current = { kind: 'exhausted' };
        return done(END);
      }

      const value: unknown = result.value;
      if (typeof value !== 'string') {
        return this.fail(createTarError(`Path identifier should be a string, but is of type ${typeName(value)}`, TarErrorCode.TYPE_MISMATCH), done);
      }
      this.current = { kind: 'open-pending', sourcePath: value };
      this.open(value, done);
    });
  }

  private open(sourcePath: string, done: ReadCallback): void {
    const opened = once((err: Error | null, handle?: ArchiveHandle) => {
      if (this.destroyed) {
        if (handle) handle.close();
        return done(END);
      }
      if (err || !handle) return this.openFailed(sourcePath, err || new Error(`No archive was opened for ${sourcePath}`), done);

      // reading the first header tells a tar archive from anything else
      const walker = new TarWalker(handle, this.parseOptions);
      walker.next((err, entry) => {
        if (this.destroyed || err || !entry) handle.close();
        if (this.destroyed) return done(END);
        if (err) return this.openFailed(sourcePath, err, done);
        if (!entry) {
          this.current = { kind: 'idle' };
          return this.step(done);
        }

        const state: EnumeratingState = { kind: 'enumerating', sourcePath, handle, walker, lookahead: entry, member: null };
        this.current = state;
        this.enumerate(state, done);
      });
    });

    try {
      this.opener(sourcePath, this.mode, opened);
    } catch (err) {
      opened(toError(err));
    }
  }

  private enumerate(state: EnumeratingState, done: ReadCallback): void {
    if (state.member) {
      state.member.detach();
      state.member = null;
    }

    const lookahead = state.lookahead;
    state.lookahead = null;
    if (lookahead && isRegularFile(lookahead)) return this.yieldMember(state, lookahead, done);

    nextRegularEntry(state.walker, (err, entry) => {
      if (this.destroyed) return done(END);
      if (err) return this.archiveFailed(state.sourcePath, err, done);
      if (!entry) {
        state.handle.close();
        this.current = { kind: 'idle' };
        return this.step(done);
      }
      this.yieldMember(state, entry, done);
    });
  }

  private yieldMember(state: EnumeratingState, entry: MemberEntry, done: ReadCallback): void {
    const header = entry.header;
    if (entry.defect !== null) {
      const { sourcePath } = state;
      this.onWarning({ message: `Failed to extract file ${header.name} from source tar archive ${sourcePath}`, sourcePath, memberName: header.name });
      const error = createTarError(`Failed to extract file ${header.name} from tar archive ${sourcePath}: ${entry.defect}`, TarErrorCode.EXTRACTION_FAILED, { sourcePath, memberName: header.name });
      this.warnAbort(sourcePath, error);
      return this.fail(error, done);
    }

    const stream = new MemberStream(state.walker, entry);
    state.member = stream;
    done({
      ok: true,
      done: false,
      value: { path: innerPath(state.sourcePath, header.name), stream, name: header.name, sourcePath: state.sourcePath, size: header.size, mode: header.mode, mtime: header.mtime },
    });
  }

  private openFailed(sourcePath: string, cause: Error, done: ReadCallback): void {
    this.warnAbort(sourcePath, cause);
    this.fail(createTarError(`Unable to open tar archive ${sourcePath}: ${cause.message}`, TarErrorCode.OPEN_FAILED, { sourcePath, cause }), done);
  }

  private archiveFailed(sourcePath: string, cause: Error, done: ReadCallback): void {
    this.warnAbort(sourcePath, cause);
    this.fail(createTarError(`Unable to extract files from tar archive ${sourcePath}: ${cause.message}`, TarErrorCode.ARCHIVE_FAILED, { sourcePath, cause }), done);
  }

  private warnAbort(sourcePath: string, cause: Error): void {
    this.onWarning({ message: `Unable to extract files from corrupted tar archive ${sourcePath} due to: ${cause.message}, abort!`, sourcePath, cause });
  }

  private fail(error: Error, done: ReadCallback): void {
    this.closeArchive();
    this.closeUpstream();
    this.current = { kind: 'failed', error };
    done({ ok: false, error });
  }

  private closeArchive(): void {
    const state = this.current;
    if (state.kind !== 'enumerating') return;
    if (state.member) state.member.detach();
    state.member = null;
    state.handle.close();
  }

  private closeUpstream(): void {
    this.upstream.close((err) => this.onWarning({ message: `Failed to close the path source: ${err.message}`, cause: err }));
  }
}
