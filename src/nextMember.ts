import once from 'call-once-fn';
import path from 'path';

import { defer } from './lib/defer.ts';
import type { TarEntryType } from './tar/constants.ts';
import type TarWalker from './tar/TarWalker.ts';
import type { EntryCallback, MemberEntry } from './tar/TarWalker.ts';
import type Iterator from './TarArchiveReader.ts';
import type { MemberCallback, ReadResult } from './types.ts';

const REGULAR_TYPES: ReadonlyArray<TarEntryType | null> = ['file', 'old-file', 'contiguous-file', 'gnu-sparse'];

export function isRegularFile(entry: MemberEntry): boolean {
  return REGULAR_TYPES.indexOf(entry.header.type) !== -1;
}

/**
 * Identifier of a member as seen downstream: the archive path joined with the
 * member name, with redundant separators and '.'/'..' segments collapsed.
 * Pure string manipulation; nothing is looked up on disk.
 */
export function innerPath(sourcePath: string, name: string): string {
  return path.join(sourcePath, name);
}

/**
 * Walk to the next regular-file entry of an archive, skipping directories,
 * links and special files. Calls back with null at the end of the archive.
 */
export function nextRegularEntry(walker: TarWalker, callback: EntryCallback): void {
  walker.next((err, entry) => {
    if (err) return callback(err, null);
    if (!entry) return callback(null, null);
    if (isRegularFile(entry)) return callback(null, entry);
    // keep going, without growing the stack over long runs of skipped entries
    defer(() => nextRegularEntry(walker, callback));
  });
}

export default function nextMember(iterator: Iterator, callback: MemberCallback): undefined {
  iterator.step(
    once((result: ReadResult) => {
      // keep processing; a failure stays queued so every later read reports it
      if (!iterator.isDone() && !(result.ok && result.done)) iterator.push(nextMember);

      defer(() => {
        if (!result.ok) return callback(result.error);
        callback(null, result.done ? { done: true, value: null } : { done: false, value: result.value });
      });
    })
  );
}
