/**
 * Tar format layer: header parsing and a pull-based walker over an open archive
 */

export { default as BufferList } from './BufferList.ts';
export * from './constants.ts';
export * from './errors.ts';
export * from './headers.ts';
export { type SparseEntry, type SparseInfo, SparseCursor, validateSparseMap } from './sparse.ts';
export { type EntryCallback, type MemberEntry, default as TarWalker } from './TarWalker.ts';
