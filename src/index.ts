export { default as ArchiveHandle } from './ArchiveHandle.ts';
export { default as MemberStream } from './MemberStream.ts';
export { innerPath, isRegularFile } from './nextMember.ts';
export { type Compression, detectCompression, default as openArchive, type OpenMode, parseOpenMode } from './openArchive.ts';
export * from './tar/index.ts';
export { default, default as TarArchiveReader } from './TarArchiveReader.ts';
export * from './types.ts';
