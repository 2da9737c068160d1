/**
 * Extensions - GNU/PAX extension handling for TAR
 *
 * Extension entries carry metadata for the entry that follows them:
 * - GNU LongPath (type 'L') - paths > 100 chars
 * - GNU LongLink (type 'K') - link targets > 100 chars
 * - PAX Headers (type 'x') - attributes for the next entry
 * - PAX Global Headers (type 'g') - attributes for all later entries
 */

import type { TarEntryType } from './constants.ts';
import { decodeLongPath, decodePax, type TarHeader } from './headers.ts';

export interface ExtensionState {
  gnuLongPath: string | null;
  gnuLongLink: string | null;
  paxHeader: Record<string, string> | null;
  paxGlobal: Record<string, string>;
}

export function createExtensionState(): ExtensionState {
  return {
    gnuLongPath: null,
    gnuLongLink: null,
    paxHeader: null,
    paxGlobal: {},
  };
}

export function isExtensionType(type: TarEntryType | null): boolean {
  return type === 'gnu-long-path' || type === 'gnu-long-link-path' || type === 'pax-header' || type === 'pax-global-header';
}

/**
 * Store the body of an extension entry for the entries that follow it
 */
export function collectExtension(state: ExtensionState, header: TarHeader, data: Buffer, encoding: BufferEncoding): void {
  switch (header.type) {
    case 'gnu-long-path':
      state.gnuLongPath = decodeLongPath(data, encoding);
      break;
    case 'gnu-long-link-path':
      state.gnuLongLink = decodeLongPath(data, encoding);
      break;
    case 'pax-header':
      state.paxHeader = decodePax(data);
      break;
    case 'pax-global-header':
      // merged, later globals override earlier keys
      Object.assign(state.paxGlobal, decodePax(data));
      break;
  }
}

/**
 * Apply pending GNU/PAX extensions to a header. Per-entry state is consumed.
 */
export function applyExtensions(header: TarHeader, state: ExtensionState): void {
  applyPaxToHeader(header, state.paxGlobal);

  if (state.paxHeader) {
    applyPaxToHeader(header, state.paxHeader);
    header.pax = state.paxHeader;
    state.paxHeader = null;
  }

  // GNU long names win over PAX
  if (state.gnuLongPath !== null) {
    header.name = state.gnuLongPath;
    state.gnuLongPath = null;
  }
  if (state.gnuLongLink !== null) {
    header.linkname = state.gnuLongLink;
    state.gnuLongLink = null;
  }

  // old tar versions mark directories with a trailing '/'
  if (header.type === 'old-file' && header.name.endsWith('/')) header.type = 'directory';
}

function parseDecimal(value: string): number {
  return /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
}

export function applyPaxToHeader(header: TarHeader, pax: Record<string, string>): void {
  if (pax.path) header.name = pax.path;
  if (pax.linkpath) header.linkname = pax.linkpath;
  if (pax.size) header.size = parseDecimal(pax.size);
  if (pax.uid) header.uid = parseDecimal(pax.uid);
  if (pax.gid) header.gid = parseDecimal(pax.gid);
  if (pax.uname) header.uname = pax.uname;
  if (pax.gname) header.gname = pax.gname;
  if (pax.mtime) header.mtime = new Date(parseFloat(pax.mtime) * 1000);
}
