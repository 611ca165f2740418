import type { ArchiveRejectionReason } from '../ports/archive-extractor.port.js';

/**
 * One archive member as listed by the decoder, before anything is written.
 * `type` uses tar's entry type names (`File`, `Directory`, `SymbolicLink`, `Link`, ...).
 */
export interface ArchiveEntry {
  readonly path: string;
  readonly type: string;
  readonly linkpath: string | null;
}

export type PolicyVerdict =
  | { readonly kind: 'accepted'; readonly entries: readonly PlannedEntry[] }
  | { readonly kind: 'rejected'; readonly entryPath: string; readonly reason: ArchiveRejectionReason; readonly detail: string };

/** An accepted entry with its destination-relative path normalized. */
export interface PlannedEntry {
  readonly relativePath: string;
  readonly isDirectory: boolean;
}

const FILE_TYPES = new Set(['File', 'OldFile', 'ContiguousFile']);
const DIRECTORY_TYPE = 'Directory';
const SYMLINK_TYPE = 'SymbolicLink';
const HARDLINK_TYPE = 'Link';

function isAbsoluteLike(p: string): boolean {
  return p.startsWith('/') || /^[A-Za-z]:[\\/]/.test(p);
}

function normalizeEntryPath(p: string): string {
  return p
    .split('/')
    .filter((s) => s !== '' && s !== '.')
    .join('/');
}

type LinkResolution =
  | { readonly kind: 'inside'; readonly relativePath: string }
  | { readonly kind: 'escapes' }
  | { readonly kind: 'through_symlink'; readonly via: string };

/**
 * Walks a link target one component at a time from `baseParts`. Stepping into or out of
 * an archived symlink is refused: its own target is only known to be safe from where it
 * sits, not as an intermediate hop.
 */
function resolveLinkTarget(baseParts: readonly string[], target: string, symlinks: ReadonlySet<string>): LinkResolution {
  const current = [...baseParts];
  for (const component of target.split('/')) {
    if (component === '' || component === '.') continue;
    if (current.length > 0) {
      const here = current.join('/');
      if (symlinks.has(here)) return { kind: 'through_symlink', via: here };
    }
    if (component === '..') {
      if (current.length === 0) return { kind: 'escapes' };
      current.pop();
    } else {
      current.push(component);
    }
  }
  return { kind: 'inside', relativePath: current.join('/') };
}

/**
 * The lexical half of the extraction policy: everything that can be decided from the
 * listing alone. Checks against what is already on disk happen in the extractor.
 */
export function checkArchiveEntries(entries: readonly ArchiveEntry[]): PolicyVerdict {
  const planned: PlannedEntry[] = [];
  const seen = new Map<string, boolean>(); // relative path -> is directory

  // every archived symlink, wherever it appears in the listing
  const symlinks = new Set<string>(
    entries.filter((e) => e.type === SYMLINK_TYPE).map((e) => normalizeEntryPath(e.path)).filter((p) => p !== '')
  );

  const reject = (entry: ArchiveEntry, reason: ArchiveRejectionReason, detail: string): PolicyVerdict => ({
    kind: 'rejected',
    entryPath: entry.path,
    reason,
    detail,
  });

  for (const entry of entries) {
    if (isAbsoluteLike(entry.path)) {
      return reject(entry, 'absolute_path', 'absolute paths are not allowed');
    }

    if (entry.path.split('/').includes('..')) {
      return reject(entry, 'parent_traversal', 'path contains a ".." segment');
    }

    const relativePath = normalizeEntryPath(entry.path);
    const isDirectory = entry.type === DIRECTORY_TYPE;

    if (relativePath === '') {
      // "./" is the destination itself
      if (isDirectory) continue;
      return reject(entry, 'empty_path', 'entry has no path');
    }

    if (!FILE_TYPES.has(entry.type) && !isDirectory && entry.type !== SYMLINK_TYPE && entry.type !== HARDLINK_TYPE) {
      return reject(entry, 'unsupported_entry_type', `entry type ${entry.type} is not extracted`);
    }

    const parts = relativePath.split('/');
    for (let i = 1; i < parts.length; i++) {
      const ancestor = parts.slice(0, i).join('/');
      if (symlinks.has(ancestor)) {
        return reject(entry, 'through_symlink', `parent ${ancestor} is a symlink in this archive`);
      }
    }

    const previous = seen.get(relativePath);
    if (previous !== undefined && !(previous && isDirectory)) {
      return reject(entry, 'would_overwrite', 'path appears more than once in the archive');
    }

    if (entry.type === SYMLINK_TYPE || entry.type === HARDLINK_TYPE) {
      const target = entry.linkpath ?? '';
      if (target === '' || isAbsoluteLike(target)) {
        return reject(entry, 'link_escapes_destination', `link target "${target}" is not a relative path`);
      }
      // symlink targets resolve from the link's directory, hardlink targets from the archive root
      const baseParts = entry.type === SYMLINK_TYPE ? parts.slice(0, -1) : [];
      const resolved = resolveLinkTarget(baseParts, target, symlinks);
      if (resolved.kind === 'escapes') {
        return reject(entry, 'link_escapes_destination', `link target "${target}" leaves the destination`);
      }
      if (resolved.kind === 'through_symlink') {
        return reject(entry, 'through_symlink', `link target "${target}" passes through symlink ${resolved.via}`);
      }
      if (entry.type === HARDLINK_TYPE && symlinks.has(resolved.relativePath)) {
        return reject(entry, 'through_symlink', `hardlink target "${target}" is a symlink in this archive`);
      }
    }

    seen.set(relativePath, isDirectory);
    planned.push({ relativePath, isDirectory });
  }

  return { kind: 'accepted', entries: planned };
}
