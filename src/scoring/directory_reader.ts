/**
 * @fileoverview Directory listing seam for the scorer
 *
 * The scorer only needs entry names and, for directory-only child rules,
 * whether an entry is a directory. Tests substitute their own reader to
 * simulate listing failures that file modes cannot produce for root.
 */

import { readdirSync, statSync, type Dirent } from 'node:fs';
import { join } from 'node:path';

export interface DirectoryEntry {
  readonly name: string;
  /** Symlinks report their target's kind. Evaluated on demand. */
  isDirectory(): boolean;
}

export interface DirectoryReader {
  /** Immediate entries of `dir`. Throws when the directory cannot be listed. */
  readEntries(dir: string): DirectoryEntry[];
}

function toEntry(dir: string, dirent: Dirent): DirectoryEntry {
  let resolved: boolean | undefined;
  return {
    name: dirent.name,
    isDirectory(): boolean {
      if (resolved === undefined) {
        resolved = resolveIsDirectory(dir, dirent);
      }
      return resolved;
    },
  };
}

function resolveIsDirectory(dir: string, dirent: Dirent): boolean {
  if (dirent.isDirectory()) return true;
  if (!dirent.isSymbolicLink()) return false;
  try {
    return statSync(join(dir, dirent.name)).isDirectory();
  } catch {
    // Dangling link.
    return false;
  }
}

export const nodeDirectoryReader: DirectoryReader = {
  readEntries(dir: string): DirectoryEntry[] {
    return readdirSync(dir, { withFileTypes: true }).map((dirent) => toEntry(dir, dirent));
  },
};
