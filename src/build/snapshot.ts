import { lstatSync, readdirSync, readlinkSync } from 'node:fs';
import { join } from 'node:path';
import type { BlobStore } from '../cache/blob-store.js';
import type { LayerEntry } from '../cache/types.js';

export interface NodeStat {
  type: 'file' | 'dir' | 'symlink';
  size: number;
  mtimeMs: number;
  mode: number;
  target?: string;
}

export type Snapshot = Map<string, NodeStat>;

/**
 * Record every path under `root` (posix, relative) with enough metadata
 * to notice a change.
 */
export function snapshotTree(root: string): Snapshot {
  const snapshot: Snapshot = new Map();
  walk(root, '', snapshot);
  return snapshot;
}

function walk(root: string, rel: string, out: Snapshot): void {
  const dir = rel ? join(root, rel) : root;
  for (const name of readdirSync(dir).sort()) {
    const childRel = rel ? `${rel}/${name}` : name;
    const full = join(root, childRel);
    const stat = lstatSync(full);

    if (stat.isSymbolicLink()) {
      out.set(childRel, { type: 'symlink', size: 0, mtimeMs: stat.mtimeMs, mode: 0, target: readlinkSync(full) });
    } else if (stat.isDirectory()) {
      out.set(childRel, { type: 'dir', size: 0, mtimeMs: 0, mode: stat.mode & 0o7777 });
      walk(root, childRel, out);
    } else if (stat.isFile()) {
      out.set(childRel, { type: 'file', size: stat.size, mtimeMs: stat.mtimeMs, mode: stat.mode & 0o7777 });
    }
  }
}

function changed(before: NodeStat | undefined, after: NodeStat): boolean {
  if (!before) return true;
  if (before.type !== after.type) return true;
  switch (after.type) {
    case 'file':
      return before.size !== after.size || before.mtimeMs !== after.mtimeMs || before.mode !== after.mode;
    case 'symlink':
      return before.target !== after.target;
    case 'dir':
      return before.mode !== after.mode;
  }
}

/**
 * Turn the difference between two snapshots of `root` into layer entries,
 * storing the contents of new and modified files in the blob store.
 */
export function diffToEntries(root: string, before: Snapshot, after: Snapshot, blobs: BlobStore): LayerEntry[] {
  const entries: LayerEntry[] = [];

  for (const [path, stat] of after) {
    if (!changed(before.get(path), stat)) continue;

    if (stat.type === 'file') {
      const digest = blobs.putFile(join(root, path));
      entries.push({ path, type: 'file', digest, mode: stat.mode, size: stat.size });
    } else if (stat.type === 'symlink') {
      entries.push({ path, type: 'symlink', target: stat.target ?? '' });
    } else {
      entries.push({ path, type: 'dir', mode: stat.mode });
    }
  }

  const removed = [...before.keys()].filter((path) => !after.has(path)).sort();
  for (const path of removed) {
    // A removed directory's children are covered by its own whiteout
    const parentRemoved = removed.some((other) => other !== path && path.startsWith(`${other}/`));
    if (!parentRemoved) entries.push({ path, type: 'whiteout' });
  }

  return entries;
}

export function entriesSize(entries: LayerEntry[]): number {
  return entries.reduce((total, entry) => total + (entry.type === 'file' ? entry.size : 0), 0);
}
