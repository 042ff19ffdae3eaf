import { chmodSync, existsSync, lstatSync, mkdirSync, rmSync, symlinkSync } from 'node:fs';
import { dirname, join, normalize, sep } from 'node:path';
import type { BlobStore } from './blob-store.js';
import type { Layer } from './types.js';

/**
 * Resolve a layer path (posix, relative to the image root) inside `root`,
 * refusing anything that would land outside it.
 */
export function resolveInRoot(root: string, layerPath: string): string {
  const relative = normalize(layerPath.replace(/^\/+/, ''));
  if (relative === '..' || relative.startsWith(`..${sep}`)) {
    throw new Error(`Layer path escapes image root: "${layerPath}"`);
  }
  return join(root, relative);
}

/**
 * Write a layer's entries on top of `root`.
 */
export function applyLayer(layer: Layer, root: string, blobs: BlobStore): void {
  for (const entry of layer.entries) {
    const target = resolveInRoot(root, entry.path);

    switch (entry.type) {
      case 'dir':
        if (existsSync(target) && !lstatSync(target).isDirectory()) {
          rmSync(target, { force: true });
        }
        mkdirSync(target, { recursive: true });
        chmodSync(target, entry.mode);
        break;

      case 'file':
        removeIfPresent(target);
        blobs.copyTo(entry.digest, target, entry.mode);
        break;

      case 'symlink':
        removeIfPresent(target);
        mkdirSync(dirname(target), { recursive: true });
        symlinkSync(entry.target, target);
        break;

      case 'whiteout':
        rmSync(target, { recursive: true, force: true });
        break;
    }
  }
}

function removeIfPresent(path: string): void {
  try {
    lstatSync(path);
  } catch {
    return;
  }
  rmSync(path, { recursive: true, force: true });
}
