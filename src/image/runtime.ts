import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { BlobStore } from '../cache/blob-store.js';
import type { LayerCache } from '../cache/layer-cache.js';
import { applyLayer, resolveInRoot } from '../cache/materialize.js';
import type { CommandRunner } from '../runner/command.js';
import type { ImageRecord } from './types.js';

export interface Instance {
  image: ImageRecord;
  /** Private directory holding this instance's copy of the image filesystem. */
  root: string;
}

export interface InstanceStores {
  layers: LayerCache;
  blobs: BlobStore;
}

/**
 * Materialize an image into a fresh private directory. Instances never
 * share files, so writes in one are invisible to every other.
 */
export function createInstance(image: ImageRecord, stores: InstanceStores, parentDir = tmpdir()): Instance {
  const root = mkdtempSync(join(parentDir, 'instance-'));

  try {
    for (const key of image.layers) {
      const layer = stores.layers.get(key);
      if (!layer) {
        throw new Error(`Image ${image.id.slice(0, 12)} references missing layer ${key.slice(0, 12)}`);
      }
      applyLayer(layer, root, stores.blobs);
    }
  } catch (err) {
    rmSync(root, { recursive: true, force: true });
    throw err;
  }

  return { image, root };
}

/**
 * Run the image's entry point, with no arguments, in the image working
 * directory. Resolves with the exit code.
 */
export async function startInstance(
  instance: Instance,
  runner: CommandRunner,
  options: { env?: Record<string, string>; signal?: AbortSignal } = {},
): Promise<number> {
  const { entrypoint, workdir, env } = instance.image.config;
  if (entrypoint.length === 0) {
    throw new Error(`Image ${instance.image.id.slice(0, 12)} declares no entry point`);
  }

  return runner.start([...entrypoint], {
    cwd: resolveInRoot(instance.root, workdir),
    env: { ...env, ...options.env },
    signal: options.signal,
  });
}

export function destroyInstance(instance: Instance): void {
  rmSync(instance.root, { recursive: true, force: true });
}
