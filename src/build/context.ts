import { isAbsolute, join, relative, resolve } from 'node:path';
import { mkdirSync } from 'node:fs';
import type Database from 'better-sqlite3';
import { BuildLog } from '../audit/log.js';
import { BlobStore } from '../cache/blob-store.js';
import { LayerCache } from '../cache/layer-cache.js';
import { ImageStore } from '../image/store.js';
import { spawnRunner, type CommandRunner } from '../runner/command.js';

export type StepStatus = 'executed' | 'cached' | 'skipped';

export interface StepReport {
  name: string;
  kind: string;
  status: StepStatus;
  layerKey: string | null;
  description: string;
}

export interface BuildContext {
  db: Database.Database;
  contextDir: string;
  cacheDir: string;
  runner: CommandRunner;
  blobs: BlobStore;
  layers: LayerCache;
  images: ImageStore;
  log: BuildLog;
  installBrowser: boolean;
  noCache: boolean;
  env: Record<string, string>;
  signal?: AbortSignal;
  /** Called after each step finishes (or is taken from cache, or skipped). */
  onStep?: (report: StepReport) => void;
}

export interface BuildContextOptions {
  db: Database.Database;
  contextDir: string;
  cacheDir: string;
  runner?: CommandRunner;
  installBrowser?: boolean;
  noCache?: boolean;
  env?: Record<string, string>;
  signal?: AbortSignal;
  onStep?: (report: StepReport) => void;
}

export function createBuildContext(options: BuildContextOptions): BuildContext {
  const cacheDir = resolve(options.cacheDir);
  mkdirSync(cacheDir, { recursive: true });

  return {
    db: options.db,
    contextDir: resolve(options.contextDir),
    cacheDir,
    runner: options.runner ?? spawnRunner,
    blobs: new BlobStore(join(cacheDir, 'blobs')),
    layers: new LayerCache(options.db),
    images: new ImageStore(options.db),
    log: new BuildLog(options.db),
    installBrowser: options.installBrowser ?? true,
    noCache: options.noCache ?? false,
    env: options.env ?? {},
    signal: options.signal,
    onStep: options.onStep,
  };
}

/**
 * Ignore pattern for the cache directory when it sits inside the build
 * context, so a whole-tree copy never picks up the cache itself.
 */
export function cacheIgnorePatterns(ctx: Pick<BuildContext, 'contextDir' | 'cacheDir'>): string[] {
  const rel = relative(ctx.contextDir, ctx.cacheDir);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) return [];
  return [rel.split('\\').join('/')];
}
