#!/usr/bin/env node
/**
 * scrape-runtime CLI: build and run the scraping service runtime image.
 *
 * Usage:
 *   scrape-runtime build [--no-cache] [--no-browser]   Build the image from the manifest
 *   scrape-runtime render [--no-browser]               Print the manifest as a Dockerfile
 *   scrape-runtime images                              List built images
 *   scrape-runtime run [image]                         Start an instance of an image
 *   scrape-runtime prune                               Delete blobs no cached layer uses
 *   scrape-runtime log [--build <id>] [--limit <n>]    Show the build log
 *
 * Global options: --config <file> (default scraper.config.yaml), --manifest <file>.
 */

import { readFileSync, realpathSync, mkdirSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { basename, join, resolve } from 'node:path';
import type Database from 'better-sqlite3';
import { getDb } from './db/db.js';
import { loadConfigOrDefaults } from './config/loader.js';
import type { RuntimeConfig } from './config/schema.js';
import { BuildLog, type BuildLogEntry, type BuildLogFilters } from './audit/log.js';
import { BlobStore } from './cache/blob-store.js';
import { LayerCache } from './cache/layer-cache.js';
import { createBuildContext, type StepReport } from './build/context.js';
import { executeBuild, type BuildResult } from './build/engine.js';
import { parseManifest } from './manifest/parser.js';
import type { Manifest } from './manifest/types.js';
import { renderDockerfile } from './image/dockerfile.js';
import { ImageStore } from './image/store.js';
import type { ImageRecord } from './image/types.js';
import { createInstance, destroyInstance, startInstance } from './image/runtime.js';
import { spawnRunner, type CommandRunner } from './runner/command.js';

export const DB_FILE = 'provision.db';

// --- Arguments ---

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Map<string, string | true>;
}

/**
 * Split argv into a command, positionals and `--flag` / `--flag value` /
 * `--flag=value` options. `--no-x` is always a bare switch.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    if (eq !== -1) {
      flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      continue;
    }

    const name = arg.slice(2);
    const next = argv[i + 1];
    if (!name.startsWith('no-') && next !== undefined && !next.startsWith('--')) {
      flags.set(name, next);
      i++;
    } else {
      flags.set(name, true);
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

// --- Workspace ---

export interface Workspace {
  cwd: string;
  config: RuntimeConfig;
  /** Overrides `config.build.manifest`. */
  manifestPath?: string;
}

export function loadWorkspace(cwd: string, args: ParsedArgs): Workspace {
  const configPath = resolve(cwd, stringFlag(args, 'config') ?? 'scraper.config.yaml');
  const manifest = stringFlag(args, 'manifest');
  return {
    cwd,
    config: loadConfigOrDefaults(configPath),
    manifestPath: manifest ? resolve(cwd, manifest) : undefined,
  };
}

function cacheDir(ws: Workspace): string {
  return resolve(ws.cwd, ws.config.build.cache_dir);
}

function withDb<T>(ws: Workspace, fn: (db: Database.Database) => T): T {
  const dir = cacheDir(ws);
  mkdirSync(dir, { recursive: true });
  const db = getDb(join(dir, DB_FILE));
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

export function readManifest(ws: Workspace): Manifest {
  const path = ws.manifestPath ?? resolve(ws.cwd, ws.config.build.manifest);
  return parseManifest(readFileSync(path, 'utf-8'), basename(path).replace(/\.manifest$/, ''));
}

// --- Commands ---

export interface BuildOptions {
  runner?: CommandRunner;
  installBrowser?: boolean;
  noCache?: boolean;
  signal?: AbortSignal;
  onStep?: (report: StepReport) => void;
}

export async function buildImage(ws: Workspace, options: BuildOptions = {}): Promise<BuildResult> {
  const manifest = readManifest(ws);
  const dir = cacheDir(ws);
  mkdirSync(dir, { recursive: true });
  const db = getDb(join(dir, DB_FILE));

  try {
    const ctx = createBuildContext({
      db,
      contextDir: resolve(ws.cwd, ws.config.build.context),
      cacheDir: dir,
      runner: options.runner,
      installBrowser: options.installBrowser ?? ws.config.build.install_browser,
      noCache: options.noCache,
      signal: options.signal,
      onStep: options.onStep,
    });
    return await executeBuild(manifest, ctx);
  } finally {
    db.close();
  }
}

export function renderManifest(ws: Workspace, installBrowser = ws.config.build.install_browser): string {
  return renderDockerfile(readManifest(ws), { installBrowser });
}

export function listImages(ws: Workspace): ImageRecord[] {
  return withDb(ws, (db) => new ImageStore(db).list());
}

export interface RunOptions {
  runner?: CommandRunner;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Start one instance of an image (by id, id prefix or tag) and wait for it
 * to exit. The instance directory is removed afterwards.
 */
export async function runImage(ws: Workspace, ref: string, options: RunOptions = {}): Promise<number> {
  const dir = cacheDir(ws);
  mkdirSync(dir, { recursive: true });
  const db = getDb(join(dir, DB_FILE));

  try {
    const image = new ImageStore(db).get(ref);
    if (!image) {
      throw new Error(`No image matches "${ref}"`);
    }

    const instancesDir = join(dir, 'instances');
    mkdirSync(instancesDir, { recursive: true });
    const instance = createInstance(image, { layers: new LayerCache(db), blobs: new BlobStore(join(dir, 'blobs')) }, instancesDir);
    try {
      return await startInstance(instance, options.runner ?? spawnRunner, { env: options.env, signal: options.signal });
    } finally {
      destroyInstance(instance);
    }
  } finally {
    db.close();
  }
}

/** Delete blobs no cached layer references. Returns the removed digests. */
export function pruneCache(ws: Workspace): string[] {
  return withDb(ws, (db) => {
    const blobs = new BlobStore(join(cacheDir(ws), 'blobs'));
    return blobs.prune(new LayerCache(db).referencedDigests());
  });
}

export function readBuildLog(ws: Workspace, filters: BuildLogFilters = {}): BuildLogEntry[] {
  return withDb(ws, (db) => new BuildLog(db).getEntries(filters));
}

// --- Output ---

export function formatStep(report: StepReport): string {
  const key = report.layerKey ? report.layerKey.slice(0, 12) : '-';
  return `  [${report.status.padEnd(8)}] ${report.name} (${report.kind}) ${key}  ${report.description}`;
}

export function formatImage(image: ImageRecord): string {
  return `  ${image.id.slice(0, 12)}  ${image.tag.padEnd(20)} ${String(image.layers.length).padStart(3)} layers  ${image.createdAt}`;
}

export function formatLogEntry(entry: BuildLogEntry): string {
  const step = entry.step ? ` ${entry.step}` : '';
  return `  ${entry.timestamp}  ${entry.buildId.slice(0, 8)}  ${entry.event}${step}  ${JSON.stringify(entry.details)}`;
}

// --- CLI runner (only executes when this file is the entry point) ---
// Resolve symlinks so this works through node_modules/.bin
const isDirectRun = (() => {
  try {
    const self = fileURLToPath(import.meta.url);
    const invoked = realpathSync(process.argv[1]);
    return invoked === self;
  } catch {
    return false;
  }
})();

async function main(args: ParsedArgs): Promise<number> {
  const ws = loadWorkspace(process.cwd(), args);
  const installBrowser = args.flags.has('no-browser') ? false : undefined;

  switch (args.command) {
    case 'build': {
      const controller = new AbortController();
      process.once('SIGINT', () => controller.abort());
      console.log(`\n  Building ${readManifest(ws).tag}...\n`);
      const result = await buildImage(ws, {
        installBrowser,
        noCache: args.flags.has('no-cache'),
        signal: controller.signal,
        onStep: (report) => console.log(formatStep(report)),
      });
      console.log(`\n  Image ${result.image.id.slice(0, 12)} tagged ${result.image.tag}\n`);
      return 0;
    }
    case 'render':
      process.stdout.write(renderManifest(ws, installBrowser));
      return 0;
    case 'images': {
      const images = listImages(ws);
      if (images.length === 0) {
        console.log('\n  No images built yet.\n');
      } else {
        for (const image of images) console.log(formatImage(image));
      }
      return 0;
    }
    case 'run': {
      const ref = args.positionals[0] ?? readManifest(ws).tag;
      const controller = new AbortController();
      process.once('SIGINT', () => controller.abort());
      process.once('SIGTERM', () => controller.abort());
      return runImage(ws, ref, { signal: controller.signal });
    }
    case 'prune': {
      const removed = pruneCache(ws);
      console.log(`\n  Removed ${removed.length} unreferenced blob(s).\n`);
      return 0;
    }
    case 'log': {
      const limit = Number(stringFlag(args, 'limit') ?? '50');
      const entries = readBuildLog(ws, {
        buildId: stringFlag(args, 'build'),
        step: stringFlag(args, 'step'),
        limit: Number.isInteger(limit) && limit > 0 ? limit : 50,
      });
      for (const entry of entries) console.log(formatLogEntry(entry));
      return 0;
    }
    default:
      console.log('scrape-runtime CLI v0.1.0');
      console.log('\nUsage:');
      console.log('  scrape-runtime build [--no-cache] [--no-browser]   Build the image from the manifest');
      console.log('  scrape-runtime render [--no-browser]               Print the manifest as a Dockerfile');
      console.log('  scrape-runtime images                              List built images');
      console.log('  scrape-runtime run [image]                         Start an instance of an image');
      console.log('  scrape-runtime prune                               Delete blobs no cached layer uses');
      console.log('  scrape-runtime log [--build <id>] [--step <name>] [--limit <n>]');
      return args.command === undefined ? 0 : 1;
  }
}

if (isDirectRun) {
  try {
    process.exitCode = await main(parseArgs(process.argv.slice(2)));
  } catch (err) {
    console.error(`Error: ${(err as Error).message}`);
    process.exit(1);
  }
}
