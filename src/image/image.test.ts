import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';
import { getDb } from '../db/db.js';
import { BlobStore } from '../cache/blob-store.js';
import { LayerCache } from '../cache/layer-cache.js';
import { digestOf } from '../cache/digest.js';
import { parseManifest } from '../manifest/parser.js';
import { makeFakeRunner, makeTmpDir } from '../test-utils.js';
import { renderDockerfile } from './dockerfile.js';
import { createInstance, destroyInstance, startInstance } from './runtime.js';
import { ImageStore } from './store.js';
import { applyConfigDelta, EMPTY_CONFIG, type ImageConfig } from './types.js';

const DEFAULT_MANIFEST = readFileSync(fileURLToPath(new URL('../../build.manifest', import.meta.url)), 'utf-8');
const CHECKED_IN_DOCKERFILE = readFileSync(fileURLToPath(new URL('../../Dockerfile', import.meta.url)), 'utf-8');

const CONFIG: ImageConfig = {
  base: 'node:20-slim',
  workdir: '/app',
  env: { MODE: 'test' },
  entrypoint: ['node', 'server.js'],
};

describe('renderDockerfile', () => {
  it('renders the default manifest as the checked-in Dockerfile', () => {
    expect(renderDockerfile(parseManifest(DEFAULT_MANIFEST))).toBe(CHECKED_IN_DOCKERFILE);
  });

  it('renders instructions in step order', () => {
    const lines = renderDockerfile(parseManifest(DEFAULT_MANIFEST)).trimEnd().split('\n');
    expect(lines[0]).toBe('# Headless Chromium scraping service');
    expect(lines[1]).toBe('FROM node:20-bookworm-slim');
    expect(lines.slice(3, 6)).toEqual(['WORKDIR /app', 'COPY package.json .', 'RUN npm install --no-audit --no-fund']);
    expect(lines[lines.length - 1]).toBe('CMD ["node", "dist/src/index.js"]');
  });

  it('leaves out the browser install when disabled', () => {
    const text = renderDockerfile(parseManifest(DEFAULT_MANIFEST), { installBrowser: false });
    expect(text).not.toContain('playwright-core');
    expect(text).not.toContain('PLAYWRIGHT_BROWSERS_PATH');
    expect(text.trimEnd().split('\n')).toHaveLength(9);
  });
});

describe('applyConfigDelta', () => {
  it('merges env and replaces the other fields', () => {
    const config = applyConfigDelta(
      applyConfigDelta(EMPTY_CONFIG, { base: 'node:20-slim', workdir: '/app', env: { A: '1' } }),
      { env: { B: '2' }, entrypoint: ['node'] },
    );
    expect(config).toEqual({ base: 'node:20-slim', workdir: '/app', env: { A: '1', B: '2' }, entrypoint: ['node'] });
  });
});

describe('Image store and instances', () => {
  let tmpDir: string;
  let db: Database.Database;
  let blobs: BlobStore;
  let layers: LayerCache;
  let images: ImageStore;

  beforeEach(() => {
    tmpDir = makeTmpDir();
    db = getDb(join(tmpDir, 'test.db'));
    blobs = new BlobStore(join(tmpDir, 'blobs'));
    layers = new LayerCache(db);
    images = new ImageStore(db);
  });

  afterEach(() => {
    db.close();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function saveImage(tag = 'demo') {
    const digest = blobs.put('console.log("hi");\n');
    const key = digestOf({ layer: 'app' });
    layers.commit([
      {
        key,
        step: 'sources',
        kind: 'copy',
        description: 'copy .',
        entries: [
          { path: 'app', type: 'dir', mode: 0o755 },
          { path: 'app/server.js', type: 'file', digest, mode: 0o644, size: 19 },
          { path: 'app/current', type: 'symlink', target: 'server.js' },
        ],
        config: {},
        size: 19,
      },
    ]);
    return images.save({ id: digestOf({ layers: [key], config: CONFIG, tag }), tag, manifestId: 'build', layers: [key], config: CONFIG });
  }

  it('finds images by id, tag and id prefix', () => {
    const image = saveImage();
    expect(images.get(image.id)?.tag).toBe('demo');
    expect(images.get('demo')?.id).toBe(image.id);
    expect(images.get(image.id.slice(0, 8))?.id).toBe(image.id);
    expect(images.get(image.id.slice(0, 4))).toBeNull();
    expect(images.get('missing')).toBeNull();
    expect(images.list()).toHaveLength(1);
  });

  it('saving the same image twice keeps one record', () => {
    saveImage();
    saveImage();
    expect(images.list()).toHaveLength(1);
    expect(images.list()[0].config).toEqual(CONFIG);
  });

  it('materializes the image into a private directory', () => {
    const instance = createInstance(saveImage(), { layers, blobs }, tmpDir);

    expect(readFileSync(join(instance.root, 'app', 'server.js'), 'utf-8')).toBe('console.log("hi");\n');
    expect(readFileSync(join(instance.root, 'app', 'current'), 'utf-8')).toBe('console.log("hi");\n');
    destroyInstance(instance);
    expect(existsSync(instance.root)).toBe(false);
  });

  it('two instances of one image do not see each other\'s writes', () => {
    const image = saveImage();
    const first = createInstance(image, { layers, blobs }, tmpDir);
    const second = createInstance(image, { layers, blobs }, tmpDir);

    writeFileSync(join(first.root, 'app', 'server.js'), 'tampered');
    writeFileSync(join(first.root, 'app', 'scratch.txt'), 'x');

    expect(first.root).not.toBe(second.root);
    expect(readFileSync(join(second.root, 'app', 'server.js'), 'utf-8')).toBe('console.log("hi");\n');
    expect(existsSync(join(second.root, 'app', 'scratch.txt'))).toBe(false);
  });

  it('starts exactly the declared entry point with no arguments', async () => {
    const instance = createInstance(saveImage(), { layers, blobs }, tmpDir);
    const runner = makeFakeRunner(undefined, 3);

    const code = await startInstance(instance, runner);

    expect(code).toBe(3);
    expect(runner.starts).toEqual([
      { command: ['node', 'server.js'], cwd: join(instance.root, 'app'), env: { MODE: 'test' } },
    ]);
    expect(runner.calls).toHaveLength(0);
  });

  it('fails to create an instance when a layer is missing', () => {
    const image = images.save({ id: 'f'.repeat(64), tag: 'broken', manifestId: 'build', layers: ['a'.repeat(64)], config: CONFIG });
    expect(() => createInstance(image, { layers, blobs }, tmpDir)).toThrow(
      `Image ffffffffffff references missing layer aaaaaaaaaaaa`,
    );
  });
});
