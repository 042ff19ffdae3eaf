import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { existsSync, lstatSync, mkdirSync, readFileSync, readlinkSync, rmSync, statSync, writeFileSync } from 'node:fs';
import type Database from 'better-sqlite3';
import { getDb } from '../db/db.js';
import { makeTmpDir } from '../test-utils.js';
import { BlobStore } from './blob-store.js';
import { digestOf, sha256, stableStringify } from './digest.js';
import { LayerCache } from './layer-cache.js';
import { applyLayer, resolveInRoot } from './materialize.js';
import type { Layer } from './types.js';

describe('digest', () => {
  it('stableStringify sorts keys at every level', () => {
    expect(stableStringify({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"y":2,"z":1}]},"b":1}',
    );
  });

  it('digestOf ignores key order', () => {
    expect(digestOf({ kind: 'copy', from: ['.'] })).toBe(digestOf({ from: ['.'], kind: 'copy' }));
    expect(digestOf({ kind: 'copy' })).not.toBe(digestOf({ kind: 'run' }));
  });

  it('sha256 is hex', () => {
    expect(sha256('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});

describe('BlobStore', () => {
  let tmpDir: string;
  let blobs: BlobStore;

  beforeEach(() => {
    tmpDir = makeTmpDir();
    blobs = new BlobStore(join(tmpDir, 'blobs'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('stores content under its digest', () => {
    const digest = blobs.put('hello');
    expect(digest).toBe(sha256('hello'));
    expect(blobs.pathFor(digest)).toBe(join(tmpDir, 'blobs', 'sha256', digest.slice(0, 2), digest));
    expect(blobs.has(digest)).toBe(true);
    expect(blobs.read(digest).toString('utf-8')).toBe('hello');
    expect(blobs.put('hello')).toBe(digest);
    expect(blobs.list()).toEqual([digest]);
  });

  it('rejects malformed digests', () => {
    expect(() => blobs.pathFor('../../etc/passwd')).toThrow('Invalid blob digest');
  });

  it('copies a blob out with a mode', () => {
    const digest = blobs.put('#!/bin/sh\n');
    const dest = join(tmpDir, 'out', 'run.sh');
    blobs.copyTo(digest, dest, 0o755);
    expect(readFileSync(dest, 'utf-8')).toBe('#!/bin/sh\n');
    expect(statSync(dest).mode & 0o777).toBe(0o755);
  });

  it('prune removes only unreferenced blobs', () => {
    const keep = blobs.put('keep');
    const drop = blobs.put('drop');
    expect(blobs.prune(new Set([keep]))).toEqual([drop]);
    expect(blobs.list()).toEqual([keep]);
  });
});

describe('LayerCache', () => {
  let tmpDir: string;
  let db: Database.Database;
  let cache: LayerCache;

  const layer = (key: string, digest: string): Layer => ({
    key,
    step: 'deps',
    kind: 'install_deps',
    description: 'install dependencies from package.json',
    entries: [{ path: 'app/node_modules/x.js', type: 'file', digest, mode: 0o644, size: 1 }],
    config: { env: { A: '1' } },
    size: 1,
  });

  beforeEach(() => {
    tmpDir = makeTmpDir();
    db = getDb(join(tmpDir, 'test.db'));
    cache = new LayerCache(db);
  });

  afterEach(() => {
    db.close();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('commits layers and reads them back', () => {
    cache.commit([layer('k1', 'a'.repeat(64)), layer('k2', 'b'.repeat(64))]);

    expect(cache.has('k1')).toBe(true);
    expect(cache.has('k3')).toBe(false);
    expect(cache.get('k1')).toEqual(layer('k1', 'a'.repeat(64)));
    expect(cache.get('k3')).toBeNull();
    expect(cache.list().map((l) => l.key).sort()).toEqual(['k1', 'k2']);
    expect(cache.referencedDigests()).toEqual(new Set(['a'.repeat(64), 'b'.repeat(64)]));
  });

  it('never overwrites an existing layer', () => {
    cache.commit([layer('k1', 'a'.repeat(64))]);
    cache.commit([layer('k1', 'c'.repeat(64))]);
    expect(cache.get('k1')?.entries).toEqual(layer('k1', 'a'.repeat(64)).entries);
  });
});

describe('applyLayer', () => {
  let tmpDir: string;
  let root: string;
  let blobs: BlobStore;

  beforeEach(() => {
    tmpDir = makeTmpDir();
    root = join(tmpDir, 'root');
    mkdirSync(join(root, 'app', 'old'), { recursive: true });
    writeFileSync(join(root, 'app', 'old', 'file.txt'), 'old');
    writeFileSync(join(root, 'app', 'index.js'), 'v1');
    blobs = new BlobStore(join(tmpDir, 'blobs'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes files, links and directories and applies whiteouts', () => {
    const digest = blobs.put('v2');
    applyLayer(
      {
        key: 'k',
        step: 's',
        kind: 'run',
        description: '',
        entries: [
          { path: 'app/cache', type: 'dir', mode: 0o700 },
          { path: 'app/index.js', type: 'file', digest, mode: 0o644, size: 2 },
          { path: 'app/main.js', type: 'symlink', target: 'index.js' },
          { path: 'app/old', type: 'whiteout' },
        ],
        config: {},
        size: 2,
      },
      root,
      blobs,
    );

    expect(lstatSync(join(root, 'app', 'cache')).isDirectory()).toBe(true);
    expect(readFileSync(join(root, 'app', 'index.js'), 'utf-8')).toBe('v2');
    expect(readlinkSync(join(root, 'app', 'main.js'))).toBe('index.js');
    expect(existsSync(join(root, 'app', 'old'))).toBe(false);
  });

  it('refuses paths outside the root', () => {
    expect(() => resolveInRoot(root, '../escape')).toThrow('Layer path escapes image root: "../escape"');
    expect(resolveInRoot(root, '/app/x')).toBe(join(root, 'app', 'x'));
  });
});
