import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { copyFileSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { runtimeConfigSchema } from './config/schema.js';
import { BlobStore } from './cache/blob-store.js';
import { sha256 } from './cache/digest.js';
import {
  buildImage,
  formatStep,
  listImages,
  loadWorkspace,
  parseArgs,
  pruneCache,
  readBuildLog,
  renderManifest,
  runImage,
  type Workspace,
} from './cli.js';
import type { CommandOptions } from './runner/command.js';
import { makeFakeRunner, makeTmpDir, type FakeHandler } from './test-utils.js';

const MANIFEST_PATH = fileURLToPath(new URL('../build.manifest', import.meta.url));

function writeIn(options: CommandOptions, path: string, content: string): void {
  const target = join(options.cwd, path);
  mkdirSync(join(target, '..'), { recursive: true });
  writeFileSync(target, content);
}

const simulate: FakeHandler = (command, options) => {
  const line = command.join(' ');
  if (line === 'node --version') return { stdout: 'v20.11.1\n' };
  if (line === 'npm run build') writeIn(options, 'dist/src/index.js', 'console.log("up");\n');
  return undefined;
};

describe('CLI arguments', () => {
  it('splits command, positionals and flags', () => {
    const args = parseArgs(['run', '--config', 'alt.yaml', '--limit=3', 'scrape-runtime', '--no-cache']);
    expect(args.command).toBe('run');
    expect(args.positionals).toEqual(['scrape-runtime']);
    expect(Object.fromEntries(args.flags)).toEqual({ config: 'alt.yaml', limit: '3', 'no-cache': true });
  });

  it('never gives a --no- switch a value', () => {
    const args = parseArgs(['--no-browser', 'render']);
    expect(args.command).toBe('render');
    expect(args.flags.get('no-browser')).toBe(true);
  });

  it('formats a step report', () => {
    expect(
      formatStep({ name: 'deps', kind: 'install_deps', status: 'cached', layerKey: 'abcdef0123456789', description: 'npm install' }),
    ).toBe('  [cached  ] deps (install_deps) abcdef012345  npm install');
  });
});

describe('CLI commands', () => {
  let tmpDir: string;
  let ws: Workspace;

  beforeEach(() => {
    tmpDir = makeTmpDir();
    copyFileSync(MANIFEST_PATH, join(tmpDir, 'build.manifest'));
    writeFileSync(join(tmpDir, 'package.json'), '{"name":"demo","scripts":{"build":"tsc"}}');
    mkdirSync(join(tmpDir, 'src'));
    writeFileSync(join(tmpDir, 'src', 'index.ts'), 'console.log("up");\n');
    ws = { cwd: tmpDir, config: runtimeConfigSchema.parse({}) };
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('loads the config file and manifest named by flags', () => {
    writeFileSync(join(tmpDir, 'alt.yaml'), 'build:\n  cache_dir: cache\n  install_browser: false\n');
    const loaded = loadWorkspace(tmpDir, parseArgs(['build', '--config', 'alt.yaml', '--manifest', 'other.manifest']));
    expect(loaded.config.build.cache_dir).toBe('cache');
    expect(loaded.config.build.install_browser).toBe(false);
    expect(loaded.manifestPath).toBe(join(tmpDir, 'other.manifest'));
  });

  it('builds, caches and lists the image', async () => {
    const first = await buildImage(ws, { runner: makeFakeRunner(simulate) });
    expect(first.steps.every((s) => s.status === 'executed')).toBe(true);

    const runner = makeFakeRunner(simulate);
    const second = await buildImage(ws, { runner });
    expect(second.steps.every((s) => s.status === 'cached')).toBe(true);
    expect(runner.calls.map((c) => c.command)).toEqual([['node', '--version']]);
    expect(second.image.id).toBe(first.image.id);

    const images = listImages(ws);
    expect(images).toHaveLength(1);
    expect(images[0].tag).toBe('scrape-runtime');

    const completed = readBuildLog(ws, { event: 'build_completed' });
    expect(completed).toHaveLength(2);
    expect(completed[1].details).toMatchObject({ imageId: first.image.id, executed: 0, cached: 9 });
  });

  it('skips the browser step when the config disables it', async () => {
    ws.config.build.install_browser = false;
    const result = await buildImage(ws, { runner: makeFakeRunner(simulate) });
    expect(result.steps.find((s) => s.name === 'browser')?.status).toBe('skipped');
    expect(result.image.config.env).toEqual({});
  });

  it('renders the manifest with or without the browser step', () => {
    expect(renderManifest(ws)).toContain('RUN npx playwright-core install chromium\n');
    const without = renderManifest(ws, false);
    expect(without).not.toContain('playwright-core');
    expect(without.endsWith('CMD ["node", "dist/src/index.js"]\n')).toBe(true);
  });

  it('runs the entry point of an image by tag in a throwaway directory', async () => {
    await buildImage(ws, { runner: makeFakeRunner(simulate) });
    const runner = makeFakeRunner(simulate, 3);

    const exitCode = await runImage(ws, 'scrape-runtime', { runner, env: { PORT: '8080' } });

    expect(exitCode).toBe(3);
    expect(runner.starts).toHaveLength(1);
    expect(runner.starts[0].command).toEqual(['node', 'dist/src/index.js']);
    expect(runner.starts[0].cwd.startsWith(join(tmpDir, '.provision', 'instances'))).toBe(true);
    expect(runner.starts[0].env).toEqual({ PLAYWRIGHT_BROWSERS_PATH: '0', PORT: '8080' });
    expect(readdirSync(join(tmpDir, '.provision', 'instances'))).toEqual([]);
  });

  it('refuses to run an unknown image', async () => {
    await expect(runImage(ws, 'nope', { runner: makeFakeRunner() })).rejects.toThrow('No image matches "nope"');
  });

  it('prunes blobs no layer references', async () => {
    await buildImage(ws, { runner: makeFakeRunner(simulate) });
    const stray = new BlobStore(join(tmpDir, '.provision', 'blobs')).put('stray bytes');

    expect(pruneCache(ws)).toEqual([stray]);
    expect(stray).toBe(sha256('stray bytes'));
    expect(pruneCache(ws)).toEqual([]);
  });
});
