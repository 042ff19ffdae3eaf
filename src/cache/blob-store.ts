import { copyFileSync, chmodSync, existsSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { sha256 } from './digest.js';

const DIGEST_RE = /^[a-f0-9]{64}$/;

/**
 * Content-addressed file store: blobs/sha256/<first two hex chars>/<digest>.
 */
export class BlobStore {
  private readonly base: string;

  constructor(root: string) {
    this.base = join(root, 'sha256');
    mkdirSync(this.base, { recursive: true });
  }

  pathFor(digest: string): string {
    if (!DIGEST_RE.test(digest)) {
      throw new Error(`Invalid blob digest: "${digest}"`);
    }
    return join(this.base, digest.slice(0, 2), digest);
  }

  has(digest: string): boolean {
    return existsSync(this.pathFor(digest));
  }

  put(data: string | Buffer): string {
    const digest = sha256(data);
    const target = this.pathFor(digest);
    if (existsSync(target)) return digest;

    mkdirSync(dirname(target), { recursive: true });
    // Write-then-rename so a reader never sees a half-written blob
    const tmp = `${target}.${randomUUID()}.tmp`;
    writeFileSync(tmp, data);
    renameSync(tmp, target);
    return digest;
  }

  putFile(path: string): string {
    return this.put(readFileSync(path));
  }

  read(digest: string): Buffer {
    const path = this.pathFor(digest);
    if (!existsSync(path)) {
      throw new Error(`Blob not found: ${digest}`);
    }
    return readFileSync(path);
  }

  copyTo(digest: string, dest: string, mode?: number): void {
    const path = this.pathFor(digest);
    if (!existsSync(path)) {
      throw new Error(`Blob not found: ${digest}`);
    }
    mkdirSync(dirname(dest), { recursive: true });
    copyFileSync(path, dest);
    if (mode !== undefined) chmodSync(dest, mode);
  }

  list(): string[] {
    const digests: string[] = [];
    for (const prefix of readdirSync(this.base)) {
      for (const name of readdirSync(join(this.base, prefix))) {
        if (DIGEST_RE.test(name)) digests.push(name);
      }
    }
    return digests.sort();
  }

  /**
   * Delete every blob not in `keep`. Returns the removed digests.
   */
  prune(keep: Set<string>): string[] {
    const removed: string[] = [];
    for (const digest of this.list()) {
      if (!keep.has(digest)) {
        rmSync(this.pathFor(digest), { force: true });
        removed.push(digest);
      }
    }
    return removed;
  }
}
