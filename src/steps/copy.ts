import { existsSync, lstatSync, mkdirSync, readdirSync, readFileSync, readlinkSync, symlinkSync, copyFileSync, chmodSync, rmSync } from 'node:fs';
import { dirname, join, posix } from 'node:path';
import { z } from 'zod';
import { sha256 } from '../cache/digest.js';
import { resolveInRoot } from '../cache/materialize.js';
import type { LayerEntry } from '../cache/types.js';
import { StepError } from '../build/errors.js';
import { IgnoreMatcher } from './ignore.js';
import { relativePathSchema, resolveImagePath, toLayerPath } from './paths.js';
import { defineStep, type StepContext } from './types.js';

export const copySchema = z.object({
  from: z.array(relativePathSchema).min(1),
  to: z.string().min(1).default('.'),
  exclude: z.array(z.string()).default([]),
});

export type CopyProps = z.infer<typeof copySchema>;

interface PlannedFile {
  source: string;
  /** Destination, relative to the image root. */
  dest: string;
  kind: 'file' | 'symlink';
  mode: number;
}

function normalizeSource(path: string): string {
  const normalized = posix.normalize(path).replace(/\/+$/, '');
  return normalized === '' ? '.' : normalized;
}

/**
 * Where `from` entries land, following COPY rules: a directory's contents
 * go under the destination; a single file copied to a path not ending in
 * "/" (and not ".") takes that exact name.
 */
export function planCopy(props: CopyProps, ctx: StepContext): PlannedFile[] {
  const matcher = new IgnoreMatcher([...ctx.ignore, ...props.exclude]);
  const destBase = resolveImagePath(ctx.workdir, props.to);
  const intoDirectory = props.to === '.' || props.to.endsWith('/') || props.from.length > 1;
  const planned: PlannedFile[] = [];

  for (const rawSource of props.from) {
    const source = normalizeSource(rawSource);
    const absolute = source === '.' ? ctx.contextDir : join(ctx.contextDir, source);

    if (!existsSync(absolute)) {
      throw new StepError('missing_input', `Copy source "${rawSource}" not found in build context`);
    }
    if (source !== '.' && matcher.ignores(source)) {
      throw new StepError('missing_input', `Copy source "${rawSource}" is excluded by an ignore pattern`);
    }

    const stat = lstatSync(absolute);
    if (stat.isDirectory()) {
      collect(ctx.contextDir, source === '.' ? '' : source, '', destBase, matcher, planned);
    } else {
      const dest = intoDirectory ? posix.join(destBase, posix.basename(source)) : destBase;
      planned.push({
        source: absolute,
        dest: toLayerPath(dest),
        kind: stat.isSymbolicLink() ? 'symlink' : 'file',
        mode: stat.mode & 0o777,
      });
    }
  }

  return planned.sort((a, b) => (a.dest < b.dest ? -1 : a.dest > b.dest ? 1 : 0));
}

function collect(
  contextDir: string,
  dirRel: string,
  innerRel: string,
  destBase: string,
  matcher: IgnoreMatcher,
  out: PlannedFile[],
): void {
  const dirAbs = join(contextDir, dirRel, innerRel);
  for (const name of readdirSync(dirAbs).sort()) {
    const inner = innerRel ? `${innerRel}/${name}` : name;
    const contextRel = dirRel ? `${dirRel}/${inner}` : inner;
    const absolute = join(dirAbs, name);
    const stat = lstatSync(absolute);

    if (stat.isDirectory()) {
      if (matcher.prunes(contextRel)) continue;
      collect(contextDir, dirRel, inner, destBase, matcher, out);
      continue;
    }
    if (matcher.ignores(contextRel)) continue;
    if (!stat.isFile() && !stat.isSymbolicLink()) continue;

    out.push({
      source: absolute,
      dest: toLayerPath(posix.join(destBase, inner)),
      kind: stat.isSymbolicLink() ? 'symlink' : 'file',
      mode: stat.mode & 0o777,
    });
  }
}

function fingerprint(file: PlannedFile): string {
  const content = file.kind === 'symlink' ? `link:${readlinkSync(file.source)}` : sha256(readFileSync(file.source));
  return `${file.dest}\0${file.kind}\0${file.mode.toString(8)}\0${content}`;
}

export const copyStep = defineStep({
  kind: 'copy',
  schema: copySchema,
  failure: 'missing_input',

  describe: (props) => `copy ${props.from.join(', ')} -> ${props.to}`,

  inputs: (props, ctx) => planCopy(props, ctx).map(fingerprint),

  async execute(props, ctx) {
    const entries: LayerEntry[] = [];

    for (const file of planCopy(props, ctx)) {
      const target = resolveInRoot(ctx.stageDir, file.dest);
      mkdirSync(dirname(target), { recursive: true });
      rmSync(target, { recursive: true, force: true });

      if (file.kind === 'symlink') {
        const linkTarget = readlinkSync(file.source);
        symlinkSync(linkTarget, target);
        entries.push({ path: file.dest, type: 'symlink', target: linkTarget });
      } else {
        const digest = ctx.blobs.putFile(file.source);
        copyFileSync(file.source, target);
        chmodSync(target, file.mode);
        entries.push({ path: file.dest, type: 'file', digest, mode: file.mode, size: lstatSync(file.source).size });
      }
    }

    return { entries };
  },

  render: (props) => [`COPY ${props.from.join(' ')} ${props.to}`],
});
