import { posix } from 'node:path';
import { z } from 'zod';

/** Image-absolute path → path relative to the image root, as stored in layers. */
export function toLayerPath(imagePath: string): string {
  return posix.normalize(imagePath).replace(/^\/+/, '');
}

/** Resolve a path against the image working directory. */
export function resolveImagePath(workdir: string, path: string): string {
  return posix.resolve(workdir, path);
}

export const relativePathSchema = z
  .string()
  .min(1)
  .refine((p) => !p.startsWith('/') && !p.split('/').includes('..'), {
    message: 'must be a relative path inside the build context',
  });

export const commandSchema = z.array(z.string().min(1)).min(1);
