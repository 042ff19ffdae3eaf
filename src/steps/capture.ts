import { mkdirSync } from 'node:fs';
import { resolveInRoot } from '../cache/materialize.js';
import type { LayerEntry } from '../cache/types.js';
import { snapshotTree, diffToEntries } from '../build/snapshot.js';
import { StepError, type FailureCategory } from '../build/errors.js';
import { CommandFailedError, runChecked } from '../runner/command.js';
import type { StepContext } from './types.js';

/**
 * Run a command in the image working directory and capture what it changed
 * under the stage root as layer entries.
 */
export async function runCaptured(
  ctx: StepContext,
  command: string[],
  category: FailureCategory,
  env: Record<string, string> = {},
): Promise<LayerEntry[]> {
  const cwd = resolveInRoot(ctx.stageDir, ctx.workdir);
  mkdirSync(cwd, { recursive: true });

  const before = snapshotTree(ctx.stageDir);

  try {
    await runChecked(ctx.runner, command, { cwd, env: { ...ctx.env, ...env }, signal: ctx.signal });
  } catch (err) {
    if (err instanceof CommandFailedError) throw new StepError(category, err.message);
    throw new StepError(category, `Could not run "${command.join(' ')}": ${(err as Error).message}`);
  }

  return diffToEntries(ctx.stageDir, before, snapshotTree(ctx.stageDir), ctx.blobs);
}
