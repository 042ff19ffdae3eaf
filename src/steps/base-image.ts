import { z } from 'zod';
import { StepError } from '../build/errors.js';
import type { CommandResult } from '../runner/command.js';
import { commandSchema } from './paths.js';
import { defineStep } from './types.js';

/**
 * An image reference is pinned when it carries a digest, or a tag other
 * than "latest".
 */
export function isPinnedReference(ref: string): boolean {
  if (ref.includes('@sha256:')) return true;
  const lastSlash = ref.lastIndexOf('/');
  const colon = ref.lastIndexOf(':');
  if (colon <= lastSlash) return false;
  const tag = ref.slice(colon + 1);
  return tag !== '' && tag !== 'latest';
}

const schema = z
  .object({
    image: z.string().min(1).refine(isPinnedReference, {
      message: 'must pin a version tag other than "latest" (or a digest)',
    }),
    probe: commandSchema.optional(),
    expect: z.string().min(1).optional(),
  })
  .refine((p) => p.expect === undefined || p.probe !== undefined, {
    message: '"expect" requires a "probe" command',
    path: ['expect'],
  });

export const baseImageStep = defineStep({
  kind: 'base_image',
  schema,
  failure: 'base_image',

  describe: (props) => `base ${props.image}`,

  /** The host runtime must still match the pin, even when the base layer is cached. */
  async verify(props, ctx) {
    if (props.probe) {
      let result: CommandResult;
      try {
        result = await ctx.runner.run(props.probe, { cwd: ctx.stageDir, env: ctx.env, signal: ctx.signal });
      } catch (err) {
        throw new StepError('base_image', `Base runtime for ${props.image} is unavailable: ${(err as Error).message}`);
      }

      const reported = result.stdout.trim();
      if (result.exitCode !== 0) {
        throw new StepError('base_image', `Base runtime probe for ${props.image} exited with code ${result.exitCode}`);
      }
      if (props.expect && !reported.startsWith(props.expect)) {
        throw new StepError(
          'base_image',
          `Base image ${props.image} pins runtime "${props.expect}" but the probe reported "${reported}"`,
        );
      }
    }
  },

  async execute(props) {
    return { entries: [], config: { base: props.image } };
  },

  render: (props) => [`FROM ${props.image}`],
});
