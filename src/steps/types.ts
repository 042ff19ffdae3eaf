import type { z } from 'zod';
import type { BlobStore } from '../cache/blob-store.js';
import type { ConfigDelta, LayerEntry } from '../cache/types.js';
import type { FailureCategory } from '../build/errors.js';
import type { CommandRunner } from '../runner/command.js';

export interface StepContext {
  /** Build context: the source tree copy steps read from. */
  contextDir: string;
  /** Directory standing in for the image root while the build runs. */
  stageDir: string;
  /** Current working directory inside the image (absolute, posix). */
  workdir: string;
  env: Record<string, string>;
  runner: CommandRunner;
  blobs: BlobStore;
  /** Ignore patterns applied to copy sources on top of each step's own. */
  ignore: string[];
  signal?: AbortSignal;
}

export interface StepOutput {
  entries: LayerEntry[];
  config?: ConfigDelta;
}

export interface StepDefinition<P> {
  kind: string;
  schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  /** Category a failure of this step is reported under. */
  failure: FailureCategory;
  describe(props: P): string;
  /** Digests of inputs outside the manifest text, folded into the layer key. */
  inputs?(props: P, ctx: StepContext): string[];
  /** Checks run on every build, before the cache lookup; a hit does not skip them. */
  verify?(props: P, ctx: StepContext): Promise<void>;
  execute(props: P, ctx: StepContext): Promise<StepOutput>;
  /** Dockerfile instructions for this step. */
  render(props: P): string[];
}

/**
 * A step kind with its property type erased, as held by the registry.
 * Every method re-validates the raw properties against the kind's schema.
 */
export interface Step {
  kind: string;
  failure: FailureCategory;
  validate(props: Record<string, unknown>): string[];
  describe(props: Record<string, unknown>): string;
  inputs(props: Record<string, unknown>, ctx: StepContext): string[];
  verify(props: Record<string, unknown>, ctx: StepContext): Promise<void>;
  execute(props: Record<string, unknown>, ctx: StepContext): Promise<StepOutput>;
  render(props: Record<string, unknown>): string[];
}

export function defineStep<P>(def: StepDefinition<P>): Step {
  const parse = (props: Record<string, unknown>): P => def.schema.parse(props);

  return {
    kind: def.kind,
    failure: def.failure,
    validate(props) {
      const result = def.schema.safeParse(props);
      if (result.success) return [];
      return result.error.issues.map((issue) => {
        const where = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'properties';
        return `${where}: ${issue.message}`;
      });
    },
    describe: (props) => def.describe(parse(props)),
    inputs: (props, ctx) => (def.inputs ? def.inputs(parse(props), ctx) : []),
    verify: async (props, ctx) => {
      if (def.verify) await def.verify(parse(props), ctx);
    },
    execute: (props, ctx) => def.execute(parse(props), ctx),
    render: (props) => def.render(parse(props)),
  };
}
