import { z } from 'zod';
import { shellJoin } from '../runner/command.js';
import { runCaptured } from './capture.js';
import { commandSchema } from './paths.js';
import { defineStep } from './types.js';

const schema = z.object({
  command: commandSchema,
});

export const runStep = defineStep({
  kind: 'run',
  schema,
  failure: 'command',

  describe: (props) => `run ${shellJoin(props.command)}`,

  async execute(props, ctx) {
    return { entries: await runCaptured(ctx, props.command, 'command') };
  },

  render: (props) => [`RUN ${shellJoin(props.command)}`],
});
