import { z } from 'zod';
import { commandSchema } from './paths.js';
import { defineStep } from './types.js';

const schema = z.object({
  command: commandSchema,
});

export const entrypointStep = defineStep({
  kind: 'entrypoint',
  schema,
  failure: 'command',

  describe: (props) => `entrypoint ${props.command.join(' ')}`,

  async execute(props) {
    return { entries: [], config: { entrypoint: [...props.command] } };
  },

  render: (props) => [`CMD [${props.command.map((arg) => JSON.stringify(arg)).join(', ')}]`],
});
