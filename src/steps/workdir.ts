import { mkdirSync } from 'node:fs';
import { posix } from 'node:path';
import { z } from 'zod';
import { resolveInRoot } from '../cache/materialize.js';
import type { LayerEntry } from '../cache/types.js';
import { toLayerPath } from './paths.js';
import { defineStep } from './types.js';

const schema = z.object({
  path: z.string().startsWith('/', 'must be an absolute path'),
});

export const workdirStep = defineStep({
  kind: 'workdir',
  schema,
  failure: 'command',

  describe: (props) => `workdir ${props.path}`,

  async execute(props, ctx) {
    const path = posix.normalize(props.path);
    const entries: LayerEntry[] = [];
    const layerPath = toLayerPath(path);

    if (layerPath) {
      mkdirSync(resolveInRoot(ctx.stageDir, layerPath), { recursive: true });
      entries.push({ path: layerPath, type: 'dir', mode: 0o755 });
    }

    return { entries, config: { workdir: path } };
  },

  render: (props) => [`WORKDIR ${props.path}`],
});
