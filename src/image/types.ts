import type { ConfigDelta } from '../cache/types.js';

export interface ImageConfig {
  base: string;
  workdir: string;
  env: Record<string, string>;
  entrypoint: string[];
}

export interface ImageRecord {
  id: string;
  tag: string;
  manifestId: string;
  /** Layer keys, base first. */
  layers: string[];
  config: ImageConfig;
  createdAt: string;
}

export const EMPTY_CONFIG: ImageConfig = { base: '', workdir: '/', env: {}, entrypoint: [] };

/** Fold a layer's config delta into the accumulated image config. */
export function applyConfigDelta(config: ImageConfig, delta: ConfigDelta): ImageConfig {
  return {
    base: delta.base ?? config.base,
    workdir: delta.workdir ?? config.workdir,
    env: { ...config.env, ...delta.env },
    entrypoint: delta.entrypoint ? [...delta.entrypoint] : config.entrypoint,
  };
}
