export type LayerEntry =
  | { path: string; type: 'file'; digest: string; mode: number; size: number }
  | { path: string; type: 'symlink'; target: string }
  | { path: string; type: 'dir'; mode: number }
  | { path: string; type: 'whiteout' };

/**
 * Changes a layer makes to the image configuration.
 * `env` entries are merged; the other fields replace.
 */
export interface ConfigDelta {
  base?: string;
  workdir?: string;
  env?: Record<string, string>;
  entrypoint?: string[];
}

export interface Layer {
  key: string;
  step: string;
  kind: string;
  description: string;
  entries: LayerEntry[];
  config: ConfigDelta;
  size: number;
}

export interface LayerSummary {
  key: string;
  step: string;
  kind: string;
  size: number;
  createdAt: string;
}
