import type Database from 'better-sqlite3';
import type { ConfigDelta, Layer, LayerEntry, LayerSummary } from './types.js';

interface LayerRow {
  key: string;
  step: string;
  kind: string;
  description: string;
  entries: string;
  config: string;
  size: number;
  created_at: string;
}

/**
 * Layer cache keyed by content-derived layer keys. The build engine digests
 * into a key the step definition, its inputs, the keys it needs and the
 * workdir and env it runs with.
 */
export class LayerCache {
  constructor(private db: Database.Database) {}

  get(key: string): Layer | null {
    const row = this.db.prepare<[string], LayerRow>('SELECT * FROM layers WHERE key = ?').get(key);
    return row ? toLayer(row) : null;
  }

  has(key: string): boolean {
    return this.db.prepare<[string], { key: string }>('SELECT key FROM layers WHERE key = ?').get(key) !== undefined;
  }

  /**
   * Insert all layers of a finished build in one transaction.
   * Layers already present are left untouched.
   */
  commit(layers: Layer[]): void {
    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO layers (key, step, kind, description, entries, config, size, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const insertMany = this.db.transaction((rows: Layer[]) => {
      const now = new Date().toISOString();
      for (const layer of rows) {
        insert.run(
          layer.key,
          layer.step,
          layer.kind,
          layer.description,
          JSON.stringify(layer.entries),
          JSON.stringify(layer.config),
          layer.size,
          now,
        );
      }
    });

    insertMany(layers);
  }

  list(): LayerSummary[] {
    const rows = this.db
      .prepare<[], LayerRow>('SELECT * FROM layers ORDER BY created_at ASC, step ASC')
      .all();
    return rows.map((row) => ({
      key: row.key,
      step: row.step,
      kind: row.kind,
      size: row.size,
      createdAt: row.created_at,
    }));
  }

  /**
   * Every blob digest some cached layer points at.
   */
  referencedDigests(): Set<string> {
    const digests = new Set<string>();
    const rows = this.db.prepare<[], { entries: string }>('SELECT entries FROM layers').all();
    for (const row of rows) {
      for (const entry of parseEntries(row.entries)) {
        if (entry.type === 'file') digests.add(entry.digest);
      }
    }
    return digests;
  }
}

function toLayer(row: LayerRow): Layer {
  return {
    key: row.key,
    step: row.step,
    kind: row.kind,
    description: row.description,
    entries: parseEntries(row.entries),
    config: parseConfigDelta(row.config),
    size: row.size,
  };
}

function parseEntries(json: string): LayerEntry[] {
  const parsed: LayerEntry[] = JSON.parse(json);
  return parsed;
}

function parseConfigDelta(json: string): ConfigDelta {
  const parsed: ConfigDelta = JSON.parse(json);
  return parsed;
}
