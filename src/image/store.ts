import type Database from 'better-sqlite3';
import type { ImageConfig, ImageRecord } from './types.js';

interface ImageRow {
  id: string;
  tag: string;
  manifest_id: string;
  layers: string;
  config: string;
  created_at: string;
}

const MIN_PREFIX = 6;

export class ImageStore {
  constructor(private db: Database.Database) {}

  /**
   * Record a built image. Rebuilding an identical image refreshes its tag
   * and timestamp, making it the latest for that tag.
   */
  save(image: Omit<ImageRecord, 'createdAt'>): ImageRecord {
    const createdAt = new Date().toISOString();
    this.db
      .prepare(`
        INSERT INTO images (id, tag, manifest_id, layers, config, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET tag = excluded.tag, created_at = excluded.created_at
      `)
      .run(image.id, image.tag, image.manifestId, JSON.stringify(image.layers), JSON.stringify(image.config), createdAt);
    return { ...image, createdAt };
  }

  /**
   * Look an image up by full id, by tag (latest wins), or by an unambiguous
   * id prefix of at least six characters.
   */
  get(ref: string): ImageRecord | null {
    const byId = this.db.prepare<[string], ImageRow>('SELECT * FROM images WHERE id = ?').get(ref);
    if (byId) return toImage(byId);

    const byTag = this.db
      .prepare<[string], ImageRow>('SELECT * FROM images WHERE tag = ? ORDER BY created_at DESC, rowid DESC LIMIT 1')
      .get(ref);
    if (byTag) return toImage(byTag);

    if (ref.length >= MIN_PREFIX && /^[a-f0-9]+$/.test(ref)) {
      const matches = this.db
        .prepare<[string], ImageRow>('SELECT * FROM images WHERE id LIKE ? LIMIT 2')
        .all(`${ref}%`);
      if (matches.length === 1) return toImage(matches[0]);
    }

    return null;
  }

  list(): ImageRecord[] {
    return this.db
      .prepare<[], ImageRow>('SELECT * FROM images ORDER BY created_at DESC, rowid DESC')
      .all()
      .map(toImage);
  }
}

function toImage(row: ImageRow): ImageRecord {
  const layers: string[] = JSON.parse(row.layers);
  const config: ImageConfig = JSON.parse(row.config);
  return {
    id: row.id,
    tag: row.tag,
    manifestId: row.manifest_id,
    layers,
    config,
    createdAt: row.created_at,
  };
}
