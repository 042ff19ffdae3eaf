import type Database from 'better-sqlite3';

const CREATE_LAYERS = `
CREATE TABLE IF NOT EXISTS layers (
  key TEXT PRIMARY KEY,
  step TEXT NOT NULL,
  kind TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  entries TEXT NOT NULL DEFAULT '[]',
  config TEXT NOT NULL DEFAULT '{}',
  size INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
)`;

const CREATE_IMAGES = `
CREATE TABLE IF NOT EXISTS images (
  id TEXT PRIMARY KEY,
  tag TEXT NOT NULL,
  manifest_id TEXT NOT NULL,
  layers TEXT NOT NULL DEFAULT '[]',
  config TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
)`;

const CREATE_IMAGES_INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_images_tag ON images(tag)`,
];

const CREATE_BUILD_LOG = `
CREATE TABLE IF NOT EXISTS build_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL DEFAULT (datetime('now')),
  build_id TEXT NOT NULL,
  event TEXT NOT NULL,
  step TEXT,
  details TEXT NOT NULL DEFAULT '{}'
)`;

export function createTables(db: Database.Database): void {
  db.exec(CREATE_LAYERS);
  db.exec(CREATE_IMAGES);
  for (const idx of CREATE_IMAGES_INDEXES) {
    db.exec(idx);
  }
  db.exec(CREATE_BUILD_LOG);
}
