import type Database from 'better-sqlite3';

export type BuildEvent =
  | 'build_started'
  | 'step_executed'
  | 'step_cached'
  | 'step_skipped'
  | 'build_failed'
  | 'build_aborted'
  | 'build_completed';

export interface BuildLogEntry {
  id: number;
  timestamp: string;
  buildId: string;
  event: BuildEvent;
  step: string | null;
  details: Record<string, unknown>;
}

export interface BuildLogFilters {
  buildId?: string;
  after?: string;
  before?: string;
  event?: BuildEvent;
  step?: string;
  limit?: number;
}

interface BuildLogRow {
  id: number;
  timestamp: string;
  build_id: string;
  event: BuildEvent;
  step: string | null;
  details: string;
}

export class BuildLog {
  constructor(private db: Database.Database) {}

  private insert(buildId: string, event: BuildEvent, step: string | null, details: Record<string, unknown>): void {
    this.db
      .prepare(`INSERT INTO build_log (timestamp, build_id, event, step, details) VALUES (?, ?, ?, ?, ?)`)
      .run(new Date().toISOString(), buildId, event, step, JSON.stringify(details));
  }

  logBuildStarted(buildId: string, manifestId: string, steps: number): void {
    this.insert(buildId, 'build_started', null, { manifestId, steps });
  }

  logStepExecuted(buildId: string, step: string, kind: string, layerKey: string, durationMs: number): void {
    this.insert(buildId, 'step_executed', step, { kind, layerKey, durationMs });
  }

  logStepCached(buildId: string, step: string, kind: string, layerKey: string): void {
    this.insert(buildId, 'step_cached', step, { kind, layerKey });
  }

  logStepSkipped(buildId: string, step: string, kind: string, reason: string): void {
    this.insert(buildId, 'step_skipped', step, { kind, reason });
  }

  logBuildFailed(buildId: string, step: string, category: string, message: string): void {
    this.insert(buildId, 'build_failed', step, { category, message });
  }

  logBuildAborted(buildId: string, step: string): void {
    this.insert(buildId, 'build_aborted', step, {});
  }

  logBuildCompleted(buildId: string, imageId: string, tag: string, executed: number, cached: number): void {
    this.insert(buildId, 'build_completed', null, { imageId, tag, executed, cached });
  }

  getEntries(filters?: BuildLogFilters): BuildLogEntry[] {
    let query = 'SELECT * FROM build_log WHERE 1=1';
    const params: unknown[] = [];

    if (filters?.buildId) {
      query += ' AND build_id = ?';
      params.push(filters.buildId);
    }

    if (filters?.after) {
      query += ' AND timestamp >= ?';
      params.push(filters.after);
    }

    if (filters?.before) {
      query += ' AND timestamp <= ?';
      params.push(filters.before);
    }

    if (filters?.event) {
      query += ' AND event = ?';
      params.push(filters.event);
    }

    if (filters?.step) {
      query += ' AND step = ?';
      params.push(filters.step);
    }

    query += ' ORDER BY id ASC';

    if (filters?.limit) {
      query += ' LIMIT ?';
      params.push(filters.limit);
    }

    const rows = this.db.prepare<unknown[], BuildLogRow>(query).all(...params);

    return rows.map((row) => ({
      id: row.id,
      timestamp: row.timestamp,
      buildId: row.build_id,
      event: row.event,
      step: row.step,
      details: parseDetails(row.details),
    }));
  }
}

function parseDetails(json: string): Record<string, unknown> {
  const parsed: Record<string, unknown> = JSON.parse(json);
  return parsed;
}
