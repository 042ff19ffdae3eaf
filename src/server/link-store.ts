import { randomUUID } from 'node:crypto';
import type { PageLink } from '../scraper/types.js';

/**
 * Links of recent scrapes, kept in memory for the CSV download.
 * The oldest entry is dropped once `limit` is reached.
 */
export class LinkStore {
  private readonly entries = new Map<string, PageLink[]>();

  constructor(private readonly limit = 50) {}

  save(links: PageLink[]): string {
    const id = randomUUID();
    this.entries.set(id, [...links]);
    while (this.entries.size > this.limit) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return id;
  }

  get(id: string): PageLink[] | undefined {
    return this.entries.get(id);
  }

  get size(): number {
    return this.entries.size;
  }
}
