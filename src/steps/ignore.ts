import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

interface Rule {
  regex: RegExp;
  negate: boolean;
}

function globToRegex(pattern: string): RegExp {
  let out = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '*') {
      if (pattern[i + 1] === '*') {
        out += '.*';
        i++;
        if (pattern[i + 1] === '/') i++;
      } else {
        out += '[^/]*';
      }
    } else if (ch === '?') {
      out += '[^/]';
    } else {
      out += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${out}$`);
}

/**
 * .dockerignore-style matcher over context-relative posix paths.
 * A pattern matching a directory excludes everything below it; the last
 * matching rule wins, and `!pattern` re-includes.
 */
export class IgnoreMatcher {
  private readonly rules: Rule[];

  constructor(patterns: string[]) {
    this.rules = patterns
      .map((p) => p.trim())
      .filter((p) => p && !p.startsWith('#'))
      .map((p) => {
        const negate = p.startsWith('!');
        const body = (negate ? p.slice(1) : p).replace(/^\/+/, '').replace(/\/+$/, '');
        return { regex: globToRegex(body), negate };
      })
      .filter((rule) => rule.regex.source !== '^$');
  }

  get hasNegations(): boolean {
    return this.rules.some((r) => r.negate);
  }

  ignores(path: string): boolean {
    const segments = path.split('/');
    let ignored = false;
    for (const rule of this.rules) {
      for (let i = 1; i <= segments.length; i++) {
        if (rule.regex.test(segments.slice(0, i).join('/'))) {
          ignored = !rule.negate;
          break;
        }
      }
    }
    return ignored;
  }

  /**
   * Whether a whole directory can be skipped without looking inside it.
   */
  prunes(dirPath: string): boolean {
    return !this.hasNegations && this.ignores(dirPath);
  }
}

export function readIgnoreFile(contextDir: string, name = '.dockerignore'): string[] {
  const path = join(contextDir, name);
  if (!existsSync(path)) return [];
  return readFileSync(path, 'utf-8').split('\n');
}
