import { ManifestError } from '../build/errors.js';
import type { Manifest, StepDecl } from './types.js';

/**
 * Parse a property value from the manifest DSL.
 * Supports: quoted strings, numbers, booleans, arrays.
 */
function parsePropertyValue(raw: string): unknown {
  const trimmed = raw.trim();

  // Quoted string
  if ((trimmed.startsWith('"') && trimmed.endsWith('"')) || (trimmed.startsWith("'") && trimmed.endsWith("'"))) {
    return trimmed.slice(1, -1);
  }

  // Boolean
  if (trimmed === 'true') return true;
  if (trimmed === 'false') return false;

  // Number
  const num = Number(trimmed);
  if (!isNaN(num) && trimmed !== '') return num;

  // Array (JSON-like)
  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    try {
      return JSON.parse(trimmed);
    } catch {
      // Fall back to a simple array of (optionally single-quoted) strings
      const inner = trimmed.slice(1, -1).trim();
      if (!inner) return [];
      return inner.split(',').map((s) => {
        const v = s.trim();
        if ((v.startsWith('"') && v.endsWith('"')) || (v.startsWith("'") && v.endsWith("'"))) {
          return v.slice(1, -1);
        }
        return v;
      });
    }
  }

  return trimmed;
}

/**
 * Parse the properties block: `{ key: value, key2: value2 }`.
 * Commas inside quotes or brackets do not split pairs.
 */
function parseProperties(propsStr: string): Record<string, unknown> {
  const props: Record<string, unknown> = {};
  const content = propsStr.trim();

  if (!content) return props;

  const pairs: string[] = [];
  let current = '';
  let depth = 0;
  let inQuote = false;
  let quoteChar = '';

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];

    if (inQuote) {
      current += ch;
      if (ch === quoteChar && content[i - 1] !== '\\') {
        inQuote = false;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      inQuote = true;
      quoteChar = ch;
      current += ch;
      continue;
    }

    if (ch === '[') depth++;
    if (ch === ']') depth--;

    if (ch === ',' && depth === 0) {
      pairs.push(current.trim());
      current = '';
      continue;
    }

    current += ch;
  }

  if (current.trim()) {
    pairs.push(current.trim());
  }

  for (const pair of pairs) {
    const colonIndex = pair.indexOf(':');
    if (colonIndex === -1) continue;

    const key = pair.slice(0, colonIndex).trim();
    const value = pair.slice(colonIndex + 1).trim();
    props[key] = parsePropertyValue(value);
  }

  return props;
}

function unquote(raw: string): string {
  return raw.trim().replace(/^["']|["']$/g, '');
}

function extractNeeds(name: string, props: Record<string, unknown>): string[] {
  const { needs } = props;
  delete props.needs;

  if (needs === undefined) return [];
  if (typeof needs === 'string') return [needs];
  if (Array.isArray(needs) && needs.every((n): n is string => typeof n === 'string')) {
    return needs;
  }
  throw new ManifestError(`Step "${name}": "needs" must be a step name or an array of step names`);
}

/**
 * Parse a build manifest into a Manifest object.
 */
export function parseManifest(text: string, id?: string): Manifest {
  const lines = text.split('\n');
  let purpose = '';
  let tag = '';
  let graph: string[] = [];
  const steps = new Map<string, StepDecl>();

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index].trim();

    // Skip empty lines and comments
    if (!line || line.startsWith('//')) continue;

    const commentIndex = findInlineCommentIndex(line);
    const cleanLine = commentIndex >= 0 ? line.slice(0, commentIndex).trim() : line;

    if (cleanLine.startsWith('@purpose:')) {
      purpose = unquote(cleanLine.slice('@purpose:'.length));
      continue;
    }

    if (cleanLine.startsWith('@tag:')) {
      tag = unquote(cleanLine.slice('@tag:'.length));
      continue;
    }

    if (cleanLine.startsWith('@graph:')) {
      const raw = cleanLine.slice('@graph:'.length).trim();
      graph = raw ? raw.split('->').map((s) => s.trim()) : [];
      continue;
    }

    // Step declaration: name: kind { props }  or  name: kind
    const match = cleanLine.match(/^(\w+)\s*:\s*(\w+)\s*(?:\{(.*)\})?\s*$/);
    if (!match) {
      throw new ManifestError(`Line ${index + 1}: cannot parse "${cleanLine}"`);
    }

    const [, stepName, kind, propsRaw] = match;
    if (steps.has(stepName)) {
      throw new ManifestError(`Step "${stepName}" is declared twice`);
    }

    const properties = parseProperties(propsRaw ?? '');
    const needs = extractNeeds(stepName, properties);
    steps.set(stepName, { name: stepName, kind, needs, properties });
  }

  if (!purpose) {
    throw new ManifestError('Manifest is missing @purpose declaration');
  }

  const manifestId = id ?? 'unnamed';
  return {
    id: manifestId,
    purpose,
    tag: tag || manifestId,
    graph,
    steps,
  };
}

/**
 * Find the index of an inline comment (// not inside quotes).
 */
function findInlineCommentIndex(line: string): number {
  let inQuote = false;
  let quoteChar = '';

  for (let i = 0; i < line.length - 1; i++) {
    const ch = line[i];

    if (inQuote) {
      if (ch === quoteChar && line[i - 1] !== '\\') {
        inQuote = false;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      inQuote = true;
      quoteChar = ch;
      continue;
    }

    if (ch === '/' && line[i + 1] === '/') {
      return i;
    }
  }

  return -1;
}
