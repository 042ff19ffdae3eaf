import { ManifestError } from '../build/errors.js';
import type { Manifest } from './types.js';

/**
 * Execution order of a manifest: the explicit @graph when present,
 * otherwise a topological sort of the `needs` edges with ties broken by
 * declaration order. Throws on a dependency cycle.
 */
export function resolveOrder(manifest: Manifest): string[] {
  if (manifest.graph.length > 0) return [...manifest.graph];

  const declared = [...manifest.steps.keys()];
  const remaining = new Map<string, Set<string>>();
  for (const name of declared) {
    const step = manifest.steps.get(name);
    const needs = (step?.needs ?? []).filter((n) => manifest.steps.has(n));
    remaining.set(name, new Set(needs));
  }

  const order: string[] = [];
  while (order.length < declared.length) {
    const next = declared.find((name) => !order.includes(name) && remaining.get(name)?.size === 0);
    if (!next) {
      const stuck = declared.filter((name) => !order.includes(name));
      throw new ManifestError(`Dependency cycle between steps: ${stuck.join(', ')}`);
    }
    order.push(next);
    for (const deps of remaining.values()) deps.delete(next);
  }

  return order;
}

/**
 * Every step `name` depends on, directly or through other steps.
 */
export function transitiveNeeds(manifest: Manifest, name: string): Set<string> {
  const seen = new Set<string>();
  const stack = [...(manifest.steps.get(name)?.needs ?? [])];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    stack.push(...(manifest.steps.get(current)?.needs ?? []));
  }

  return seen;
}
