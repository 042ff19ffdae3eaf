import { posix } from 'node:path';
import { ManifestError } from '../build/errors.js';
import { KNOWN_STEP_KINDS, getStep } from '../steps/registry.js';
import { resolveOrder, transitiveNeeds } from './graph.js';
import type { Manifest, StepDecl } from './types.js';

export interface ValidationError {
  message: string;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/** Does a copy step put `file` (relative to the workdir) into the image? */
function copyProvides(step: StepDecl, file: string): boolean {
  const to = typeof step.properties.to === 'string' ? step.properties.to : '.';
  const target = posix.normalize(file);

  return stringList(step.properties.from).some((rawFrom) => {
    const from = posix.normalize(rawFrom).replace(/\/+$/, '') || '.';
    if (from === '.') {
      return posix.normalize(posix.join(to, target)) === target;
    }
    const intoDirectory = to === '.' || to.endsWith('/');
    const landed = intoDirectory ? posix.join(to, posix.basename(from)) : to;
    return posix.normalize(landed) === target;
  });
}

/**
 * Validate a parsed manifest.
 * Returns an array of validation errors (empty if valid).
 */
export function validateManifest(manifest: Manifest): ValidationError[] {
  const errors: ValidationError[] = [];
  const steps = [...manifest.steps.values()];

  // @graph nodes
  const seen = new Set<string>();
  for (const nodeName of manifest.graph) {
    if (!manifest.steps.has(nodeName)) {
      errors.push({ message: `Graph references undeclared step: "${nodeName}"` });
    }
    if (seen.has(nodeName)) {
      errors.push({ message: `Graph contains duplicate node: "${nodeName}"` });
    }
    seen.add(nodeName);
  }
  if (manifest.graph.length > 0) {
    for (const step of steps) {
      if (!seen.has(step.name)) {
        errors.push({ message: `Step "${step.name}" is declared but missing from @graph` });
      }
    }
  }

  // Kinds and properties
  for (const step of steps) {
    if (!KNOWN_STEP_KINDS.has(step.kind)) {
      errors.push({ message: `Step "${step.name}" has unknown kind: "${step.kind}"` });
      continue;
    }
    for (const problem of getStep(step.kind).validate(step.properties)) {
      errors.push({ message: `Step "${step.name}" (kind "${step.kind}") has invalid property ${problem}` });
    }
  }

  // Order; the rest needs one
  let order: string[];
  try {
    order = resolveOrder(manifest);
  } catch (err) {
    if (!(err instanceof ManifestError)) throw err;
    errors.push({ message: err.message });
    return errors;
  }

  const position = new Map(order.map((name, index) => [name, index]));

  for (const step of steps) {
    for (const need of step.needs) {
      if (!manifest.steps.has(need)) {
        errors.push({ message: `Step "${step.name}" needs undeclared step: "${need}"` });
      } else if ((position.get(need) ?? Infinity) >= (position.get(step.name) ?? -1)) {
        errors.push({ message: `Step "${step.name}" needs "${need}", which does not run before it` });
      }
    }
  }

  const ofKind = (kind: string) => steps.filter((s) => s.kind === kind);

  const bases = ofKind('base_image');
  if (bases.length !== 1) {
    errors.push({ message: `Manifest must declare exactly one base_image step, found ${bases.length}` });
  } else if (order[0] !== bases[0].name) {
    errors.push({ message: `base_image step "${bases[0].name}" must run first` });
  }

  const entrypoints = ofKind('entrypoint');
  if (entrypoints.length !== 1) {
    errors.push({ message: `Manifest must declare exactly one entrypoint step, found ${entrypoints.length}` });
  } else if (order[order.length - 1] !== entrypoints[0].name) {
    errors.push({ message: `entrypoint step "${entrypoints[0].name}" must run last` });
  }

  const firstWorkdir = order.findIndex((name) => manifest.steps.get(name)?.kind === 'workdir');
  for (const copy of ofKind('copy')) {
    const at = position.get(copy.name) ?? 0;
    if (firstWorkdir === -1 || firstWorkdir > at) {
      errors.push({ message: `copy step "${copy.name}" runs before any workdir step` });
    }
  }

  for (const install of ofKind('install_deps')) {
    const file = install.properties.manifest;
    if (typeof file !== 'string') continue;
    const provided = [...transitiveNeeds(manifest, install.name)].some((name) => {
      const dep = manifest.steps.get(name);
      return dep?.kind === 'copy' && copyProvides(dep, file);
    });
    if (!provided) {
      errors.push({
        message: `install_deps step "${install.name}" needs a copy step providing "${file}"`,
      });
    }
  }

  for (const browser of ofKind('install_browser')) {
    const hasDeps = [...transitiveNeeds(manifest, browser.name)].some(
      (name) => manifest.steps.get(name)?.kind === 'install_deps',
    );
    if (!hasDeps) {
      errors.push({ message: `install_browser step "${browser.name}" must need an install_deps step` });
    }
  }

  return errors;
}
