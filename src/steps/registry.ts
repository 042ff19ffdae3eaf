import type { Step } from './types.js';
import { baseImageStep } from './base-image.js';
import { osPackagesStep } from './os-packages.js';
import { workdirStep } from './workdir.js';
import { copyStep } from './copy.js';
import { installDepsStep } from './install-deps.js';
import { runStep } from './run.js';
import { installBrowserStep } from './install-browser.js';
import { entrypointStep } from './entrypoint.js';

const steps = new Map<string, Step>([
  ['base_image', baseImageStep],
  ['os_packages', osPackagesStep],
  ['workdir', workdirStep],
  ['copy', copyStep],
  ['install_deps', installDepsStep],
  ['run', runStep],
  ['install_browser', installBrowserStep],
  ['entrypoint', entrypointStep],
]);

export const KNOWN_STEP_KINDS = new Set(steps.keys());

export function getStep(kind: string): Step {
  const step = steps.get(kind);
  if (!step) {
    throw new Error(`Unknown step kind: "${kind}"`);
  }
  return step;
}
