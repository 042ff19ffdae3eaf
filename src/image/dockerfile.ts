import { resolveOrder } from '../manifest/graph.js';
import type { Manifest } from '../manifest/types.js';
import { getStep } from '../steps/registry.js';

export interface RenderOptions {
  installBrowser?: boolean;
}

/**
 * Render a build manifest as an equivalent Dockerfile.
 */
export function renderDockerfile(manifest: Manifest, options: RenderOptions = {}): string {
  const installBrowser = options.installBrowser ?? true;
  const lines = [`# ${manifest.purpose}`];

  for (const name of resolveOrder(manifest)) {
    const decl = manifest.steps.get(name);
    if (!decl) continue;
    if (decl.kind === 'install_browser' && !installBrowser) continue;
    lines.push(...getStep(decl.kind).render(decl.properties));
  }

  return `${lines.join('\n')}\n`;
}
