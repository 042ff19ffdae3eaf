import { z } from 'zod';
import { shellJoin } from '../runner/command.js';
import { runCaptured } from './capture.js';
import { commandSchema } from './paths.js';
import { defineStep } from './types.js';

const schema = z.object({
  engine: z.enum(['chromium', 'firefox', 'webkit']).default('chromium'),
  command: commandSchema.optional(),
});

type InstallBrowserProps = z.infer<typeof schema>;

/** Browsers land inside the dependency tree, which keeps them in the image. */
export const BROWSER_ENV: Record<string, string> = { PLAYWRIGHT_BROWSERS_PATH: '0' };

export function browserInstallCommand(props: InstallBrowserProps): string[] {
  return props.command ?? ['npx', 'playwright-core', 'install', props.engine];
}

export const installBrowserStep = defineStep({
  kind: 'install_browser',
  schema,
  failure: 'browser_install',

  describe: (props) => `install ${props.engine} browser`,

  async execute(props, ctx) {
    const entries = await runCaptured(ctx, browserInstallCommand(props), 'browser_install', BROWSER_ENV);
    return { entries, config: { env: { ...BROWSER_ENV } } };
  },

  render: (props) => [
    ...Object.entries(BROWSER_ENV).map(([key, value]) => `ENV ${key}=${value}`),
    `RUN ${shellJoin(browserInstallCommand(props))}`,
  ],
});
