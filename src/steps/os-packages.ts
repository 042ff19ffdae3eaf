import { z } from 'zod';
import { runCaptured } from './capture.js';
import { defineStep } from './types.js';

const PACKAGE_NAME = /^[a-z0-9][a-z0-9+.:=~-]*$/;

const schema = z.object({
  packages: z
    .array(z.string().regex(PACKAGE_NAME, 'is not a valid package name'))
    .min(1),
  manager: z.enum(['apt', 'apk']).default('apt'),
});

type OsPackagesProps = z.infer<typeof schema>;

/**
 * The single shell command installing every package. It either installs
 * all of them or exits non-zero.
 */
export function packageInstallCommand(props: OsPackagesProps): string {
  const list = props.packages.join(' ');
  if (props.manager === 'apk') {
    return `apk add --no-cache ${list}`;
  }
  return `apt-get update && apt-get install -y --no-install-recommends ${list} && rm -rf /var/lib/apt/lists/*`;
}

/**
 * Installs system packages with one command. Run locally, the package
 * manager works on the host root rather than the stage, so the layer it
 * captures is usually empty and instances use the host's libraries; only
 * the rendered Dockerfile installs the packages into the image itself.
 */
export const osPackagesStep = defineStep({
  kind: 'os_packages',
  schema,
  failure: 'package_install',

  describe: (props) => `install ${props.packages.length} ${props.manager} package(s)`,

  async execute(props, ctx) {
    const entries = await runCaptured(
      ctx,
      ['sh', '-c', packageInstallCommand(props)],
      'package_install',
      props.manager === 'apt' ? { DEBIAN_FRONTEND: 'noninteractive' } : {},
    );
    return { entries };
  },

  render: (props) => [`RUN ${packageInstallCommand(props)}`],
});
