import { existsSync, readFileSync } from 'node:fs';
import { posix } from 'node:path';
import { z } from 'zod';
import { resolveInRoot } from '../cache/materialize.js';
import { StepError } from '../build/errors.js';
import { shellJoin } from '../runner/command.js';
import { runCaptured } from './capture.js';
import { commandSchema, relativePathSchema, resolveImagePath } from './paths.js';
import { defineStep } from './types.js';

const DEFAULT_COMMANDS: Record<string, string[]> = {
  'package.json': ['npm', 'install', '--no-audit', '--no-fund'],
  'requirements.txt': ['pip', 'install', '--no-cache-dir', '-r', 'requirements.txt'],
};

export const installDepsSchema = z
  .object({
    manifest: relativePathSchema,
    command: commandSchema.optional(),
  })
  .refine((p) => p.command !== undefined || posix.basename(p.manifest) in DEFAULT_COMMANDS, {
    message: `needs a "command" unless the manifest is one of: ${Object.keys(DEFAULT_COMMANDS).join(', ')}`,
    path: ['command'],
  });

type InstallDepsProps = z.infer<typeof installDepsSchema>;

export function installCommand(props: InstallDepsProps): string[] {
  if (props.command) return props.command;
  const fallback = DEFAULT_COMMANDS[posix.basename(props.manifest)];
  if (!fallback) {
    throw new StepError('dependency_install', `No default install command for "${props.manifest}"`);
  }
  // pip reads the manifest by path; keep it pointing at the declared file
  return fallback.map((arg) => (arg === 'requirements.txt' ? props.manifest : arg));
}

const REQUIREMENT_LINE = /^[A-Za-z0-9][A-Za-z0-9._-]*(\[[A-Za-z0-9._,\s-]+\])?\s*((===?|~=|!=|<=|>=|<|>)\s*[^\s,;#]+(\s*,\s*(===?|~=|!=|<=|>=|<|>)\s*[^\s,;#]+)*)?\s*(;.*)?$/;

/**
 * Check a dependency manifest is well-formed before anything is installed
 * from it. Returns problems found (empty when fine).
 */
export function checkDependencyManifest(fileName: string, content: string): string[] {
  const base = posix.basename(fileName);

  if (base === 'package.json') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      return [`not valid JSON: ${(err as Error).message}`];
    }
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      return ['top level must be an object'];
    }
    return [];
  }

  if (base === 'requirements.txt') {
    const problems: string[] = [];
    content.split('\n').forEach((rawLine, index) => {
      const line = rawLine.replace(/\s+#.*$/, '').trim();
      if (!line || line.startsWith('#') || line.startsWith('-')) return;
      if (!REQUIREMENT_LINE.test(line)) {
        problems.push(`line ${index + 1}: cannot parse requirement "${line}"`);
      }
    });
    return problems;
  }

  return [];
}

export const installDepsStep = defineStep({
  kind: 'install_deps',
  schema: installDepsSchema,
  failure: 'dependency_install',

  describe: (props) => `install dependencies from ${props.manifest}`,

  async execute(props, ctx) {
    const manifestPath = resolveInRoot(ctx.stageDir, resolveImagePath(ctx.workdir, props.manifest));
    if (!existsSync(manifestPath)) {
      throw new StepError(
        'dependency_install',
        `Dependency manifest "${props.manifest}" is not present in ${ctx.workdir}; copy it in an earlier step`,
      );
    }

    const problems = checkDependencyManifest(props.manifest, readFileSync(manifestPath, 'utf-8'));
    if (problems.length > 0) {
      throw new StepError('dependency_install', `Dependency manifest "${props.manifest}" is malformed: ${problems.join('; ')}`);
    }

    const entries = await runCaptured(ctx, installCommand(props), 'dependency_install');
    return { entries };
  },

  render: (props) => [`RUN ${shellJoin(installCommand(props))}`],
});
