import { spawn } from 'node:child_process';

export interface CommandOptions {
  cwd: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Executes build commands and instance entry points. Build steps go through
 * `run` (output captured); instances go through `start` (output inherited).
 */
export interface CommandRunner {
  run(command: string[], options: CommandOptions): Promise<CommandResult>;
  start(command: string[], options: CommandOptions): Promise<number>;
}

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string[],
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    super(`Command failed with exit code ${exitCode}: ${command.join(' ')}${stderr ? `\n${tail(stderr)}` : ''}`);
    this.name = 'CommandFailedError';
  }
}

const OUTPUT_LIMIT = 64 * 1024;

function tail(text: string, lines = 20): string {
  return text.trimEnd().split('\n').slice(-lines).join('\n');
}

function append(buffer: string, chunk: Buffer): string {
  const next = buffer + chunk.toString('utf-8');
  return next.length > OUTPUT_LIMIT ? next.slice(-OUTPUT_LIMIT) : next;
}

/**
 * Run a command to completion. Never goes through a shell: the first
 * element is the executable, the rest are its arguments.
 */
export const spawnRunner: CommandRunner = {
  run(command, options) {
    const [file, ...args] = command;
    if (!file) return Promise.reject(new Error('Cannot run an empty command'));

    return new Promise<CommandResult>((resolvePromise, reject) => {
      const child = spawn(file, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        signal: options.signal,
      });

      let stdout = '';
      let stderr = '';
      child.stdout.on('data', (chunk: Buffer) => { stdout = append(stdout, chunk); });
      child.stderr.on('data', (chunk: Buffer) => { stderr = append(stderr, chunk); });

      child.on('error', reject);
      child.on('close', (code) => {
        resolvePromise({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  },

  start(command, options) {
    const [file, ...args] = command;
    if (!file) return Promise.reject(new Error('Cannot start an empty command'));

    return new Promise<number>((resolvePromise, reject) => {
      const child = spawn(file, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: 'inherit',
        signal: options.signal,
      });
      child.on('error', reject);
      child.on('close', (code) => resolvePromise(code ?? 1));
    });
  },
};

/**
 * Run and throw CommandFailedError on a non-zero exit.
 */
export async function runChecked(runner: CommandRunner, command: string[], options: CommandOptions): Promise<CommandResult> {
  const result = await runner.run(command, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(command, result.exitCode, result.stderr);
  }
  return result;
}

/**
 * Render an argv array as a POSIX shell command line.
 */
export function shellJoin(command: string[]): string {
  return command.map((arg) => (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`)).join(' ');
}
