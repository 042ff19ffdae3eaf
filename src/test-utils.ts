import { join } from 'node:path';
import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import type { CommandOptions, CommandResult, CommandRunner } from './runner/command.js';
import type { BrowserFetcher } from './scraper/browser.js';
import type { HttpFetchOptions, PageFetcher } from './scraper/http.js';
import type { FetchedPage } from './scraper/types.js';

export function makeTmpDir(): string {
  const dir = join(tmpdir(), `srt-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export interface RecordedCommand {
  command: string[];
  cwd: string;
  env: Record<string, string>;
}

export type FakeHandler = (command: string[], options: CommandOptions) => Partial<CommandResult> | void;

export interface FakeRunner extends CommandRunner {
  calls: RecordedCommand[];
  starts: RecordedCommand[];
}

/**
 * In-process stand-in for child processes. The handler may touch the
 * filesystem under `options.cwd` to simulate what the command would do.
 */
export function makeFakeRunner(handler: FakeHandler = () => undefined, startExitCode = 0): FakeRunner {
  const calls: RecordedCommand[] = [];
  const starts: RecordedCommand[] = [];

  return {
    calls,
    starts,
    async run(command, options) {
      calls.push({ command: [...command], cwd: options.cwd, env: { ...options.env } });
      const result = handler(command, options) ?? {};
      return { exitCode: 0, stdout: '', stderr: '', ...result };
    },
    async start(command, options) {
      starts.push({ command: [...command], cwd: options.cwd, env: { ...options.env } });
      return startExitCode;
    },
  };
}

export interface FakePageFetcher extends PageFetcher {
  calls: Array<{ url: string; options: HttpFetchOptions }>;
}

/** Page fetcher answering every request with `answer` (thrown when it is an Error). */
export function makeFakePageFetcher(answer: FetchedPage | Error): FakePageFetcher {
  const calls: Array<{ url: string; options: HttpFetchOptions }> = [];
  return {
    calls,
    async fetchPage(url, options = {}) {
      calls.push({ url, options });
      if (answer instanceof Error) throw answer;
      return answer;
    },
  };
}

export function makeFakeBrowser(installed = false, answer: FetchedPage | Error = new Error('no browser')): BrowserFetcher {
  return {
    available: () => installed,
    async fetchPage() {
      if (answer instanceof Error) throw answer;
      return answer;
    },
  };
}

export function htmlPage(text: string, overrides: Partial<FetchedPage> = {}): FetchedPage {
  return { status: 200, ok: true, url: 'https://shop.example.com/', contentType: 'text/html', text, ...overrides };
}
