import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type {
  AuthenticatedDownloader,
  CommandOptions,
  CommandOutput,
  CommandRunner,
  FetchLike,
  ToolContext
} from '../types/tools.js';

const created: string[] = [];

export async function tempDir(prefix = 'bootstrap-'): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  created.push(dir);
  return dir;
}

/** Removes every directory `tempDir` handed out; use from `afterEach`. */
export async function removeTempDirs(): Promise<void> {
  const dirs = created.splice(0);
  await Promise.all(dirs.map(d => rm(d, { recursive: true, force: true })));
}

export interface RecordedCall {
  cmd: string;
  args: string[];
  cwd: string;
}

/**
 * Stands in for tar/git/pip/apt. `tar -xf a -C dir` leaves a directory in
 * `dir`; `git clone url dest` leaves `dest/.git` and a README.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  constructor(private readonly failWhen: (cmd: string, args: string[]) => boolean = () => false) {}

  async run(cmd: string, args: string[], opts: CommandOptions): Promise<CommandOutput> {
    this.calls.push({ cmd, args, cwd: opts.cwd });
    if (this.failWhen(cmd, args)) {
      return { ok: false, stdout: '', stderr: `fatal: ${cmd} failed`, exit_code: 128 };
    }
    if (cmd === 'tar') {
      const [, archive, , dir] = args;
      const unpacked = path.join(dir, path.basename(archive).replace(/\.tar(\.gz)?$/, ''));
      await mkdir(unpacked, { recursive: true });
      await writeFile(path.join(unpacked, 'frozen_inference_graph.pb'), 'graph');
    }
    if (cmd === 'git' && args[0] === 'clone') {
      const dest = args[2];
      await mkdir(path.join(dest, '.git'), { recursive: true });
      await writeFile(path.join(dest, 'README.md'), `# ${path.basename(dest)}\n`);
    }
    return { ok: true, stdout: '', stderr: '', exit_code: 0 };
  }
}

export class FakeDrive implements AuthenticatedDownloader {
  readonly calls: Array<{ source: string; outputPath: string }> = [];
  async download(source: string, outputPath: string): Promise<void> {
    this.calls.push({ source, outputPath });
    await writeFile(outputPath, `drive:${source}`);
  }
}

export interface FakeFetch {
  fetch: FetchLike;
  urls: string[];
}

/** Serves `bytes of <url>` for every URL; hosts in `unreachable` reject like a network error. */
export function fakeFetch(opts: { unreachable?: string[]; status?: Record<string, number>; body?: Record<string, string> } = {}): FakeFetch {
  const urls: string[] = [];
  const fetch: FetchLike = async (url) => {
    urls.push(url);
    if (opts.unreachable?.includes(new URL(url).hostname)) throw new TypeError('fetch failed');
    const status = opts.status?.[url] ?? 200;
    return new Response(opts.body?.[url] ?? `bytes of ${url}`, { status });
  };
  return { fetch, urls };
}

export function makeContext(root: string, overrides: Partial<ToolContext> = {}): ToolContext {
  return {
    root,
    runner: new FakeRunner(),
    drive: new FakeDrive(),
    fetch: fakeFetch().fetch,
    pipBin: 'pip',
    aptBin: 'apt-get',
    useSudo: true,
    fetchTimeoutMs: 5_000,
    commandTimeoutMs: 5_000,
    ...overrides
  };
}
