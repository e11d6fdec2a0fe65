import { loadConfig, USAGE, UsageError } from './config.js';
import { loadManifest } from './orchestrator/compiler.js';
import { planLines, runManifest, type RunResult } from './orchestrator/run.js';
import { cliExec } from './tools/cli/exec.js';
import { GdownDownloader } from './tools/drive/gdown.js';
import { ProvisioningError } from './errors.js';
import { COLOR, info } from './log.js';
import type { ToolContext } from './types/tools.js';

/** Host capabilities `main` would otherwise take from the real machine. */
export type HostOverrides = Partial<Pick<ToolContext, 'runner' | 'drive' | 'fetch'>>;

/** 0 for a successful run, 1 when a step or the output check failed. */
export function exitCodeFor(result: RunResult): number {
  return result.ok ? 0 : 1;
}

/** 2 for bad arguments or a bad manifest, 1 for anything unexpected. */
export function exitCodeForError(err: unknown): number {
  return err instanceof UsageError || err instanceof ProvisioningError ? 2 : 1;
}

function report(err: unknown): void {
  if (err instanceof UsageError) console.error(`${err.message}\n\n${USAGE}`);
  else if (err instanceof ProvisioningError) console.error(`[${err.code}] ${err.message}`);
  else console.error('[fatal]', err);
}

async function provision(argv: string[], env: NodeJS.ProcessEnv, cwd: string, host: HostOverrides): Promise<number> {
  const config = loadConfig(env, argv, cwd);
  if (config.help) {
    console.log(USAGE);
    return 0;
  }

  const manifest = await loadManifest(config.manifestPath);

  if (config.dryRun) {
    console.log(`${manifest.name}: ${manifest.steps.length} steps, root ${config.workspaceRoot}\n`);
    for (const line of planLines(manifest)) console.log(line);
    return 0;
  }

  const ctx: ToolContext = {
    root: config.workspaceRoot,
    runner: host.runner ?? cliExec,
    drive: host.drive ?? new GdownDownloader(cliExec, config.gdownBin, config.commandTimeoutMs),
    fetch: host.fetch ?? ((url, init) => fetch(url, init)),
    pipBin: config.pipBin,
    aptBin: config.aptBin,
    useSudo: config.useSudo,
    fetchTimeoutMs: config.fetchTimeoutMs,
    commandTimeoutMs: config.commandTimeoutMs
  };

  info(`[bootstrap] ${manifest.name} → ${config.workspaceRoot}`);
  const result = await runManifest({
    manifest,
    ctx,
    verifyOutputs: config.verify,
    journal: config.runId ? { baseDir: config.journalDir, runId: config.runId } : undefined
  });

  if (!result.ok) {
    const { failed } = result;
    const where = failed.ordinal ? `step ${failed.ordinal} (${failed.kind})` : 'output check';
    console.error(COLOR.red(`\n[failed] ${where}: ${failed.error.code}`));
    console.error(failed.error.message);
    if (failed.error.stderr) console.error(COLOR.gray(failed.error.stderr));
  } else {
    const done = result.outcomes.filter(o => o.status === 'done').length;
    info(`\n[done] ${done} steps ran, ${result.outcomes.length - done} already in place`);
  }
  return exitCodeFor(result);
}

/** Runs the bootstrap end to end and returns the process exit status. */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  host: HostOverrides = {}
): Promise<number> {
  try {
    return await provision(argv, env, cwd, host);
  } catch (err: unknown) {
    report(err);
    return exitCodeForError(err);
  }
}
