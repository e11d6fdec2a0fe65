import { homedir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const DEFAULT_MANIFEST = fileURLToPath(new URL("../manifests/research-workspace.json", import.meta.url));

export const USAGE = `Usage: research-bootstrap [options]

Provisions the research workspace described by a step manifest.
Run from the scripts directory; the workspace root defaults to ../dependencies.

Options:
  --root <dir>        workspace root (env WORKSPACE_ROOT)
  --manifest <file>   step manifest (env MANIFEST; default: bundled research-workspace.json)
  --run-id <id>       write a JSON journal under runs/<id>/ (env RUN_ID)
  --dry-run           print the ordered plan and exit
  --no-verify         skip the output check after the last step
  -h, --help          show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  root?: string;
  manifest?: string;
  runId?: string;
  dryRun: boolean;
  verify: boolean;
  help: boolean;
}

export interface BootstrapConfig {
  workspaceRoot: string;
  manifestPath: string;
  runId?: string;
  journalDir: string;
  gdownBin: string;
  pipBin: string;
  aptBin: string;
  useSudo: boolean;
  fetchTimeoutMs: number;
  commandTimeoutMs: number;
  dryRun: boolean;
  verify: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { dryRun: false, verify: true, help: false };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    const value = (name: string): string => {
      if (a.startsWith(name + "=")) return a.slice(name.length + 1);
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) throw new UsageError(`${name} needs a value`);
      i++;
      return next;
    };
    if (a === "--root" || a.startsWith("--root=")) out.root = value("--root");
    else if (a === "--manifest" || a.startsWith("--manifest=")) out.manifest = value("--manifest");
    else if (a === "--run-id" || a.startsWith("--run-id=")) out.runId = value("--run-id");
    else if (a === "--dry-run") out.dryRun = true;
    else if (a === "--no-verify") out.verify = false;
    else if (a === "--help" || a === "-h") out.help = true;
    else throw new UsageError(`unknown argument: ${a}`);
  }
  return out;
}

function expandHome(p: string): string {
  return p === "~" || p.startsWith("~/") ? path.join(homedir(), p.slice(1)) : p;
}

function seconds(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback * 1000;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new UsageError(`${key} must be a positive number of seconds, got '${raw}'`);
  return n * 1000;
}

/** Flags win over environment variables, which win over defaults. */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): BootstrapConfig {
  const args = parseArgs(argv);
  const runId = args.runId ?? (env.RUN_ID || undefined);
  return {
    workspaceRoot: path.resolve(cwd, expandHome(args.root ?? env.WORKSPACE_ROOT ?? "../dependencies")),
    manifestPath: path.resolve(cwd, expandHome(args.manifest ?? env.MANIFEST ?? DEFAULT_MANIFEST)),
    runId,
    journalDir: path.resolve(cwd, "runs"),
    gdownBin: expandHome(env.GDOWN_BIN || "~/.local/bin/gdown"),
    pipBin: env.PIP_BIN || "pip",
    aptBin: env.APT_BIN || "apt-get",
    useSudo: (env.USE_SUDO ?? "1") !== "0",
    fetchTimeoutMs: seconds(env, "FETCH_TIMEOUT_S", 3600),
    commandTimeoutMs: seconds(env, "COMMAND_TIMEOUT_S", 3600),
    dryRun: args.dryRun,
    verify: args.verify,
    help: args.help
  };
}
