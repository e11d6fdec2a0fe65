import type { ProvisioningStep, StepKind } from "./contracts.js";

export interface CommandOptions {
  cwd: string;
  timeoutMs?: number;
}

export interface CommandOutput {
  ok: boolean;
  stdout: string;
  stderr: string;
  exit_code: number | string;
}

/** Runs an external program. Never throws; failures come back with `ok: false`. */
export interface CommandRunner {
  run(cmd: string, args: string[], opts: CommandOptions): Promise<CommandOutput>;
}

/** Resolves a drive-hosted file identifier (or share URL) and writes the bytes to `outputPath`. */
export interface AuthenticatedDownloader {
  download(source: string, outputPath: string): Promise<void>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ToolContext {
  /** Absolute workspace root. */
  root: string;
  runner: CommandRunner;
  drive: AuthenticatedDownloader;
  fetch: FetchLike;
  pipBin: string;
  aptBin: string;
  useSudo: boolean;
  fetchTimeoutMs: number;
  commandTimeoutMs: number;
  /** Relative path of a downloaded file → where a later move-file step puts it. */
  relocations?: ReadonlyMap<string, string>;
}

export type StepStatus = "done" | "skipped";

export interface ToolResult {
  status: StepStatus;
  /** Absolute paths the step wrote or found in place. */
  paths: string[];
  detail?: string;
}

export interface ToolSpec<S extends ProvisioningStep = ProvisioningStep> {
  kind: S["kind"];
  describe(step: S): string;
  invoke(step: S, ctx: ToolContext): Promise<ToolResult>;
}

export type StepOf<K extends StepKind> = Extract<ProvisioningStep, { kind: K }>;

export type ToolRegistry = { [K in StepKind]: ToolSpec<StepOf<K>> };
