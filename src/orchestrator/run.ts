// src/orchestrator/run.ts
// Sequential interpreter: one step at a time, in ordinal order, stopping at the
// first failure. Step failures come back in the result; nothing is retried.

import type { ErrorCode } from "../errors.js";
import type { Manifest, Phase, ProvisioningStep, StepKind } from "../types/contracts.js";
import type { StepStatus, ToolContext, ToolRegistry, ToolResult } from "../types/tools.js";
import { ProvisioningError, toProvisioningError } from "../errors.js";
import { COLOR, LOG_STEPS, fmtMs, info } from "../log.js";
import { requireRoot } from "../workspace.js";
import { buildToolRegistry } from "../tools/registry.js";
import { record, type Journal } from "./materialize.js";
import { verifyOutputs } from "./verify.js";
import { relocationsOf } from "./compiler.js";

export interface RunOptions {
  manifest: Manifest;
  ctx: ToolContext;
  tools?: ToolRegistry;
  /** Check every declared destination after the last step (default true). */
  verifyOutputs?: boolean;
  journal?: Journal;
}

export interface StepOutcome {
  ordinal: number;
  kind: StepKind;
  phase: Phase;
  status: StepStatus;
  paths: string[];
  detail?: string;
  ms: number;
}

export interface StepFailure {
  /** 0 when the failure came from output verification rather than a step. */
  ordinal: number;
  kind?: StepKind;
  phase?: Phase;
  error: ProvisioningError;
}

export type RunResult =
  | { ok: true; outcomes: StepOutcome[] }
  | { ok: false; failed: StepFailure; outcomes: StepOutcome[] };

const FALLBACK_CODE: Record<StepKind, ErrorCode> = {
  "make-directory": "command_failed",
  "fetch-file": "fetch_failed",
  "extract-archive": "extract_failed",
  "install-package": "install_failed",
  "clone-repository": "clone_failed",
  "drive-download": "fetch_failed",
  "move-file": "command_failed",
  "run-script": "command_failed"
};

export function invokeTool(tools: ToolRegistry, step: ProvisioningStep, ctx: ToolContext): Promise<ToolResult> {
  switch (step.kind) {
    case "make-directory": return tools["make-directory"].invoke(step, ctx);
    case "fetch-file": return tools["fetch-file"].invoke(step, ctx);
    case "extract-archive": return tools["extract-archive"].invoke(step, ctx);
    case "install-package": return tools["install-package"].invoke(step, ctx);
    case "clone-repository": return tools["clone-repository"].invoke(step, ctx);
    case "drive-download": return tools["drive-download"].invoke(step, ctx);
    case "move-file": return tools["move-file"].invoke(step, ctx);
    case "run-script": return tools["run-script"].invoke(step, ctx);
  }
}

export function describeStep(tools: ToolRegistry, step: ProvisioningStep): string {
  switch (step.kind) {
    case "make-directory": return tools["make-directory"].describe(step);
    case "fetch-file": return tools["fetch-file"].describe(step);
    case "extract-archive": return tools["extract-archive"].describe(step);
    case "install-package": return tools["install-package"].describe(step);
    case "clone-repository": return tools["clone-repository"].describe(step);
    case "drive-download": return tools["drive-download"].describe(step);
    case "move-file": return tools["move-file"].describe(step);
    case "run-script": return tools["run-script"].describe(step);
  }
}

/** One line per step, in execution order, for `--dry-run`. */
export function planLines(manifest: Manifest, tools: ToolRegistry = buildToolRegistry()): string[] {
  const width = String(manifest.steps.length).length;
  return manifest.steps.map(s => {
    const n = String(s.ordinal).padStart(width, " ");
    return `${n}. [${s.phase}] ${s.kind.padEnd(16)} ${describeStep(tools, s)}`;
  });
}

export async function runManifest(opts: RunOptions): Promise<RunResult> {
  const { manifest, journal } = opts;
  const ctx: ToolContext = { ...opts.ctx, relocations: opts.ctx.relocations ?? relocationsOf(manifest) };
  const tools = opts.tools ?? buildToolRegistry();
  const outcomes: StepOutcome[] = [];
  const total = manifest.steps.length;
  let phase: Phase | undefined;

  for (const step of manifest.steps) {
    if (LOG_STEPS && step.phase !== phase) info(`\n${COLOR.magenta("── " + step.phase)}`);
    phase = step.phase;
    if (LOG_STEPS) {
      const what = step.label ?? describeStep(tools, step);
      info(`${COLOR.cyan("▶ step")} ${step.ordinal}/${total} ${step.kind} ${COLOR.gray("— " + what)}`);
    }

    const t0 = Date.now();
    let res: ToolResult;
    try {
      await requireRoot(ctx.root);
      res = await invokeTool(tools, step, ctx);
    } catch (e: unknown) {
      const error = toProvisioningError(e, FALLBACK_CODE[step.kind]);
      const failed: StepFailure = { ordinal: step.ordinal, kind: step.kind, phase: step.phase, error };
      if (LOG_STEPS) info(`${COLOR.red("✗ failed")} ${step.ordinal} ${COLOR.gray("(" + fmtMs(Date.now() - t0) + ")")} ${error.code}: ${error.message}`);
      record(journal, "result.json", { ok: false, failed: { ...failed, error: { code: error.code, message: error.message, stderr: error.stderr } }, outcomes });
      return { ok: false, failed, outcomes };
    }

    const outcome: StepOutcome = {
      ordinal: step.ordinal,
      kind: step.kind,
      phase: step.phase,
      status: res.status,
      paths: res.paths,
      detail: res.detail,
      ms: Date.now() - t0
    };
    outcomes.push(outcome);
    record(journal, `step-${String(step.ordinal).padStart(2, "0")}-${step.kind}.json`, outcome);
    if (LOG_STEPS) {
      const mark = res.status === "done" ? COLOR.green("✓ done") : COLOR.yellow("↷ skipped");
      const extra = [res.detail, fmtMs(outcome.ms)].filter(Boolean).join("; ");
      info(`${mark} ${step.ordinal} ${COLOR.gray("(" + extra + ")")}`);
    }
  }

  if (opts.verifyOutputs ?? true) {
    const missing = await verifyOutputs(manifest, ctx.root);
    if (missing.length) {
      const lines = missing.map(m => `${m.path} (step ${m.ordinal}): ${m.reason}`);
      const error = new ProvisioningError("missing_output", `expected outputs are missing:\n${lines.join("\n")}`);
      const failed: StepFailure = { ordinal: 0, error };
      record(journal, "result.json", { ok: false, failed: { ordinal: 0, error: { code: error.code, message: error.message } }, outcomes });
      return { ok: false, failed, outcomes };
    }
  }

  record(journal, "result.json", { ok: true, outcomes });
  return { ok: true, outcomes };
}
