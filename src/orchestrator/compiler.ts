import { readFile } from "node:fs/promises";
import path from "node:path";
import type { ZodIssue } from "zod";
import { ManifestSchema, PHASES, type Manifest, type ProvisioningStep, type StepKind } from "../types/contracts.js";
import { ProvisioningError, errorMessage } from "../errors.js";
import { normalizeRel, parentOf, remoteFileName, ROOT } from "../workspace.js";
import { orderSteps } from "./order.js";

export interface PathRef {
  path: string;
  type: "file" | "dir";
}

function rel(p: string): string {
  const norm = normalizeRel(p);
  if (norm === null) throw new ProvisioningError("invalid_manifest", `path must stay inside the workspace root: ${p}`);
  return norm;
}

export interface StepOutput extends PathRef {
  ordinal: number;
  kind: StepKind;
}

/** Destinations a step is expected to leave behind. */
export function outputsOf(step: ProvisioningStep): PathRef[] {
  switch (step.kind) {
    case "make-directory":
    case "clone-repository":
      return [{ path: rel(step.target), type: "dir" }];
    case "extract-archive":
      return [{ path: step.creates ? path.posix.join(rel(step.target), step.creates) : rel(step.target), type: "dir" }];
    case "fetch-file":
      return [{ path: path.posix.join(rel(step.target), step.fileName ?? remoteFileName(step.source)), type: "file" }];
    case "drive-download":
      return [{ path: rel(step.target), type: "file" }];
    case "move-file":
      return [{ path: path.posix.join(rel(step.target), path.posix.basename(rel(step.source))), type: "file" }];
    case "install-package":
    case "run-script":
      return [];
  }
}

/** Paths that must exist before a step runs. */
export function requirementsOf(step: ProvisioningStep): PathRef[] {
  switch (step.kind) {
    case "make-directory":
    case "install-package":
      return [];
    case "fetch-file":
    case "run-script":
      return [{ path: rel(step.target), type: "dir" }];
    case "extract-archive":
      return [{ path: rel(step.source), type: "file" }, { path: rel(step.target), type: "dir" }];
    case "move-file":
      return [{ path: rel(step.source), type: "file" }, { path: rel(step.target), type: "dir" }];
    case "clone-repository":
    case "drive-download":
      return [{ path: parentOf(rel(step.target)), type: "dir" }];
  }
}

/**
 * Declared outputs that should still be in place after a full run: a file
 * relocated by a later `move-file` step counts only at its new location.
 */
export function finalOutputs(manifest: Manifest): StepOutput[] {
  const out: StepOutput[] = [];
  for (const step of manifest.steps) {
    if (step.kind === "move-file") {
      const moved = rel(step.source);
      for (let i = out.length - 1; i >= 0; i--) if (out[i].path === moved) out.splice(i, 1);
    }
    for (const ref of outputsOf(step)) out.push({ ...ref, ordinal: step.ordinal, kind: step.kind });
  }
  return out;
}

/**
 * Where each file a `move-file` step picks up finally ends up, keyed and
 * valued by normalized relative path. Chained moves resolve to the last one.
 */
export function relocationsOf(manifest: Manifest): Map<string, string> {
  const moves = new Map<string, string>();
  for (const step of manifest.steps) {
    if (step.kind !== "move-file") continue;
    const from = rel(step.source);
    const to = path.posix.join(rel(step.target), path.posix.basename(from));
    for (const [k, v] of moves) if (v === from) moves.set(k, to);
    moves.set(from, to);
  }
  return moves;
}

function ancestors(p: string): string[] {
  const out: string[] = [];
  for (let cur = parentOf(p); cur !== ROOT; cur = parentOf(cur)) out.push(cur);
  return out;
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length ? issue.path.join(".") : "(manifest)";
  return `${where}: ${issue.message}`;
}

/**
 * Validates a raw manifest and returns it with steps in execution order.
 * Throws `invalid_manifest` listing every problem found.
 */
export function compileManifest(raw: unknown): Manifest {
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProvisioningError("invalid_manifest", parsed.error.issues.map(formatIssue).join("\n"));
  }
  const manifest: Manifest = { ...parsed.data, steps: orderSteps(parsed.data.steps) };
  const problems: string[] = [];

  manifest.steps.forEach((step, ix) => {
    if (step.ordinal !== ix + 1) problems.push(`ordinals must run 1..${manifest.steps.length}; found ${step.ordinal} at position ${ix + 1}`);
  });

  for (let i = 1; i < manifest.steps.length; i++) {
    const prev = manifest.steps[i - 1];
    const cur = manifest.steps[i];
    if (PHASES.indexOf(cur.phase) < PHASES.indexOf(prev.phase)) {
      problems.push(`step ${cur.ordinal}: phase '${cur.phase}' comes after '${prev.phase}'`);
    }
  }

  const produced = new Set<string>([ROOT]);
  for (const step of manifest.steps) {
    try {
      for (const need of requirementsOf(step)) {
        if (!produced.has(need.path)) {
          problems.push(`step ${step.ordinal} (${step.kind}) needs ${need.type} '${need.path}' which no earlier step provides`);
        }
      }
      for (const out of outputsOf(step)) {
        produced.add(out.path);
        if (out.type === "dir") ancestors(out.path).forEach(a => produced.add(a));
      }
      if (step.kind === "move-file") produced.delete(rel(step.source));
    } catch (e: unknown) {
      if (!(e instanceof ProvisioningError)) throw e;
      problems.push(`step ${step.ordinal}: ${e.message}`);
    }
  }

  if (problems.length) throw new ProvisioningError("invalid_manifest", problems.join("\n"));
  return manifest;
}

export async function loadManifest(file: string): Promise<Manifest> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, "utf-8"));
  } catch (e: unknown) {
    throw new ProvisioningError("invalid_manifest", `cannot read manifest ${file}: ${errorMessage(e)}`, { cause: e });
  }
  return compileManifest(raw);
}
