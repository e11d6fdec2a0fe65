import { rename, rm } from "node:fs/promises";
import { ProvisioningError } from "../../errors.js";
import type { ToolContext } from "../../types/tools.js";
import { fileSize, normalizeRel, resolveIn, sha256File } from "../../workspace.js";
import { verifyArtifact } from "../../orchestrator/verify.js";

/**
 * True when `dest` already holds a usable copy: non-empty, and matching
 * `sha256` when one is expected.
 */
export async function alreadyFetched(dest: string, sha256?: string): Promise<boolean> {
  const size = await fileSize(dest);
  if (size === null || size === 0) return false;
  if (!sha256) return true;
  return (await sha256File(dest)).toLowerCase() === sha256.toLowerCase();
}

/**
 * Absolute path a later `move-file` step relocates the workspace file `rel`
 * to, when the manifest has one.
 */
export function relocatedPath(ctx: ToolContext, rel: string): string | undefined {
  const norm = normalizeRel(rel);
  const to = norm === null ? undefined : ctx.relocations?.get(norm);
  return to === undefined ? undefined : resolveIn(ctx.root, to);
}

/** The first of `candidates` that already holds a usable copy. */
export async function fetchedCopy(candidates: Array<string | undefined>, sha256?: string): Promise<string | undefined> {
  for (const p of candidates) {
    if (p !== undefined && (await alreadyFetched(p, sha256))) return p;
  }
  return undefined;
}

export function partPath(dest: string): string {
  return `${dest}.part`;
}

/**
 * Verifies a finished transfer sitting at `part` and renames it over `dest`.
 * The partial file is removed when verification fails.
 */
export async function landTransfer(part: string, dest: string, sha256?: string): Promise<number> {
  const verdict = await verifyArtifact(part, sha256);
  if (!verdict.pass) {
    await rm(part, { force: true });
    const code = verdict.intent === "integrity" ? "integrity_mismatch" : "fetch_failed";
    throw new ProvisioningError(code, `${dest}: ${verdict.reason}`);
  }
  await rename(part, dest);
  return verdict.size ?? 0;
}
