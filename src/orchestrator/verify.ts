import type { Manifest } from "../types/contracts.js";
import { fileSize, isDirectory, isNonEmptyDir, resolveIn, sha256File } from "../workspace.js";
import { finalOutputs } from "./compiler.js";

export interface Verdict {
  pass: boolean;
  intent?: "missing" | "empty" | "integrity";
  reason?: string;
  size?: number;
}

export async function verifyArtifact(file: string, sha256?: string): Promise<Verdict> {
  const size = await fileSize(file);
  if (size === null) return { pass: false, intent: "missing", reason: "no file was written" };
  if (size === 0) return { pass: false, intent: "empty", reason: "download is empty", size };
  if (sha256) {
    const actual = await sha256File(file);
    if (actual.toLowerCase() !== sha256.toLowerCase()) {
      return { pass: false, intent: "integrity", reason: `sha256 ${actual} does not match expected ${sha256}`, size };
    }
  }
  return { pass: true, size };
}

export interface OutputCheck extends Verdict {
  ordinal: number;
  path: string;
}

/**
 * Checks every destination the manifest declares. Directories made by
 * `make-directory` only need to exist; everything else must be non-empty.
 * Returns the failing checks.
 */
export async function verifyOutputs(manifest: Manifest, root: string): Promise<OutputCheck[]> {
  const failed: OutputCheck[] = [];
  for (const out of finalOutputs(manifest)) {
    const abs = resolveIn(root, out.path);
    let verdict: Verdict;
    if (out.type === "file") {
      verdict = await verifyArtifact(abs);
    } else if (out.kind === "make-directory") {
      verdict = (await isDirectory(abs)) ? { pass: true } : { pass: false, intent: "missing", reason: "directory is missing" };
    } else {
      verdict = (await isNonEmptyDir(abs)) ? { pass: true } : { pass: false, intent: "empty", reason: "directory is missing or empty" };
    }
    if (!verdict.pass) failed.push({ ...verdict, ordinal: out.ordinal, path: out.path });
  }
  return failed;
}
