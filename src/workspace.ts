import { createReadStream } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import { ProvisioningError } from "./errors.js";

/** Root marker for normalized relative paths. */
export const ROOT = ".";

/**
 * Normalizes a manifest path to POSIX form relative to the workspace root.
 * Returns null for absolute paths and paths that climb out of the root.
 */
export function normalizeRel(p: string): string | null {
  const trimmed = p.trim();
  if (!trimmed || path.posix.isAbsolute(trimmed) || path.win32.isAbsolute(trimmed)) return null;
  const norm = path.posix.normalize(trimmed.replace(/\\/g, "/")).replace(/\/+$/, "");
  if (norm === ".." || norm.startsWith("../")) return null;
  return norm || ROOT;
}

export function parentOf(rel: string): string {
  return path.posix.dirname(rel);
}

export function resolveIn(root: string, rel: string): string {
  const norm = normalizeRel(rel);
  if (norm === null) throw new ProvisioningError("invalid_manifest", `path escapes the workspace root: ${rel}`);
  return path.resolve(root, norm);
}

/** A single path segment: no separators, not `.` or `..`. */
export function isPlainFileName(name: string): boolean {
  return name.length > 0 && name !== "." && name !== ".." && !/[/\\]/.test(name);
}

/** Last segment of the URL path, as wget would name the download. */
export function remoteFileName(url: string): string {
  const segments = new URL(url).pathname.split("/").filter(Boolean);
  const last = segments[segments.length - 1];
  if (!last) throw new ProvisioningError("invalid_manifest", `cannot derive a file name from ${url}`);
  const name = decodeURIComponent(last);
  if (!isPlainFileName(name)) {
    throw new ProvisioningError("invalid_manifest", `file name must be a single path segment: '${name}' from ${url}`);
  }
  return name;
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch (e: unknown) {
    if (isMissing(e)) return false;
    throw e;
  }
}

/** Size of a regular file, or null when nothing is there. */
export async function fileSize(p: string): Promise<number | null> {
  try {
    const st = await stat(p);
    return st.isFile() ? st.size : null;
  } catch (e: unknown) {
    if (isMissing(e)) return null;
    throw e;
  }
}

export async function isNonEmptyDir(p: string): Promise<boolean> {
  if (!(await isDirectory(p))) return false;
  return (await readdir(p)).length > 0;
}

export async function requireRoot(root: string): Promise<void> {
  if (!(await isDirectory(root))) {
    throw new ProvisioningError("missing_prerequisite", `workspace root ${root} does not exist`);
  }
}

export async function sha256File(p: string): Promise<string> {
  const hash = createHash("sha256");
  const stream = createReadStream(p);
  return await new Promise<string>((resolve, reject) => {
    stream.on("data", chunk => hash.update(chunk));
    stream.once("error", reject);
    stream.once("end", () => resolve(hash.digest("hex")));
  });
}

export function isMissing(e: unknown): boolean {
  return !!e && typeof e === "object" && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}
