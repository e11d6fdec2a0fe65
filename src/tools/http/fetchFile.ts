import { open, rm } from "node:fs/promises";
import path from "node:path";
import type { FetchFileStep } from "../../types/contracts.js";
import type { FetchLike, ToolSpec } from "../../types/tools.js";
import { ProvisioningError, errorMessage } from "../../errors.js";
import { isDirectory, isPlainFileName, remoteFileName, resolveIn } from "../../workspace.js";
import { fmtBytes } from "../../log.js";
import { fetchedCopy, landTransfer, partPath, relocatedPath } from "./transfer.js";

export interface FetchOptions {
  fetch: FetchLike;
  timeoutMs: number;
  /** Overrides the name taken from the URL. */
  fileName?: string;
  sha256?: string;
  /** Where a later step moves the file; a copy there counts as fetched. */
  movedTo?: string;
}

async function streamTo(res: Response, file: string): Promise<number> {
  if (!res.body) return 0;
  const handle = await open(file, "w");
  const reader = res.body.getReader();
  let bytes = 0;
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      await handle.write(value);
      bytes += value.byteLength;
    }
    finished = true;
  } finally {
    if (!finished) await reader.cancel();
    await handle.close();
  }
  return bytes;
}

export async function fetchFile(
  url: string,
  destinationDir: string,
  opts: FetchOptions
): Promise<{ path: string; fetched: boolean; bytes: number }> {
  const name = opts.fileName ?? remoteFileName(url);
  if (!isPlainFileName(name)) {
    throw new ProvisioningError("invalid_manifest", `file name must be a single path segment: '${name}'`);
  }
  const dest = path.join(destinationDir, name);
  if (!(await isDirectory(destinationDir))) {
    throw new ProvisioningError("missing_prerequisite", `destination directory ${destinationDir} does not exist`);
  }
  const existing = await fetchedCopy([dest, opts.movedTo], opts.sha256);
  if (existing) return { path: existing, fetched: false, bytes: 0 };

  const part = partPath(dest);
  try {
    const res = await opts.fetch(url, { redirect: "follow", signal: AbortSignal.timeout(opts.timeoutMs) });
    if (!res.ok) {
      await res.body?.cancel();
      throw new ProvisioningError("fetch_failed", `GET ${url} returned HTTP ${res.status}`);
    }
    await streamTo(res, part);
  } catch (e: unknown) {
    await rm(part, { force: true });
    if (e instanceof ProvisioningError) throw e;
    throw new ProvisioningError("fetch_failed", `GET ${url} failed: ${errorMessage(e)}`, { cause: e });
  }
  const bytes = await landTransfer(part, dest, opts.sha256);
  return { path: dest, fetched: true, bytes };
}

export const fetchFileTool: ToolSpec<FetchFileStep> = {
  kind: "fetch-file",
  describe: step => `fetch ${step.source} → ${step.target}/`,
  async invoke(step, ctx) {
    const name = step.fileName ?? remoteFileName(step.source);
    const res = await fetchFile(step.source, resolveIn(ctx.root, step.target), {
      fetch: ctx.fetch,
      timeoutMs: ctx.fetchTimeoutMs,
      fileName: name,
      sha256: step.sha256,
      movedTo: relocatedPath(ctx, path.posix.join(step.target, name))
    });
    return res.fetched
      ? { status: "done", paths: [res.path], detail: fmtBytes(res.bytes) }
      : { status: "skipped", paths: [res.path], detail: "already fetched" };
  }
};
