import { rm } from "node:fs/promises";
import path from "node:path";
import type { DriveDownloadStep } from "../../types/contracts.js";
import type { AuthenticatedDownloader, ToolSpec } from "../../types/tools.js";
import { ProvisioningError, errorMessage } from "../../errors.js";
import { isDirectory, resolveIn } from "../../workspace.js";
import { fmtBytes } from "../../log.js";
import { fetchedCopy, landTransfer, partPath, relocatedPath } from "../http/transfer.js";

export async function runAuthenticatedDownload(
  drive: AuthenticatedDownloader,
  fileId: string,
  outputPath: string,
  sha256?: string,
  movedTo?: string
): Promise<{ path: string; fetched: boolean; bytes: number }> {
  const dir = path.dirname(outputPath);
  if (!(await isDirectory(dir))) {
    throw new ProvisioningError("missing_prerequisite", `destination directory ${dir} does not exist`);
  }
  const existing = await fetchedCopy([outputPath, movedTo], sha256);
  if (existing) return { path: existing, fetched: false, bytes: 0 };

  const part = partPath(outputPath);
  try {
    await drive.download(fileId, part);
  } catch (e: unknown) {
    await rm(part, { force: true });
    if (e instanceof ProvisioningError) throw e;
    throw new ProvisioningError("fetch_failed", `drive download of ${fileId} failed: ${errorMessage(e)}`, { cause: e });
  }
  const bytes = await landTransfer(part, outputPath, sha256);
  return { path: outputPath, fetched: true, bytes };
}

export const driveDownloadTool: ToolSpec<DriveDownloadStep> = {
  kind: "drive-download",
  describe: step => `drive ${step.source.length > 48 ? step.source.slice(0, 48) + "…" : step.source} → ${step.target}`,
  async invoke(step, ctx) {
    const out = resolveIn(ctx.root, step.target);
    const res = await runAuthenticatedDownload(ctx.drive, step.source, out, step.sha256, relocatedPath(ctx, step.target));
    return res.fetched
      ? { status: "done", paths: [res.path], detail: fmtBytes(res.bytes) }
      : { status: "skipped", paths: [res.path], detail: "already fetched" };
  }
};
