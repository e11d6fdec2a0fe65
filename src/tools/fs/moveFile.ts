import { rename } from "node:fs/promises";
import path from "node:path";
import type { MoveFileStep } from "../../types/contracts.js";
import type { ToolSpec } from "../../types/tools.js";
import { ProvisioningError } from "../../errors.js";
import { fileSize, isDirectory, resolveIn } from "../../workspace.js";

/** Moves `source` into `destinationDir` under its own basename; returns the new path. */
export async function moveFile(source: string, destinationDir: string): Promise<{ path: string; moved: boolean }> {
  const dest = path.join(destinationDir, path.basename(source));
  if ((await fileSize(source)) === null) {
    // A previous run already relocated it.
    if ((await fileSize(dest)) !== null) return { path: dest, moved: false };
    throw new ProvisioningError("missing_prerequisite", `nothing to move: ${source} does not exist`);
  }
  if (!(await isDirectory(destinationDir))) {
    throw new ProvisioningError("missing_prerequisite", `destination directory ${destinationDir} does not exist`);
  }
  try {
    await rename(source, dest);
  } catch (e: unknown) {
    throw new ProvisioningError("command_failed", `could not move ${source} to ${dest}`, { cause: e });
  }
  return { path: dest, moved: true };
}

export const moveFileTool: ToolSpec<MoveFileStep> = {
  kind: "move-file",
  describe: step => `mv ${step.source} ${step.target}/`,
  async invoke(step, ctx) {
    const res = await moveFile(resolveIn(ctx.root, step.source), resolveIn(ctx.root, step.target));
    return { status: res.moved ? "done" : "skipped", paths: [res.path], detail: res.moved ? undefined : "already moved" };
  }
};
