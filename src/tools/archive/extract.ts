import path from "node:path";
import type { ExtractArchiveStep } from "../../types/contracts.js";
import type { CommandRunner, ToolSpec } from "../../types/tools.js";
import { ProvisioningError, tail } from "../../errors.js";
import { fileSize, isDirectory, resolveIn } from "../../workspace.js";
import { describeFailure } from "../cli/exec.js";

/** Unpacks a tar archive (any compression tar detects) into `destinationDir`. */
export async function extractArchive(
  runner: CommandRunner,
  archivePath: string,
  destinationDir: string,
  timeoutMs?: number
): Promise<void> {
  if (!(await fileSize(archivePath))) {
    throw new ProvisioningError("missing_prerequisite", `archive ${archivePath} is missing or empty`);
  }
  if (!(await isDirectory(destinationDir))) {
    throw new ProvisioningError("missing_prerequisite", `destination directory ${destinationDir} does not exist`);
  }
  const args = ["-xf", archivePath, "-C", destinationDir];
  const out = await runner.run("tar", args, { cwd: destinationDir, timeoutMs });
  if (!out.ok) {
    throw new ProvisioningError("extract_failed", describeFailure("tar", args, out), { stderr: tail(out.stderr) });
  }
}

export const extractArchiveTool: ToolSpec<ExtractArchiveStep> = {
  kind: "extract-archive",
  describe: step => `untar ${step.source} → ${step.target}/`,
  async invoke(step, ctx) {
    const dir = resolveIn(ctx.root, step.target);
    await extractArchive(ctx.runner, resolveIn(ctx.root, step.source), dir, ctx.commandTimeoutMs);
    return { status: "done", paths: [step.creates ? path.join(dir, step.creates) : dir] };
  }
};
