import path from "node:path";
import type { CloneRepositoryStep } from "../../types/contracts.js";
import type { CommandRunner, ToolSpec } from "../../types/tools.js";
import { ProvisioningError, tail } from "../../errors.js";
import { isDirectory, isNonEmptyDir, resolveIn } from "../../workspace.js";
import { describeFailure } from "../cli/exec.js";

/** Clones `url` into `destinationDir`. Returns false when a checkout is already there. */
export async function cloneRepository(
  runner: CommandRunner,
  url: string,
  destinationDir: string,
  timeoutMs?: number
): Promise<boolean> {
  if (await isDirectory(path.join(destinationDir, ".git"))) return false;
  if (await isNonEmptyDir(destinationDir)) {
    throw new ProvisioningError("clone_failed", `${destinationDir} exists, is not empty and is not a git checkout`);
  }
  const parent = path.dirname(destinationDir);
  if (!(await isDirectory(parent))) {
    throw new ProvisioningError("missing_prerequisite", `parent directory ${parent} does not exist`);
  }
  const args = ["clone", url, destinationDir];
  const out = await runner.run("git", args, { cwd: parent, timeoutMs });
  if (!out.ok) {
    throw new ProvisioningError("clone_failed", describeFailure("git", args, out), { stderr: tail(out.stderr) });
  }
  return true;
}

export const cloneRepositoryTool: ToolSpec<CloneRepositoryStep> = {
  kind: "clone-repository",
  describe: step => `git clone ${step.source} ${step.target}`,
  async invoke(step, ctx) {
    const dir = resolveIn(ctx.root, step.target);
    const cloned = await cloneRepository(ctx.runner, step.source, dir, ctx.commandTimeoutMs);
    return cloned ? { status: "done", paths: [dir] } : { status: "skipped", paths: [dir], detail: "already cloned" };
  }
};
