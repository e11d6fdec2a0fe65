import { mkdir } from "node:fs/promises";
import type { MakeDirectoryStep } from "../../types/contracts.js";
import type { ToolSpec } from "../../types/tools.js";
import { isDirectory, resolveIn } from "../../workspace.js";

export async function makeDirectory(dir: string): Promise<boolean> {
  const existed = await isDirectory(dir);
  await mkdir(dir, { recursive: true });
  return !existed;
}

export const makeDirectoryTool: ToolSpec<MakeDirectoryStep> = {
  kind: "make-directory",
  describe: step => `mkdir ${step.target}`,
  async invoke(step, ctx) {
    const dir = resolveIn(ctx.root, step.target);
    const created = await makeDirectory(dir);
    return { status: created ? "done" : "skipped", paths: [dir], detail: created ? undefined : "already present" };
  }
};
