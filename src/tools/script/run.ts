import type { RunScriptStep } from "../../types/contracts.js";
import type { ToolSpec } from "../../types/tools.js";
import { ProvisioningError, tail } from "../../errors.js";
import { isDirectory, resolveIn } from "../../workspace.js";
import { describeFailure } from "../cli/exec.js";

export const runScriptTool: ToolSpec<RunScriptStep> = {
  kind: "run-script",
  describe: step => [step.source, ...step.args].join(" "),
  async invoke(step, ctx) {
    const cwd = resolveIn(ctx.root, step.target);
    if (!(await isDirectory(cwd))) {
      throw new ProvisioningError("missing_prerequisite", `working directory ${cwd} does not exist`);
    }
    const out = await ctx.runner.run(step.source, step.args, { cwd, timeoutMs: ctx.commandTimeoutMs });
    if (!out.ok) {
      throw new ProvisioningError("command_failed", describeFailure(step.source, step.args, out), { stderr: tail(out.stderr) });
    }
    return { status: "done", paths: [] };
  }
};
