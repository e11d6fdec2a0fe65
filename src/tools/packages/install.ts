import type { InstallPackageStep } from "../../types/contracts.js";
import type { ToolContext, ToolSpec } from "../../types/tools.js";
import { ProvisioningError, tail } from "../../errors.js";
import { describeFailure } from "../cli/exec.js";

export type PackageManager = InstallPackageStep["manager"];
export type InstallScope = InstallPackageStep["scope"];

export interface InstallCommand {
  cmd: string;
  args: string[];
}

/**
 * pip/user   → pip install --user <name>
 * pip/system → pip install <name>
 * apt/system → sudo apt-get -y install <name>
 */
export function installCommand(
  name: string,
  manager: PackageManager,
  scope: InstallScope,
  bins: Pick<ToolContext, "pipBin" | "aptBin" | "useSudo">
): InstallCommand {
  if (manager === "pip") {
    return { cmd: bins.pipBin, args: scope === "user" ? ["install", "--user", name] : ["install", name] };
  }
  if (scope === "user") {
    throw new ProvisioningError("invalid_manifest", `apt cannot install ${name} for the current user only`);
  }
  const apt = [bins.aptBin, "-y", "install", name];
  return bins.useSudo ? { cmd: "sudo", args: apt } : { cmd: apt[0], args: apt.slice(1) };
}

export const installPackageTool: ToolSpec<InstallPackageStep> = {
  kind: "install-package",
  describe: step => `${step.manager} install ${step.source} (${step.scope})`,
  async invoke(step, ctx) {
    const { cmd, args } = installCommand(step.source, step.manager, step.scope, ctx);
    const out = await ctx.runner.run(cmd, args, { cwd: ctx.root, timeoutMs: ctx.commandTimeoutMs });
    if (!out.ok) {
      throw new ProvisioningError("install_failed", describeFailure(cmd, args, out), { stderr: tail(out.stderr) });
    }
    return { status: "done", paths: [] };
  }
};
