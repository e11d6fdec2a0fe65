// src/tools/cli/exec.ts
import type { CommandOptions, CommandOutput, CommandRunner } from "../../types/tools.js";
import { execFile as cpExecFile } from "node:child_process";
import { promisify } from "node:util";
import { command as logCommand } from "../../log.js";
const execFile = promisify(cpExecFile);

// tar -v and git progress can be chatty
const MAX_BUFFER = 64 * 1024 * 1024;

function field(e: unknown, key: "code" | "errno" | "stdout" | "stderr" | "message"): unknown {
  if (e && typeof e === "object" && key in e) return Reflect.get(e, key);
  return undefined;
}

export const cliExec: CommandRunner = {
  async run(cmd: string, args: string[], opts: CommandOptions): Promise<CommandOutput> {
    logCommand(cmd, args, opts.cwd);
    try {
      const { stdout, stderr } = await execFile(cmd, args, {
        cwd: opts.cwd,
        timeout: opts.timeoutMs,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8"
      });
      return { ok: true, stdout, stderr, exit_code: 0 };
    } catch (e: unknown) {
      const code = field(e, "code") ?? field(e, "errno") ?? "ERR";
      const stdout = field(e, "stdout");
      const stderr = field(e, "stderr");
      return {
        ok: false,
        stdout: typeof stdout === "string" ? stdout : "",
        stderr: typeof stderr === "string" && stderr ? stderr : String(field(e, "message") ?? e),
        exit_code: typeof code === "number" || typeof code === "string" ? code : "ERR"
      };
    }
  }
};

/** Renders a failed command for an error message: `git clone … exited 128`. */
export function describeFailure(cmd: string, args: string[], out: CommandOutput): string {
  return `${[cmd, ...args].join(" ")} exited ${out.exit_code}`;
}
