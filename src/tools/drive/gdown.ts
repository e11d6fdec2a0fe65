import path from "node:path";
import type { AuthenticatedDownloader, CommandRunner } from "../../types/tools.js";
import { ProvisioningError, tail } from "../../errors.js";
import { describeFailure } from "../cli/exec.js";

const DRIVE_ID = /^[A-Za-z0-9_-]{10,}$/;

/** Accepts a bare drive file identifier or any URL the helper understands. */
export function driveUrl(source: string): string {
  if (/^https?:\/\//i.test(source)) return source;
  if (DRIVE_ID.test(source)) return `https://drive.google.com/uc?id=${source}`;
  throw new ProvisioningError("invalid_manifest", `not a drive file identifier or URL: ${source}`);
}

/**
 * Drive downloads through the `gdown` helper, which handles the confirmation
 * cookie large shared files need. The helper is installed by an earlier step,
 * so its path is only checked when a download runs.
 */
export class GdownDownloader implements AuthenticatedDownloader {
  constructor(
    private readonly runner: CommandRunner,
    private readonly bin: string,
    private readonly timeoutMs?: number
  ) {}

  async download(source: string, outputPath: string): Promise<void> {
    const args = [driveUrl(source), "--output", outputPath];
    const out = await this.runner.run(this.bin, args, { cwd: path.dirname(outputPath), timeoutMs: this.timeoutMs });
    if (!out.ok) {
      const hint = out.exit_code === "ENOENT" ? ` (is ${this.bin} installed?)` : "";
      throw new ProvisioningError("fetch_failed", describeFailure(this.bin, args, out) + hint, { stderr: tail(out.stderr) });
    }
  }
}
