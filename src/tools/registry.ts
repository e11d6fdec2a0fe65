import type { ToolRegistry } from "../types/tools.js";
import { makeDirectoryTool } from "./fs/makeDirectory.js";
import { moveFileTool } from "./fs/moveFile.js";
import { fetchFileTool } from "./http/fetchFile.js";
import { extractArchiveTool } from "./archive/extract.js";
import { installPackageTool } from "./packages/install.js";
import { cloneRepositoryTool } from "./git/clone.js";
import { driveDownloadTool } from "./drive/download.js";
import { runScriptTool } from "./script/run.js";

export function buildToolRegistry(): ToolRegistry {
  return {
    [makeDirectoryTool.kind]: makeDirectoryTool,
    [fetchFileTool.kind]: fetchFileTool,
    [extractArchiveTool.kind]: extractArchiveTool,
    [installPackageTool.kind]: installPackageTool,
    [cloneRepositoryTool.kind]: cloneRepositoryTool,
    [driveDownloadTool.kind]: driveDownloadTool,
    [moveFileTool.kind]: moveFileTool,
    [runScriptTool.kind]: runScriptTool
  };
}
