import { z } from "zod";

export const PHASES = ["workspace", "models", "tools", "repositories", "simulator"] as const;
export type Phase = (typeof PHASES)[number];

const relPath = z.string().trim().min(1, "path must not be empty");
const segment = z
  .string()
  .min(1)
  .refine(n => n !== "." && n !== ".." && !/[/\\]/.test(n), "file name must be a single path segment");
const sha256 = z.string().regex(/^[0-9a-f]{64}$/i, "sha256 must be 64 hex characters");

const base = {
  ordinal: z.number().int().positive(),
  phase: z.enum(PHASES),
  label: z.string().optional()
};

export const MakeDirectoryStepSchema = z.object({
  ...base,
  kind: z.literal("make-directory"),
  target: relPath
});

export const FetchFileStepSchema = z.object({
  ...base,
  kind: z.literal("fetch-file"),
  source: z.string().url(),
  target: relPath,
  fileName: segment.optional(),
  sha256: sha256.optional()
});

export const ExtractArchiveStepSchema = z.object({
  ...base,
  kind: z.literal("extract-archive"),
  source: relPath,
  target: relPath,
  /** Top-level directory the archive unpacks into, checked after the run. */
  creates: segment.optional()
});

export const InstallPackageStepSchema = z.object({
  ...base,
  kind: z.literal("install-package"),
  source: z.string().min(1),
  manager: z.enum(["pip", "apt"]),
  scope: z.enum(["user", "system"])
});

export const CloneRepositoryStepSchema = z.object({
  ...base,
  kind: z.literal("clone-repository"),
  source: z.string().min(1),
  target: relPath
});

export const DriveDownloadStepSchema = z.object({
  ...base,
  kind: z.literal("drive-download"),
  source: z.string().min(1),
  target: relPath,
  sha256: sha256.optional()
});

export const MoveFileStepSchema = z.object({
  ...base,
  kind: z.literal("move-file"),
  source: relPath,
  target: relPath
});

export const RunScriptStepSchema = z.object({
  ...base,
  kind: z.literal("run-script"),
  source: z.string().min(1),
  args: z.array(z.string()).default([]),
  target: relPath
});

export const ProvisioningStepSchema = z
  .discriminatedUnion("kind", [
    MakeDirectoryStepSchema,
    FetchFileStepSchema,
    ExtractArchiveStepSchema,
    InstallPackageStepSchema,
    CloneRepositoryStepSchema,
    DriveDownloadStepSchema,
    MoveFileStepSchema,
    RunScriptStepSchema
  ])
  .refine(s => !(s.kind === "install-package" && s.manager === "apt" && s.scope === "user"), {
    message: "apt packages can only be installed system-wide",
    path: ["scope"]
  });

export const ManifestSchema = z.object({
  name: z.string().min(1),
  steps: z.array(ProvisioningStepSchema).min(1, "manifest has no steps")
});

export type MakeDirectoryStep = z.infer<typeof MakeDirectoryStepSchema>;
export type FetchFileStep = z.infer<typeof FetchFileStepSchema>;
export type ExtractArchiveStep = z.infer<typeof ExtractArchiveStepSchema>;
export type InstallPackageStep = z.infer<typeof InstallPackageStepSchema>;
export type CloneRepositoryStep = z.infer<typeof CloneRepositoryStepSchema>;
export type DriveDownloadStep = z.infer<typeof DriveDownloadStepSchema>;
export type MoveFileStep = z.infer<typeof MoveFileStepSchema>;
export type RunScriptStep = z.infer<typeof RunScriptStepSchema>;

export type ProvisioningStep = z.infer<typeof ProvisioningStepSchema>;
export type StepKind = ProvisioningStep["kind"];
export type Manifest = z.infer<typeof ManifestSchema>;
/** Manifest as written on disk, before defaults are applied. */
export type ManifestInput = z.input<typeof ManifestSchema>;
