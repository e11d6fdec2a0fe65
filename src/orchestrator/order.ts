import type { ProvisioningStep } from "../types/contracts.js";
import { ProvisioningError } from "../errors.js";

/** Steps sorted by ordinal. Ordinals must be unique. */
export function orderSteps<S extends ProvisioningStep>(steps: readonly S[]): S[] {
  const seen = new Set<number>();
  for (const s of steps) {
    if (seen.has(s.ordinal)) throw new ProvisioningError("invalid_manifest", `duplicate ordinal ${s.ordinal}`);
    seen.add(s.ordinal);
  }
  return steps.slice().sort((a, b) => a.ordinal - b.ordinal);
}
