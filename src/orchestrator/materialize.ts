import { saveArtifact } from "../journal/fsStore.js";
import { errorMessage } from "../errors.js";
import { warn } from "../log.js";

export interface Journal {
  baseDir: string;
  runId: string;
}

export function writeJson(journal: Journal, name: string, obj: unknown) {
  const path = saveArtifact(journal.baseDir, journal.runId, name, JSON.stringify(obj, null, 2));
  return path;
}

/** Journal writes never fail a run; a write error is reported and the run goes on. */
export function record(journal: Journal | undefined, name: string, obj: unknown) {
  if (!journal) return;
  try {
    writeJson(journal, name, obj);
  } catch (e: unknown) {
    warn(`could not write ${name} to run journal ${journal.runId}: ${errorMessage(e)}`);
  }
}
