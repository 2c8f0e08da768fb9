/**
 * Sync decision planning
 *
 * Pure comparison of the remote inventory against the indexed inventory.
 * No I/O happens here; the orchestrator executes the plan.
 */

import { RemoteFile, SyncDecision, SyncMode } from '../types/index.js';

export type IndexDecision = SyncDecision.IndexNew | SyncDecision.IndexUpdated;

export interface PlannedFile {
  file: RemoteFile;
  decision: IndexDecision;
}

export interface SyncPlan {
  toIndex: PlannedFile[];
  toSkip: RemoteFile[];
  /**
   * Indexed ids with no remote counterpart
   */
  toDelete: string[];
  /**
   * Ids listed more than once; only the first occurrence is planned
   */
  duplicates: string[];
}

/**
 * Strictly-newer comparison of two ISO-8601 timestamps.
 * A timestamp that cannot be parsed counts as changed.
 */
export function isNewer(remoteTime: string, indexedTime: string): boolean {
  const remote = Date.parse(remoteTime);
  const indexed = Date.parse(indexedTime);

  if (Number.isNaN(remote) || Number.isNaN(indexed)) {
    return true;
  }

  return remote > indexed;
}

export function classifyFile(
  file: RemoteFile,
  indexedTime: string | undefined,
  mode: SyncMode
): SyncDecision {
  if (indexedTime === undefined) {
    return SyncDecision.IndexNew;
  }

  if (mode === 'full' || isNewer(file.modifiedTime, indexedTime)) {
    return SyncDecision.IndexUpdated;
  }

  return SyncDecision.SkipUnchanged;
}

export function planSync(
  remoteFiles: readonly RemoteFile[],
  indexed: ReadonlyMap<string, string>,
  mode: SyncMode
): SyncPlan {
  const plan: SyncPlan = { toIndex: [], toSkip: [], toDelete: [], duplicates: [] };
  const remoteIds = new Set<string>();

  for (const file of remoteFiles) {
    if (remoteIds.has(file.id)) {
      plan.duplicates.push(file.id);
      continue;
    }
    remoteIds.add(file.id);

    const decision = classifyFile(file, indexed.get(file.id), mode);

    if (decision === SyncDecision.IndexNew || decision === SyncDecision.IndexUpdated) {
      plan.toIndex.push({ file, decision });
    } else {
      plan.toSkip.push(file);
    }
  }

  for (const fileId of indexed.keys()) {
    if (!remoteIds.has(fileId)) {
      plan.toDelete.push(fileId);
    }
  }

  return plan;
}
