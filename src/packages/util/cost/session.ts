/*
The list of declared workloads and which one is being edited.

This is explicit application state: every function returns a new
session and leaves its argument alone, so whoever owns the session
(a UI store, a request handler, ...) just passes it to calculate().
*/

import type { WorkloadDescriptor } from "./types";

export interface EstimateSession {
  readonly workloads: readonly WorkloadDescriptor[];
  // index into workloads of the row being edited, if any
  readonly editingIndex?: number;
}

export function emptySession(): EstimateSession {
  return { workloads: [] };
}

function checkIndex(session: EstimateSession, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= session.workloads.length) {
    throw new RangeError(
      `no workload at index ${index} (there are ${session.workloads.length})`,
    );
  }
}

export function addWorkload(
  session: EstimateSession,
  workload: WorkloadDescriptor,
): EstimateSession {
  return { ...session, workloads: [...session.workloads, workload] };
}

// Replacing the workload being edited also ends editing.
export function updateWorkload(
  session: EstimateSession,
  index: number,
  workload: WorkloadDescriptor,
): EstimateSession {
  checkIndex(session, index);
  const workloads = session.workloads.slice();
  workloads[index] = workload;
  return {
    workloads,
    editingIndex:
      session.editingIndex === index ? undefined : session.editingIndex,
  };
}

export function removeWorkload(
  session: EstimateSession,
  index: number,
): EstimateSession {
  checkIndex(session, index);
  const workloads = session.workloads.filter((_, i) => i != index);
  let { editingIndex } = session;
  if (editingIndex != null && editingIndex >= index) {
    // removing the row being edited cancels the edit; removing one
    // above it shifts it up by one.
    editingIndex = editingIndex == index ? undefined : editingIndex - 1;
  }
  return { workloads, editingIndex };
}

export function clearWorkloads(): EstimateSession {
  return emptySession();
}

export function startEditing(
  session: EstimateSession,
  index: number,
): EstimateSession {
  checkIndex(session, index);
  return { ...session, editingIndex: index };
}

export function cancelEditing(session: EstimateSession): EstimateSession {
  return { workloads: session.workloads };
}

export function editingWorkload(
  session: EstimateSession,
): WorkloadDescriptor | undefined {
  if (session.editingIndex == null) {
    return undefined;
  }
  return session.workloads[session.editingIndex];
}
