import { PHASE_IDS } from "../phases/common.js";
import { StateStore } from "../state/state-store.js";

export type PhaseStatusRow = {
  phase: string;
  status: "COMPLETED" | "pending";
  timestamp: string | null;
};

export type ResourceRow = {
  type: string;
  id: string;
  created: string;
};

export type StatusResult = {
  ok: true;
  stateFile: string;
  lastUpdated: string;
  phases: PhaseStatusRow[];
  resources: ResourceRow[];
};

/**
 * Read the state document directly; no runner and no remote calls.
 * Known phases come first in declaration order, then any others the document holds.
 */
export function status(stateFile: string): StatusResult {
  const doc = new StateStore(stateFile).snapshot();
  const known: string[] = [...PHASE_IDS];
  const extra = Object.keys(doc.phases).filter((p) => !known.includes(p)).sort();

  const phases = [...known, ...extra].map((phase): PhaseStatusRow => {
    const rec = doc.phases[phase];
    return rec?.completed
      ? { phase, status: "COMPLETED", timestamp: rec.timestamp }
      : { phase, status: "pending", timestamp: null };
  });

  const resources: ResourceRow[] = [];
  for (const type of Object.keys(doc.resources).sort()) {
    for (const [id, rec] of Object.entries(doc.resources[type])) {
      resources.push({ type, id, created: rec.created });
    }
  }

  return { ok: true, stateFile, lastUpdated: doc.last_updated, phases, resources };
}
