import type { Logger } from "pino";
import { StateStore } from "../state/state-store.js";

export type ResetResult = { ok: true; stateFile: string };

/** Forget every recorded phase and resource. Nothing on the host is touched. */
export function reset(stateFile: string, logger?: Logger): ResetResult {
  const store = new StateStore(stateFile, logger);
  store.reset();
  logger?.warn({ state_file: stateFile }, "deployment state reset");
  return { ok: true, stateFile };
}
