import type { PhaseDefinition } from "../core/phase.js";
import { automationUserPhase } from "./automation-user.js";
import { baseTemplatePhase } from "./base-template.js";
import { cloudImagePhase } from "./cloud-image.js";
import type { PhaseDeps } from "./common.js";
import { goldenImagePhase } from "./golden-image.js";
import { infrastructurePhase } from "./infrastructure.js";
import { kubernetesPhase } from "./kubernetes.js";
import { packerConfigPhase } from "./packer-config.js";
import { toolsStoragePhase } from "./tools-storage.js";
import { validationPhase } from "./validation.js";

export { PHASE_IDS, type PhaseId, type PhaseDeps } from "./common.js";

/** The ordered phase list; golden_image is present only when Packer is enabled. */
export function buildPhases(deps: PhaseDeps): PhaseDefinition[] {
  const phases = [
    validationPhase(deps),
    toolsStoragePhase(deps),
    automationUserPhase(deps),
    cloudImagePhase(deps),
    baseTemplatePhase(deps),
    packerConfigPhase(deps),
  ];
  if (deps.config.packer.enabled) phases.push(goldenImagePhase(deps));
  phases.push(infrastructurePhase(deps), kubernetesPhase(deps));
  return phases;
}
