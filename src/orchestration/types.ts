// Orchestration-specific types
import type { Logger } from '../logger';

export interface StageContext {
  pipeline: string;
  stage: string;
  log: Logger;
  signal?: AbortSignal;
}

export type PreconditionResult = { met: true } | { met: false; reason: string };

export interface ProvisioningStage {
  name: string;
  /** Evaluated right before the stage; an unmet precondition ends the pipeline without error */
  precondition?(context: StageContext): Promise<PreconditionResult>;
  run(context: StageContext): Promise<void>;
}

export interface Pipeline {
  name: string;
  stages: ProvisioningStage[];
}

export const met: PreconditionResult = { met: true };

export function unmet(reason: string): PreconditionResult {
  return { met: false, reason };
}
