// Main entry point for cluster-bootstrap
export * from './types';
export * from './errors';
export * from './logger';

export * from './config/types';
export * from './config/loader';
export * from './config/validator';
export * from './config/naming';

export * from './store/types';
export * from './store/fields';
export * from './store/memory-store';
export * from './store/kubernetes-store';

export * from './provisioning/types';
export * from './provisioning/clock';
export * from './provisioning/resource-ensurer';
export * from './provisioning/readiness-poller';
export * from './provisioning/credential-deriver';
export * from './provisioning/rollout-trigger';
export * from './provisioning/account-synchronizer';
export * from './provisioning/acme-dns-client';

export * from './templates/types';
export * from './templates/common';
export * from './templates/storage';
export * from './templates/acme-dns';
export * from './templates/ingress';
export * from './templates/registry';
export * from './templates/webhook';

export * from './orchestration/types';
export * from './orchestration/stage-sequencer';

// Main provisioning function
export { BootstrapOrchestrator, provision, plan, PIPELINE_ORDER } from './orchestration/bootstrap-orchestrator';
export type { OrchestratorOptions, PlanBlock, ProvisioningPlan } from './orchestration/bootstrap-orchestrator';
