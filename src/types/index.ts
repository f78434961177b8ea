// Core type definitions for cluster bootstrap
import type { V1ObjectMeta } from '@kubernetes/client-node';

export interface ResourceRef {
  apiVersion: string;
  kind: string;
  /** Omitted for cluster-scoped resources */
  namespace?: string;
  name: string;
}

/**
 * Object metadata with a mandatory name. resourceVersion is the version
 * token used for optimistic concurrency on update.
 */
export type ObjectMeta = V1ObjectMeta & { name: string };

/**
 * A resource document as held by the store. Everything besides
 * apiVersion/kind/metadata (spec, data, status, ...) is kind specific.
 */
export interface ResourceObject {
  apiVersion: string;
  kind: string;
  metadata: ObjectMeta;
  [field: string]: unknown;
}

export type AcmeEnvironment = 'production' | 'staging';

export type ComponentName = 'storage' | 'acmeDns' | 'ingress' | 'registry' | 'buildkit' | 'webhook';

export interface NamingSettings {
  /** Prefix applied to every generated resource name */
  prefix?: string;
  platformNamespace?: string;
  registryNamespace?: string;
  buildkitNamespace?: string;
  /** Domain-scoped annotation prefix, e.g. bootstrap.example.io */
  annotationPrefix?: string;
}

export interface PollingSettings {
  intervalMs: number;
  timeoutMs: number;
  /** 1 keeps a fixed interval; >1 enables capped exponential backoff */
  backoffFactor: number;
  maxIntervalMs: number;
}

export interface AcmeDnsSettings {
  /** Registration endpoint; defaults to the in-cluster acme-dns service */
  registrationUrl?: string;
  allowFrom?: string[];
}

export interface BootstrapConfig {
  /** Base domain; provisioning of domain-bound pipelines is skipped without it */
  domain?: string;
  acmeEmail?: string;
  acmeEnvironment: AcmeEnvironment;
  gatewayClassName: string;
  webhookUrl?: string;
  naming: NamingSettings;
  polling: PollingSettings;
  components: Record<ComponentName, boolean>;
  acmeDns: AcmeDnsSettings;
}

export type EnsureStatus = 'created' | 'exists';

export interface EnsureOutcome {
  ref: ResourceRef;
  status: EnsureStatus;
}

export interface ProvisioningMetadata {
  runId: string;
  timestamp: Date;
  duration?: number;
}

export interface PipelineReport {
  pipeline: string;
  completed: string[];
  /** Present when a stage precondition was unmet and the pipeline yielded */
  skipped?: {
    stage: string;
    reason: string;
  };
}

export interface ProvisioningReport {
  pipelines: PipelineReport[];
  resources: EnsureOutcome[];
  restarts: RestartRecord[];
  metadata: ProvisioningMetadata;
}

export interface RestartRecord {
  ref: ResourceRef;
  restartedAt: string;
}
