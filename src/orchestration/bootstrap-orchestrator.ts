import { randomBytes as cryptoRandomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type {
  BootstrapConfig,
  ComponentName,
  EnsureOutcome,
  PipelineReport,
  ProvisioningMetadata,
  ProvisioningReport,
  ResourceObject,
  ResourceRef,
  RestartRecord
} from '../types';
import {
  MalformedInputError,
  OperationCancelledError,
  ReadinessTimeoutError,
  ResourceNotFoundError,
  StageFailedError
} from '../errors';
import { Logger, logger as rootLogger } from '../logger';
import { ResourceNames, resourceNamesFor } from '../config/naming';
import type { ResourceStore } from '../store/types';
import { MemoryResourceStore } from '../store/memory-store';
import { getString, readSecretData } from '../store/fields';
import { ResourceEnsurer } from '../provisioning/resource-ensurer';
import {
  deploymentReplicasReady,
  namespaceExists,
  secretHasKey,
  serviceHasExternalAddress,
  waitUntilReady
} from '../provisioning/readiness-poller';
import { deriveKeySet, encodeKeySet } from '../provisioning/credential-deriver';
import { RolloutTrigger, digestOf } from '../provisioning/rollout-trigger';
import { AccountSecretSynchronizer } from '../provisioning/account-synchronizer';
import { AcmeDnsClient, FetchFn } from '../provisioning/acme-dns-client';
import { ManualClock, systemClock } from '../provisioning/clock';
import type { Clock, ReadinessCondition, RestartResult } from '../provisioning/types';
import { managedLabels, namespaceManifest } from '../templates/common';
import { storageClasses } from '../templates/storage';
import {
  ACME_DNS_APP,
  ACME_DNS_CONFIG_FILE,
  acmeDnsConfigMap,
  acmeDnsDataClaim,
  acmeDnsDeployment,
  acmeDnsDnsService,
  acmeDnsHttpService,
  acmeDnsServiceUrl
} from '../templates/acme-dns';
import {
  acmeDnsApiRoute,
  clusterIssuer,
  deploymentNotFoundDeployment,
  deploymentNotFoundRoute,
  deploymentNotFoundService,
  gateway,
  httpRedirectRoute,
  httpsRoute,
  wildcardCertificate
} from '../templates/ingress';
import {
  CA_CERT_KEY,
  JWKS_KEY_ID,
  TLS_CERT_KEY,
  buildkitCaSecret,
  registryHttpSecret,
  registryJwksSecret
} from '../templates/registry';
import { webhookSigningSecret } from '../templates/webhook';
import type { TemplateContext } from '../templates/types';
import { runStages } from './stage-sequencer';
import { Pipeline, PreconditionResult, StageContext, met, unmet } from './types';

export interface OrchestratorOptions {
  clock?: Clock;
  logger?: Logger;
  fetchFn?: FetchFn;
  randomBytes?: (size: number) => Buffer;
  signal?: AbortSignal;
}

export const PIPELINE_ORDER: readonly ComponentName[] = ['storage', 'acmeDns', 'ingress', 'registry', 'buildkit', 'webhook'];

/**
 * Provisions the platform's infrastructure resources.
 *
 * Each component is an independent pipeline run by the stage sequencer, in
 * PIPELINE_ORDER. A pipeline that stops on an unmet precondition does not
 * stop the ones after it; a failing stage aborts the whole run.
 */
export class BootstrapOrchestrator {
  private readonly ensurer: ResourceEnsurer;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly randomBytes: (size: number) => Buffer;

  constructor(private readonly store: ResourceStore, private readonly options: OrchestratorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ module: 'orchestrator' });
    this.randomBytes = options.randomBytes ?? cryptoRandomBytes;
    this.ensurer = new ResourceEnsurer(store, this.log);
  }

  async provision(config: BootstrapConfig): Promise<ProvisioningReport> {
    const startTime = this.clock.now();
    const metadata: ProvisioningMetadata = {
      runId: uuidv4(),
      timestamp: new Date(startTime)
    };
    const run = new ProvisioningRun(this.store, this.ensurer, config, {
      clock: this.clock,
      log: this.log.child({ runId: metadata.runId }),
      randomBytes: this.randomBytes,
      fetchFn: this.options.fetchFn,
      signal: this.options.signal
    });

    run.log.info('Provisioning started', { domain: config.domain ?? null });
    const pipelines: PipelineReport[] = [];
    for (const component of PIPELINE_ORDER) {
      if (!config.components[component]) {
        run.log.debug('Component disabled', { component });
        continue;
      }
      pipelines.push(await runStages(run.pipeline(component), { signal: this.options.signal, logger: run.log }));
    }

    metadata.duration = this.clock.now() - startTime;
    run.log.info('Provisioning finished', {
      created: run.outcomes.filter(outcome => outcome.status === 'created').length,
      durationMs: metadata.duration
    });

    return {
      pipelines,
      resources: run.outcomes,
      restarts: run.restarts,
      metadata
    };
  }
}

interface RunOptions {
  clock: Clock;
  log: Logger;
  randomBytes: (size: number) => Buffer;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
}

/**
 * State of a single provision() call. Nothing survives between calls.
 */
class ProvisioningRun {
  readonly outcomes: EnsureOutcome[] = [];
  readonly restarts: RestartRecord[] = [];
  readonly names: ResourceNames;
  readonly log: Logger;
  private readonly rollout: RolloutTrigger;

  constructor(
    private readonly store: ResourceStore,
    private readonly ensurer: ResourceEnsurer,
    private readonly config: BootstrapConfig,
    private readonly options: RunOptions
  ) {
    this.names = resourceNamesFor(config);
    this.log = options.log;
    this.rollout = new RolloutTrigger(store, {
      digestAnnotation: this.names.inputsDigestAnnotation,
      clock: options.clock,
      logger: options.log
    });
  }

  pipeline(component: ComponentName): Pipeline {
    switch (component) {
      case 'storage':
        return this.storagePipeline();
      case 'acmeDns':
        return this.acmeDnsPipeline();
      case 'ingress':
        return this.ingressPipeline();
      case 'registry':
        return this.registryPipeline();
      case 'buildkit':
        return this.buildkitPipeline();
      case 'webhook':
        return this.webhookPipeline();
    }
  }

  // ==========================================================================
  // Pipelines
  // ==========================================================================

  private storagePipeline(): Pipeline {
    return {
      name: 'storage',
      stages: [{ name: 'storage-classes', run: () => this.ensure(...storageClasses(this.names)) }]
    };
  }

  private acmeDnsPipeline(): Pipeline {
    const names = this.names;
    return {
      name: 'acme-dns',
      stages: [
        {
          name: 'namespace',
          precondition: async () => this.requireDomain(),
          run: () => this.ensure(namespaceManifest(names.platformNamespace))
        },
        { name: 'config', run: () => this.ensure(acmeDnsConfigMap(this.templateContext())) },
        { name: 'volume', run: () => this.ensure(acmeDnsDataClaim(this.templateContext())) },
        {
          name: 'services',
          run: () => this.ensure(acmeDnsDnsService(this.templateContext()), acmeDnsHttpService(this.templateContext()))
        },
        { name: 'deployment', run: () => this.ensureAcmeDnsDeployment() },
        {
          name: 'readiness',
          run: context =>
            this.waitFor(context, [
              deploymentReplicasReady(this.store, names.platformNamespace, names.acmeDnsDeployment),
              serviceHasExternalAddress(this.store, names.platformNamespace, names.acmeDnsDnsService)
            ])
        },
        { name: 'account', run: context => this.ensureAcmeDnsAccount(context) }
      ]
    };
  }

  private ingressPipeline(): Pipeline {
    const names = this.names;
    return {
      name: 'ingress',
      stages: [
        {
          name: 'namespace',
          precondition: async () => this.requireDomain(),
          run: () => this.ensure(namespaceManifest(names.platformNamespace))
        },
        {
          name: 'issuer',
          precondition: async () => (this.config.acmeEmail ? met : unmet('no ACME email configured')),
          run: () => this.ensure(clusterIssuer({
            ...this.templateContext(),
            acmeEmail: this.config.acmeEmail ?? '',
            acmeEnvironment: this.config.acmeEnvironment
          }))
        },
        { name: 'certificate', run: () => this.ensure(wildcardCertificate(this.templateContext())) },
        // not gated on the certificate; the route attaches once the gateway exists
        { name: 'acme-dns-route', run: () => this.ensure(acmeDnsApiRoute(this.templateContext())) },
        {
          name: 'gateway',
          precondition: () => this.requireSecretKey(names.platformNamespace, names.wildcardCertificateSecret, TLS_CERT_KEY),
          run: () => this.ensure(gateway({ ...this.templateContext(), gatewayClassName: this.config.gatewayClassName }))
        },
        {
          name: 'routes',
          run: () =>
            this.ensure(
              httpRedirectRoute(this.templateContext()),
              httpsRoute(this.templateContext()),
              deploymentNotFoundRoute(this.templateContext())
            )
        },
        {
          name: 'fallback',
          run: () => this.ensure(deploymentNotFoundDeployment(this.templateContext()), deploymentNotFoundService(this.templateContext()))
        }
      ]
    };
  }

  private registryPipeline(): Pipeline {
    const names = this.names;
    return {
      name: 'registry',
      stages: [
        {
          name: 'namespace',
          run: context => this.waitFor(context, [namespaceExists(this.store, names.registryNamespace)])
        },
        {
          name: 'http-secret',
          run: () => this.ensure(registryHttpSecret(names, this.options.randomBytes(32)))
        },
        { name: 'jwks', run: context => this.ensureRegistryJwks(context) }
      ]
    };
  }

  private buildkitPipeline(): Pipeline {
    const names = this.names;
    return {
      name: 'buildkit',
      stages: [
        {
          name: 'namespaces',
          run: context =>
            this.waitFor(context, [
              namespaceExists(this.store, names.registryNamespace),
              namespaceExists(this.store, names.buildkitNamespace)
            ])
        },
        { name: 'ca-certificate', run: context => this.ensureBuildkitCa(context) },
        { name: 'restart', run: () => this.restartBuildkitOnCaChange() }
      ]
    };
  }

  private webhookPipeline(): Pipeline {
    return {
      name: 'webhook',
      stages: [
        {
          name: 'signing-secret',
          precondition: async () => (this.config.webhookUrl ? met : unmet('no webhook URL configured')),
          run: () => this.ensure(webhookSigningSecret(this.names, this.config.webhookUrl ?? '', this.options.randomBytes(32)))
        }
      ]
    };
  }

  // ==========================================================================
  // Stage bodies
  // ==========================================================================

  private async ensureAcmeDnsDeployment(): Promise<void> {
    const names = this.names;
    const configMap = await this.store.get({
      apiVersion: 'v1',
      kind: 'ConfigMap',
      namespace: names.platformNamespace,
      name: names.acmeDnsConfigMap
    });
    // digest of what is actually stored, which may differ from the template
    const configDigest = digestOf(getString(configMap, 'data', ACME_DNS_CONFIG_FILE) ?? '');

    await this.ensure(acmeDnsDeployment(this.templateContext(), configDigest));
    this.recordRestart(
      await this.rollout.restartOnInputChange(
        { apiVersion: 'apps/v1', kind: 'Deployment', namespace: names.platformNamespace, name: names.acmeDnsDeployment },
        configDigest
      )
    );
  }

  private async ensureAcmeDnsAccount(context: StageContext): Promise<void> {
    const domain = this.domain();
    const synchronizer = new AccountSecretSynchronizer(this.store, {
      namespace: this.names.platformNamespace,
      name: this.names.acmeDnsAccountSecret,
      labels: managedLabels(ACME_DNS_APP, 'credentials'),
      logger: context.log
    });

    if (await synchronizer.lookup(domain)) {
      context.log.debug('ACME-DNS account already registered', { domain });
      return;
    }

    const client = new AcmeDnsClient({
      baseUrl: this.config.acmeDns.registrationUrl ?? acmeDnsServiceUrl({ names: this.names }),
      fetchFn: this.options.fetchFn,
      clock: this.options.clock,
      logger: context.log
    });
    const account = await client.register(this.config.acmeDns.allowFrom, context.signal);
    await synchronizer.sync(domain, account);
  }

  private async ensureRegistryJwks(context: StageContext): Promise<void> {
    const names = this.names;
    const jwksRef = this.secretRef(names.registryNamespace, names.registryJwksSecret);
    if (await this.store.get(jwksRef)) {
      this.outcomes.push({ ref: jwksRef, status: 'exists' });
      return;
    }

    await this.waitFor(context, [
      secretHasKey(this.store, names.registryNamespace, names.registryAuthKeysSecret, TLS_CERT_KEY)
    ]);
    const certificate = await this.readSecretKey(names.registryNamespace, names.registryAuthKeysSecret, TLS_CERT_KEY);
    const keySet = deriveKeySet(certificate, JWKS_KEY_ID);
    await this.ensure(registryJwksSecret(names, encodeKeySet(keySet)));
  }

  private async ensureBuildkitCa(context: StageContext): Promise<void> {
    const names = this.names;
    if (await this.store.get(this.secretRef(names.buildkitNamespace, names.buildkitCaSecret))) {
      this.outcomes.push({ ref: this.secretRef(names.buildkitNamespace, names.buildkitCaSecret), status: 'exists' });
      return;
    }

    await this.waitFor(context, [secretHasKey(this.store, names.registryNamespace, names.registryTlsSecret, CA_CERT_KEY)]);
    const caCertificate = await this.readSecretKey(names.registryNamespace, names.registryTlsSecret, CA_CERT_KEY);
    await this.ensure(buildkitCaSecret(names, caCertificate));
  }

  private async restartBuildkitOnCaChange(): Promise<void> {
    const names = this.names;
    const caCertificate = await this.readSecretKey(names.buildkitNamespace, names.buildkitCaSecret, CA_CERT_KEY);
    this.recordRestart(
      await this.rollout.restartOnInputChange(
        { apiVersion: 'apps/v1', kind: 'Deployment', namespace: names.buildkitNamespace, name: names.buildkitDeployment },
        digestOf(caCertificate)
      )
    );
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async ensure(...descriptors: ResourceObject[]): Promise<void> {
    this.outcomes.push(...(await this.ensurer.ensureAll(descriptors)));
  }

  private async waitFor(context: StageContext, conditions: ReadinessCondition[]): Promise<void> {
    const { polling } = this.config;
    const outcome = await waitUntilReady(
      conditions,
      { ...polling, signal: context.signal },
      this.options.clock,
      context.log
    );
    if (outcome.status === 'timed-out') {
      throw new ReadinessTimeoutError(outcome.unmet, polling.timeoutMs);
    }
    if (outcome.status === 'cancelled') {
      throw new OperationCancelledError(`Waiting for ${outcome.unmet.join(', ')}`, context.signal?.reason);
    }
  }

  private requireDomain(): PreconditionResult {
    return this.config.domain ? met : unmet('no domain configured');
  }

  private async requireSecretKey(namespace: string, name: string, key: string): Promise<PreconditionResult> {
    const secret = await this.store.get(this.secretRef(namespace, name));
    const value = secret ? readSecretData(secret, key) : undefined;
    return value && value.length > 0 ? met : unmet(`secret ${namespace}/${name} has no ${key} yet`);
  }

  private async readSecretKey(namespace: string, name: string, key: string): Promise<Buffer> {
    const secret = await this.store.get(this.secretRef(namespace, name));
    if (!secret) {
      throw new ResourceNotFoundError(this.secretRef(namespace, name));
    }
    const value = readSecretData(secret, key);
    if (!value || value.length === 0) {
      throw new MalformedInputError(`Secret ${namespace}/${name} has no ${key}`);
    }
    return value;
  }

  private recordRestart(result: RestartResult): void {
    if (result.status === 'updated') {
      this.restarts.push({ ref: result.ref, restartedAt: result.restartedAt });
    }
  }

  private secretRef(namespace: string, name: string): ResourceRef {
    return { apiVersion: 'v1', kind: 'Secret', namespace, name };
  }

  private domain(): string {
    return this.config.domain ?? '';
  }

  private templateContext(): TemplateContext {
    return { domain: this.domain(), names: this.names };
  }
}

/**
 * Convenience entry point: provision `config` against `store`.
 */
export async function provision(
  store: ResourceStore,
  config: BootstrapConfig,
  options?: OrchestratorOptions
): Promise<ProvisioningReport> {
  return new BootstrapOrchestrator(store, options).provision(config);
}

export interface PlanBlock {
  pipeline: string;
  stage: string;
  reason: string;
}

export interface ProvisioningPlan {
  resources: ResourceObject[];
  pipelines: PipelineReport[];
  blocked: PlanBlock[];
}

function onlyComponent(component: ComponentName): Record<ComponentName, boolean> {
  return { storage: false, acmeDns: false, ingress: false, registry: false, buildkit: false, webhook: false, [component]: true };
}

/**
 * Dry run against an in-memory store on virtual time. Each enabled pipeline
 * runs on its own, so one that would block on an external controller does
 * not hide what the others create.
 */
export async function plan(
  config: BootstrapConfig,
  options: Pick<OrchestratorOptions, 'logger' | 'randomBytes'> = {},
  store: MemoryResourceStore = new MemoryResourceStore()
): Promise<ProvisioningPlan> {
  const orchestrator = new BootstrapOrchestrator(store, {
    ...options,
    clock: new ManualClock(),
    fetchFn: async () => {
      throw new Error('network access is disabled while planning');
    }
  });

  const pipelines: PipelineReport[] = [];
  const blocked: PlanBlock[] = [];
  for (const component of PIPELINE_ORDER) {
    if (!config.components[component]) {
      continue;
    }
    try {
      const report = await orchestrator.provision({ ...config, components: onlyComponent(component) });
      pipelines.push(...report.pipelines);
    } catch (error) {
      if (!(error instanceof StageFailedError)) {
        throw error;
      }
      const reason = error.cause instanceof Error ? error.cause.message : String(error.cause);
      blocked.push({ pipeline: error.pipeline, stage: error.stage, reason });
    }
  }

  return { resources: store.all(), pipelines, blocked };
}
