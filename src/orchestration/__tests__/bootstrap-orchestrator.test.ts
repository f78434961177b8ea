import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { BootstrapOrchestrator, plan, provision } from '../bootstrap-orchestrator';
import { validateAndNormalizeConfig } from '../../config/validator';
import { MemoryResourceStore } from '../../store/memory-store';
import { encodeSecretData, getArray, readSecretData } from '../../store/fields';
import { ManualClock } from '../../provisioning/clock';
import { AccountSecretSynchronizer } from '../../provisioning/account-synchronizer';
import { RESTARTED_AT_ANNOTATION, templateAnnotations } from '../../provisioning/rollout-trigger';
import { LogEntry, resetLogHandler, setLogHandler } from '../../logger';
import {
  OperationCancelledError,
  ReadinessTimeoutError,
  StageFailedError,
  UnsupportedKeyTypeError
} from '../../errors';
import type { BootstrapConfig, EnsureOutcome, ResourceObject, ResourceRef } from '../../types';

const fixture = (name: string) =>
  readFileSync(join(__dirname, '..', '..', 'provisioning', '__tests__', 'fixtures', name), 'utf8');

const START = Date.parse('2024-05-01T10:00:00Z');

const acmeDnsDeploymentRef: ResourceRef = { apiVersion: 'apps/v1', kind: 'Deployment', namespace: 'platform', name: 'acme-dns' };
const acmeDnsServiceRef: ResourceRef = { apiVersion: 'v1', kind: 'Service', namespace: 'platform', name: 'acme-dns-dns' };
const buildkitRef: ResourceRef = { apiVersion: 'apps/v1', kind: 'Deployment', namespace: 'buildkit', name: 'buildkitd' };
const gatewayRef: ResourceRef = { apiVersion: 'gateway.networking.k8s.io/v1', kind: 'Gateway', namespace: 'platform', name: 'ingress-gateway' };

function namespace(name: string): ResourceObject {
  return { apiVersion: 'v1', kind: 'Namespace', metadata: { name } };
}

function secret(namespaceName: string, name: string, values: Record<string, string>): ResourceObject {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: { name, namespace: namespaceName },
    type: 'Opaque',
    data: encodeSecretData(values)
  };
}

/** What the registry and buildkit manifests installed elsewhere provide. */
function seedExternalResources(store: MemoryResourceStore, signerCertificate = fixture('rsa-signer.crt')): void {
  store.seed(namespace('registry'));
  store.seed(namespace('buildkit'));
  store.seed(secret('registry', 'registry-auth-keys', { 'tls.crt': signerCertificate }));
  store.seed(secret('registry', 'registry-tls', { 'ca.crt': 'test-ca-bundle' }));
  store.seed({
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: 'buildkitd', namespace: 'buildkit' },
    spec: { replicas: 1, template: { metadata: { labels: { app: 'buildkitd' } }, spec: {} } }
  });
}

/** Plays the part of the deployment and load balancer controllers between polling rounds. */
async function simulateControllers(store: MemoryResourceStore): Promise<void> {
  if (await store.get(acmeDnsDeploymentRef)) {
    store.setStatus(acmeDnsDeploymentRef, { readyReplicas: 2 });
  }
  if (await store.get(acmeDnsServiceRef)) {
    store.setStatus(acmeDnsServiceRef, { loadBalancer: { ingress: [{ ip: '203.0.113.10' }] } });
  }
}

const createdNames = (outcomes: EnsureOutcome[]) =>
  outcomes.filter(outcome => outcome.status === 'created').map(outcome => `${outcome.ref.kind}/${outcome.ref.name}`);

const registration = {
  username: 'c36f50e8-4632-44f0-83fe-e070fef28a10',
  password: 'test-secret',
  fulldomain: 'sub-one.acme.example.com',
  subdomain: 'sub-one'
};

describe('BootstrapOrchestrator', () => {
  let store: MemoryResourceStore;
  let clock: ManualClock;
  let fetchFn: Mock<[string, RequestInit], Promise<Response>>;
  let logs: LogEntry[];
  let config: BootstrapConfig;

  const orchestrator = (signal?: AbortSignal) =>
    new BootstrapOrchestrator(store, { clock, fetchFn, signal, randomBytes: size => Buffer.alloc(size, 1) });

  beforeEach(() => {
    logs = [];
    setLogHandler(entry => logs.push(entry));
    store = new MemoryResourceStore();
    clock = new ManualClock(START, () => simulateControllers(store));
    fetchFn = vi.fn<[string, RequestInit], Promise<Response>>(async () => new Response(JSON.stringify(registration), { status: 201 }));
    config = validateAndNormalizeConfig({
      domain: 'example.com',
      acmeEmail: 'admin@example.com',
      webhookUrl: 'https://hooks.example.com/deliver'
    });
    seedExternalResources(store);
  });

  afterEach(() => {
    resetLogHandler();
  });

  describe('provision', () => {
    it('should provision everything up to the gateway before the certificate is issued', async () => {
      const report = await orchestrator().provision(config);

      expect(createdNames(report.resources)).toEqual([
        'StorageClass/storage-replica-1',
        'StorageClass/storage-replica-2',
        'Namespace/platform',
        'ConfigMap/acme-dns-config',
        'PersistentVolumeClaim/acme-dns-data',
        'Service/acme-dns-dns',
        'Service/acme-dns',
        'Deployment/acme-dns',
        'ClusterIssuer/certmanager-acme-issuer',
        'Certificate/ingress-wildcard-certificate',
        'HTTPRoute/acme-dns-api',
        'Secret/registry-registry-auth',
        'Secret/registry-auth-keys-jwks',
        'Secret/registry-ca-cert',
        'Secret/webhook-signing'
      ]);
      expect(report.pipelines).toEqual([
        { pipeline: 'storage', completed: ['storage-classes'] },
        {
          pipeline: 'acme-dns',
          completed: ['namespace', 'config', 'volume', 'services', 'deployment', 'readiness', 'account']
        },
        {
          pipeline: 'ingress',
          completed: ['namespace', 'issuer', 'certificate', 'acme-dns-route'],
          skipped: { stage: 'gateway', reason: 'secret platform/ingress-wildcard-certificate has no tls.crt yet' }
        },
        { pipeline: 'registry', completed: ['namespace', 'http-secret', 'jwks'] },
        { pipeline: 'buildkit', completed: ['namespaces', 'ca-certificate', 'restart'] },
        { pipeline: 'webhook', completed: ['signing-secret'] }
      ]);
      expect(await store.get(gatewayRef)).toBeNull();
      expect(report.metadata.duration).toBe(5000);
    });

    it('should create the gateway, its routes and the fallback workload once the certificate exists', async () => {
      await orchestrator().provision(config);
      store.seed(secret('platform', 'ingress-wildcard-certificate', { 'tls.crt': 'issued', 'tls.key': 'test-key' }));

      const report = await orchestrator().provision(config);

      expect(createdNames(report.resources)).toEqual([
        'Gateway/ingress-gateway',
        'HTTPRoute/ingress-http-redirect',
        'HTTPRoute/ingress-https',
        'HTTPRoute/deployment-not-found',
        'Deployment/deployment-not-found',
        'Service/deployment-not-found'
      ]);
      const stored = await store.get(gatewayRef);
      expect(getArray(stored, 'spec', 'listeners')).toHaveLength(5);
      expect(report.pipelines[2]).toEqual({
        pipeline: 'ingress',
        completed: ['namespace', 'issuer', 'certificate', 'acme-dns-route', 'gateway', 'routes', 'fallback']
      });
    });

    it('should change nothing on a repeated run', async () => {
      store.seed(secret('platform', 'ingress-wildcard-certificate', { 'tls.crt': 'issued' }));
      await orchestrator().provision(config);
      const before = store.all();

      const report = await orchestrator().provision(config);

      expect(createdNames(report.resources)).toEqual([]);
      expect(report.restarts).toEqual([]);
      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(store.all()).toEqual(before);
    });

    it('should register one ACME-DNS account and store it for the domain', async () => {
      await orchestrator().provision(config);

      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(fetchFn.mock.calls[0][0]).toBe('http://acme-dns.platform.svc.cluster.local/register');
      const synchronizer = new AccountSecretSynchronizer(store, { namespace: 'platform', name: 'acme-dns-account' });
      expect(await synchronizer.lookup('example.com')).toEqual({
        username: registration.username,
        password: 'test-secret',
        fullDomain: 'sub-one.acme.example.com',
        subdomain: 'sub-one'
      });
    });

    it('should use the configured registration endpoint', async () => {
      config = { ...config, acmeDns: { registrationUrl: 'https://acme.example.com', allowFrom: ['10.0.0.0/8'] } };

      await orchestrator().provision(config);

      expect(fetchFn.mock.calls[0][0]).toBe('https://acme.example.com/register');
      expect(fetchFn.mock.calls[0][1].body).toBe('{"allowfrom":["10.0.0.0/8"]}');
    });

    it('should publish the key set derived from the signing certificate', async () => {
      await orchestrator().provision(config);

      const jwks = await store.get({ apiVersion: 'v1', kind: 'Secret', namespace: 'registry', name: 'registry-auth-keys-jwks' });
      const document = jwks ? readSecretData(jwks, 'jwks.json')?.toString('utf8') : undefined;
      const expected = fixture('rsa-signer.jwks.json').replace('"kid": "test-signer"', '"kid": "registry-auth-jwt-signer"');
      expect(document).toBe(expected);
    });

    it('should restart buildkit once for a new CA bundle', async () => {
      const first = await orchestrator().provision(config);
      const second = await orchestrator().provision(config);

      expect(first.restarts).toEqual([{ ref: buildkitRef, restartedAt: '2024-05-01T10:00:05Z' }]);
      expect(second.restarts).toEqual([]);
      const buildkit = await store.get(buildkitRef);
      expect(buildkit ? templateAnnotations(buildkit)[RESTARTED_AT_ANNOTATION] : undefined).toBe('2024-05-01T10:00:05Z');
    });

    it('should restart acme-dns when its stored configuration differs from what the pods started with', async () => {
      await orchestrator().provision(config);
      store.seed({
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: { name: 'acme-dns-config', namespace: 'platform' },
        data: { 'config.cfg': 'edited by an operator' }
      });

      const report = await orchestrator().provision(config);

      expect(report.restarts.map(restart => restart.ref)).toEqual([acmeDnsDeploymentRef]);
    });

    it('should skip domain-bound pipelines without a domain', async () => {
      config = validateAndNormalizeConfig({ acmeEmail: 'admin@example.com' });

      const report = await orchestrator().provision(config);

      expect(report.pipelines.find(pipeline => pipeline.pipeline === 'acme-dns')).toEqual({
        pipeline: 'acme-dns',
        completed: [],
        skipped: { stage: 'namespace', reason: 'no domain configured' }
      });
      expect(report.pipelines.find(pipeline => pipeline.pipeline === 'ingress')?.skipped?.reason).toBe('no domain configured');
      expect(report.pipelines.find(pipeline => pipeline.pipeline === 'webhook')?.skipped?.reason).toBe('no webhook URL configured');
      expect(store.count('StorageClass')).toBe(2);
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('should stop the ingress pipeline at the issuer without an ACME email', async () => {
      config = validateAndNormalizeConfig({ domain: 'example.com' });

      const report = await orchestrator().provision(config);

      expect(report.pipelines.find(pipeline => pipeline.pipeline === 'ingress')).toEqual({
        pipeline: 'ingress',
        completed: ['namespace'],
        skipped: { stage: 'issuer', reason: 'no ACME email configured' }
      });
      expect(store.count('ClusterIssuer')).toBe(0);
    });

    it('should only run enabled components', async () => {
      config = validateAndNormalizeConfig({
        domain: 'example.com',
        components: { acmeDns: false, ingress: false, registry: false, buildkit: false, webhook: false }
      });

      const report = await orchestrator().provision(config);

      expect(report.pipelines.map(pipeline => pipeline.pipeline)).toEqual(['storage']);
      expect(createdNames(report.resources)).toEqual(['StorageClass/storage-replica-1', 'StorageClass/storage-replica-2']);
    });

    it('should fail the run when a readiness wait times out', async () => {
      clock = new ManualClock(START);
      config = { ...config, polling: { ...config.polling, timeoutMs: 10000 } };

      const error = await orchestrator().provision(config).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StageFailedError);
      if (error instanceof StageFailedError) {
        expect(error.pipeline).toBe('acme-dns');
        expect(error.stage).toBe('readiness');
        expect(error.cause).toBeInstanceOf(ReadinessTimeoutError);
        expect(error.message).toBe(
          'acme-dns/readiness: Timed out after 10s waiting for: deployment platform/acme-dns replicas ready, ' +
          'service platform/acme-dns-dns has an external address'
        );
      }
      expect(store.count('Secret')).toBe(2);
    });

    it('should fail the registry pipeline for a non-RSA signing certificate', async () => {
      store = new MemoryResourceStore();
      clock = new ManualClock(START, () => simulateControllers(store));
      seedExternalResources(store, fixture('ec-signer.crt'));

      const error = await orchestrator().provision(config).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StageFailedError);
      if (error instanceof StageFailedError) {
        expect(error.pipeline).toBe('registry');
        expect(error.stage).toBe('jwks');
        expect(error.cause).toBeInstanceOf(UnsupportedKeyTypeError);
      }
      expect(await store.get({ apiVersion: 'v1', kind: 'Secret', namespace: 'registry', name: 'registry-auth-keys-jwks' }))
        .toBeNull();
    });

    it('should not start when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(orchestrator(controller.signal).provision(config)).rejects.toBeInstanceOf(OperationCancelledError);
      expect(store.count('StorageClass')).toBe(0);
    });

    it('should report a cancellation during a readiness wait as cancelled', async () => {
      const controller = new AbortController();
      clock = new ManualClock(START, () => controller.abort());

      const error = await orchestrator(controller.signal).provision(config).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(error).not.toBeInstanceOf(StageFailedError);
      expect(error instanceof Error ? error.message : undefined).toBe(
        'Waiting for deployment platform/acme-dns replicas ready, ' +
        'service platform/acme-dns-dns has an external address was cancelled'
      );
      expect(clock.sleeps).toEqual([5000]);
      expect(store.count('Secret')).toBe(2);
    });

    it('should log the run with its id', async () => {
      const report = await orchestrator().provision(config);

      const finished = logs.find(entry => entry.message === 'Provisioning finished');
      expect(finished?.context).toMatchObject({ runId: report.metadata.runId, created: 15, durationMs: 5000 });
      expect(report.metadata.runId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('provision()', () => {
    it('should provision through a one-off orchestrator', async () => {
      const report = await provision(store, config, { clock, fetchFn });

      expect(report.pipelines).toHaveLength(6);
    });
  });
});

describe('plan', () => {
  beforeEach(() => {
    setLogHandler(() => undefined);
  });

  afterEach(() => {
    resetLogHandler();
  });

  it('should list what an empty cluster would get and where each pipeline waits', async () => {
    const config = validateAndNormalizeConfig({ domain: 'example.com', acmeEmail: 'admin@example.com' });

    const result = await plan(config);

    expect(result.resources.map(resource => `${resource.kind}/${resource.metadata.name}`)).toEqual([
      'StorageClass/storage-replica-1',
      'StorageClass/storage-replica-2',
      'Namespace/platform',
      'ConfigMap/acme-dns-config',
      'PersistentVolumeClaim/acme-dns-data',
      'Service/acme-dns-dns',
      'Service/acme-dns',
      'Deployment/acme-dns',
      'ClusterIssuer/certmanager-acme-issuer',
      'Certificate/ingress-wildcard-certificate',
      'HTTPRoute/acme-dns-api'
    ]);
    expect(result.blocked).toEqual([
      {
        pipeline: 'acme-dns',
        stage: 'readiness',
        reason: 'Timed out after 300s waiting for: deployment platform/acme-dns replicas ready, ' +
          'service platform/acme-dns-dns has an external address'
      },
      { pipeline: 'registry', stage: 'namespace', reason: 'Timed out after 300s waiting for: namespace registry exists' },
      {
        pipeline: 'buildkit',
        stage: 'namespaces',
        reason: 'Timed out after 300s waiting for: namespace registry exists, namespace buildkit exists'
      }
    ]);
    expect(result.pipelines.map(pipeline => pipeline.pipeline)).toEqual(['storage', 'ingress', 'webhook']);
    expect(result.pipelines[2].skipped?.reason).toBe('no webhook URL configured');
  });
});
