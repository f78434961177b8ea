import { describe, it, expect, vi } from 'vitest';
import {
  certificateReady,
  deploymentReplicasReady,
  externalAddressOf,
  namespaceExists,
  secretHasKey,
  serviceHasExternalAddress,
  waitUntilReady
} from '../readiness-poller';
import { ManualClock } from '../clock';
import { MemoryResourceStore } from '../../store/memory-store';
import type { ConditionState, ReadinessCondition } from '../types';
import type { ResourceObject } from '../../types';

/** Condition that reports the given states in turn, repeating the last one. */
function scripted(name: string, states: ConditionState[]) {
  let index = 0;
  const check = vi.fn(async (): Promise<ConditionState> => states[Math.min(index++, states.length - 1)]);
  const condition: ReadinessCondition = { name, check };
  return { condition, check };
}

describe('waitUntilReady', () => {
  it('should return ready without sleeping when everything is satisfied', async () => {
    const clock = new ManualClock();
    const { condition } = scripted('a', ['satisfied']);

    expect(await waitUntilReady([condition], {}, clock)).toEqual({ status: 'ready' });
    expect(clock.sleeps).toEqual([]);
  });

  it('should time out exactly at the deadline with the unmet conditions', async () => {
    const clock = new ManualClock();
    const a = scripted('a', ['satisfied']);
    const b = scripted('b', ['not-found']);

    const outcome = await waitUntilReady([a.condition, b.condition], { intervalMs: 5000, timeoutMs: 12000 }, clock);

    expect(outcome).toEqual({ status: 'timed-out', unmet: ['b'] });
    expect(clock.sleeps).toEqual([5000, 5000, 2000]);
    expect(clock.now()).toBe(12000);
    expect(b.check).toHaveBeenCalledTimes(4);
  });

  it('should not re-check a condition once it was satisfied', async () => {
    const clock = new ManualClock();
    const a = scripted('a', ['satisfied', 'not-found']);
    const b = scripted('b', ['pending', 'pending', 'satisfied']);

    const outcome = await waitUntilReady([a.condition, b.condition], { intervalMs: 1000, timeoutMs: 60000 }, clock);

    expect(outcome).toEqual({ status: 'ready' });
    expect(a.check).toHaveBeenCalledTimes(1);
    expect(b.check).toHaveBeenCalledTimes(3);
  });

  it('should back off up to the maximum interval', async () => {
    const clock = new ManualClock();
    const { condition } = scripted('never', ['pending']);

    await waitUntilReady([condition], { intervalMs: 1000, timeoutMs: 20000, backoffFactor: 2, maxIntervalMs: 4000 }, clock);

    expect(clock.sleeps).toEqual([1000, 2000, 4000, 4000, 4000, 4000, 1000]);
  });

  it('should report cancellation with the unmet conditions', async () => {
    const controller = new AbortController();
    const clock = new ManualClock(0, () => controller.abort());
    const a = scripted('a', ['satisfied']);
    const b = scripted('b', ['pending']);

    const outcome = await waitUntilReady([a.condition, b.condition], { signal: controller.signal }, clock);

    expect(outcome).toEqual({ status: 'cancelled', unmet: ['b'] });
    expect(b.check).toHaveBeenCalledTimes(1);
  });

  it('should not check anything when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const { condition, check } = scripted('a', ['satisfied']);

    const outcome = await waitUntilReady([condition], { signal: controller.signal }, new ManualClock());

    expect(outcome).toEqual({ status: 'cancelled', unmet: ['a'] });
    expect(check).not.toHaveBeenCalled();
  });

  it('should propagate errors from a condition check', async () => {
    const failing: ReadinessCondition = {
      name: 'broken',
      check: async () => {
        throw new Error('connection refused');
      }
    };

    await expect(waitUntilReady([failing], {}, new ManualClock())).rejects.toThrow('connection refused');
  });
});

describe('condition factories', () => {
  const secret = (data: Record<string, string>): ResourceObject => ({
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: { name: 'registry-tls', namespace: 'registry' },
    data
  });

  it('should track namespace existence', async () => {
    const store = new MemoryResourceStore();
    const condition = namespaceExists(store, 'registry');

    expect(condition.name).toBe('namespace registry exists');
    expect(await condition.check()).toBe('not-found');
    store.seed({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'registry' } });
    expect(await condition.check()).toBe('satisfied');
  });

  it('should require a non-empty secret key', async () => {
    const store = new MemoryResourceStore();
    const condition = secretHasKey(store, 'registry', 'registry-tls', 'ca.crt');

    expect(condition.name).toBe('secret registry/registry-tls has ca.crt');
    expect(await condition.check()).toBe('not-found');
    store.seed(secret({ 'ca.crt': '' }));
    expect(await condition.check()).toBe('pending');
    store.seed(secret({ 'ca.crt': 'Y2E=' }));
    expect(await condition.check()).toBe('satisfied');
  });

  it('should require an external address on a service', async () => {
    const store = new MemoryResourceStore();
    const service: ResourceObject = { apiVersion: 'v1', kind: 'Service', metadata: { name: 'acme-dns-dns', namespace: 'platform' } };
    store.seed(service);
    const condition = serviceHasExternalAddress(store, 'platform', 'acme-dns-dns');

    expect(condition.name).toBe('service platform/acme-dns-dns has an external address');
    expect(await condition.check()).toBe('pending');
    store.setStatus({ apiVersion: 'v1', kind: 'Service', namespace: 'platform', name: 'acme-dns-dns' }, {
      loadBalancer: { ingress: [{ ip: '203.0.113.10' }] }
    });
    expect(await condition.check()).toBe('satisfied');
  });

  it('should require all desired replicas to be ready', async () => {
    const store = new MemoryResourceStore();
    const ref = { apiVersion: 'apps/v1', kind: 'Deployment', namespace: 'platform', name: 'acme-dns' };
    store.seed({ apiVersion: 'apps/v1', kind: 'Deployment', metadata: { name: 'acme-dns', namespace: 'platform' }, spec: { replicas: 2 } });
    const condition = deploymentReplicasReady(store, 'platform', 'acme-dns');

    expect(condition.name).toBe('deployment platform/acme-dns replicas ready');
    expect(await condition.check()).toBe('pending');
    store.setStatus(ref, { readyReplicas: 1 });
    expect(await condition.check()).toBe('pending');
    store.setStatus(ref, { readyReplicas: 2 });
    expect(await condition.check()).toBe('satisfied');
  });

  it('should wait for the Ready condition of a certificate', async () => {
    const store = new MemoryResourceStore();
    const ref = { apiVersion: 'cert-manager.io/v1', kind: 'Certificate', namespace: 'platform', name: 'wildcard' };
    store.seed({ apiVersion: 'cert-manager.io/v1', kind: 'Certificate', metadata: { name: 'wildcard', namespace: 'platform' } });
    const condition = certificateReady(store, 'platform', 'wildcard');

    store.setStatus(ref, { conditions: [{ type: 'Ready', status: 'False' }] });
    expect(await condition.check()).toBe('pending');
    store.setStatus(ref, { conditions: [{ type: 'Ready', status: 'True' }] });
    expect(await condition.check()).toBe('satisfied');
  });
});

describe('externalAddressOf', () => {
  it('should return the first ip or hostname', () => {
    const service = (ingress: unknown[]): ResourceObject => ({
      apiVersion: 'v1',
      kind: 'Service',
      metadata: { name: 'svc' },
      status: { loadBalancer: { ingress } }
    });

    expect(externalAddressOf(service([{ hostname: 'lb.example.com' }]))).toBe('lb.example.com');
    expect(externalAddressOf(service([{}, { ip: '203.0.113.5' }]))).toBe('203.0.113.5');
    expect(externalAddressOf(service([]))).toBeUndefined();
  });
});
