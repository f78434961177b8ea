import type { ResourceObject, ResourceRef } from '../types';
import { Logger, logger as rootLogger } from '../logger';
import type { ResourceStore } from '../store/types';
import { getArray, getNumber, getString, isRecord } from '../store/fields';
import { systemClock } from './clock';
import type { Clock, ConditionState, PollOptions, ReadinessCondition, ReadinessOutcome } from './types';

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_POLL_TIMEOUT_MS = 5 * 60_000;

const STATE_RANK: Record<ConditionState, number> = {
  'not-found': 0,
  pending: 1,
  satisfied: 2
};

/**
 * Poll a set of conditions until all are satisfied, the deadline passes or
 * the signal aborts.
 *
 * Each round re-checks only the conditions that are still unmet. A condition
 * that was observed satisfied stays satisfied for the rest of the session,
 * and observed states only ever move forward. Sleeps are clipped so the last
 * round runs exactly at the deadline; `timed-out` is never returned earlier.
 *
 * Errors thrown by a condition check propagate unchanged.
 */
export async function waitUntilReady(
  conditions: ReadinessCondition[],
  options: PollOptions = {},
  clock: Clock = systemClock,
  log: Logger = rootLogger
): Promise<ReadinessOutcome> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  const backoffFactor = Math.max(1, options.backoffFactor ?? 1);
  let intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxIntervalMs = options.maxIntervalMs ?? Math.max(intervalMs, timeoutMs);
  const { signal } = options;

  const deadline = clock.now() + timeoutMs;
  const observed = new Map<string, ConditionState>();
  const unmetNames = () =>
    conditions.filter(condition => observed.get(condition.name) !== 'satisfied').map(condition => condition.name);

  for (;;) {
    if (signal?.aborted) {
      return { status: 'cancelled', unmet: unmetNames() };
    }

    for (const condition of conditions) {
      const previous = observed.get(condition.name) ?? 'not-found';
      if (previous === 'satisfied') {
        continue;
      }
      const state = await condition.check(signal);
      if (STATE_RANK[state] > STATE_RANK[previous]) {
        observed.set(condition.name, state);
        log.debug('Readiness condition advanced', { condition: condition.name, state });
      }
    }

    const unmet = unmetNames();
    if (unmet.length === 0) {
      return { status: 'ready' };
    }
    if (signal?.aborted) {
      return { status: 'cancelled', unmet };
    }

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      return { status: 'timed-out', unmet };
    }

    await clock.sleep(Math.min(intervalMs, remaining), signal);
    intervalMs = Math.min(intervalMs * backoffFactor, maxIntervalMs);
  }
}

// ============================================================================
// Condition factories
// ============================================================================

function describe(ref: ResourceRef): string {
  return ref.namespace ? `${ref.kind.toLowerCase()} ${ref.namespace}/${ref.name}` : `${ref.kind.toLowerCase()} ${ref.name}`;
}

/**
 * Generic condition: not-found while the resource is absent, then the
 * predicate decides between pending and satisfied.
 */
export function resourceCondition(
  store: ResourceStore,
  ref: ResourceRef,
  name: string,
  predicate: (resource: ResourceObject) => boolean
): ReadinessCondition {
  return {
    name,
    async check() {
      const resource = await store.get(ref);
      if (!resource) {
        return 'not-found';
      }
      return predicate(resource) ? 'satisfied' : 'pending';
    }
  };
}

export function namespaceExists(store: ResourceStore, namespace: string): ReadinessCondition {
  const ref: ResourceRef = { apiVersion: 'v1', kind: 'Namespace', name: namespace };
  return resourceCondition(store, ref, `namespace ${namespace} exists`, () => true);
}

export function secretHasKey(store: ResourceStore, namespace: string, name: string, key: string): ReadinessCondition {
  const ref: ResourceRef = { apiVersion: 'v1', kind: 'Secret', namespace, name };
  return resourceCondition(store, ref, `${describe(ref)} has ${key}`, secret => {
    const value = getString(secret, 'data', key);
    return value !== undefined && value.length > 0;
  });
}

export function serviceHasExternalAddress(store: ResourceStore, namespace: string, name: string): ReadinessCondition {
  const ref: ResourceRef = { apiVersion: 'v1', kind: 'Service', namespace, name };
  return resourceCondition(store, ref, `${describe(ref)} has an external address`, service =>
    externalAddressOf(service) !== undefined
  );
}

export function deploymentReplicasReady(store: ResourceStore, namespace: string, name: string): ReadinessCondition {
  const ref: ResourceRef = { apiVersion: 'apps/v1', kind: 'Deployment', namespace, name };
  return resourceCondition(store, ref, `${describe(ref)} replicas ready`, deployment => {
    const desired = getNumber(deployment, 'spec', 'replicas') ?? 1;
    const ready = getNumber(deployment, 'status', 'readyReplicas') ?? 0;
    return ready > 0 && ready === desired;
  });
}

export function certificateReady(store: ResourceStore, namespace: string, name: string): ReadinessCondition {
  const ref: ResourceRef = { apiVersion: 'cert-manager.io/v1', kind: 'Certificate', namespace, name };
  return resourceCondition(store, ref, `${describe(ref)} ready`, certificate =>
    getArray(certificate, 'status', 'conditions').some(
      condition => getString(condition, 'type') === 'Ready' && getString(condition, 'status') === 'True'
    )
  );
}

/** First load-balancer ingress IP or hostname of a Service. */
export function externalAddressOf(service: ResourceObject): string | undefined {
  for (const entry of getArray(service, 'status', 'loadBalancer', 'ingress')) {
    if (!isRecord(entry)) {
      continue;
    }
    const address = getString(entry, 'ip') ?? getString(entry, 'hostname');
    if (address) {
      return address;
    }
  }
  return undefined;
}
