// Provisioning-specific types
import type { EnsureOutcome, ResourceObject, ResourceRef } from '../types';

/**
 * Time source for everything that waits. Injected so tests can drive
 * deadlines without real timers.
 */
export interface Clock {
  now(): number;
  /** Resolves after ms, or early when signal aborts. Never rejects. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface ResourceEnsurerLike {
  ensure(descriptor: ResourceObject): Promise<EnsureOutcome>;
}

export type ConditionState = 'not-found' | 'pending' | 'satisfied';

export interface ReadinessCondition {
  /** Unique within one polling session; reported when unmet */
  name: string;
  check(signal?: AbortSignal): Promise<ConditionState>;
}

export type ReadinessOutcome =
  | { status: 'ready' }
  | { status: 'timed-out'; unmet: string[] }
  | { status: 'cancelled'; unmet: string[] };

export interface PollOptions {
  intervalMs?: number;
  timeoutMs?: number;
  /** Multiplier applied to the interval after every unsuccessful round */
  backoffFactor?: number;
  maxIntervalMs?: number;
  signal?: AbortSignal;
}

export type RestartResult =
  | { status: 'not-found'; ref: ResourceRef }
  | { status: 'updated'; ref: ResourceRef; restartedAt: string }
  | { status: 'unchanged'; ref: ResourceRef };

export interface JsonWebKey {
  kty: 'RSA';
  kid: string;
  use: 'sig';
  alg: 'RS256';
  n: string;
  e: string;
}

export interface JsonWebKeySet {
  keys: JsonWebKey[];
}

export interface AccountRecord {
  username: string;
  password: string;
  fullDomain: string;
  subdomain: string;
  allowFrom?: string[];
}

/**
 * One account entry as stored in the secret document. Keys follow the
 * format cert-manager's ACME-DNS solver reads; unknown keys are kept.
 */
export interface StoredAccount {
  username: string;
  password: string;
  fulldomain: string;
  subdomain: string;
  allowfrom?: string[] | null;
  [key: string]: unknown;
}

/** Keyed by the domain the account validates. */
export type AccountCredentialStore = Record<string, StoredAccount>;
