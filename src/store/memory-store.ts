import type { ResourceObject, ResourceRef } from '../types';
import { ResourceAlreadyExistsError, ResourceConflictError, ResourceNotFoundError } from '../errors';
import { ResourceStore, identityKey, refOf } from './types';

/**
 * In-process resource store with the same create/update semantics as the
 * cluster API: atomic create, resourceVersion checked on update.
 *
 * Backs the `plan` command and the test suites.
 */
export class MemoryResourceStore implements ResourceStore {
  private readonly objects = new Map<string, ResourceObject>();
  private version = 0;

  constructor(initial: ResourceObject[] = []) {
    for (const resource of initial) {
      this.seed(resource);
    }
  }

  async get(ref: ResourceRef): Promise<ResourceObject | null> {
    const stored = this.objects.get(identityKey(ref));
    return stored ? structuredClone(stored) : null;
  }

  async create(resource: ResourceObject): Promise<ResourceObject> {
    const ref = refOf(resource);
    const key = identityKey(ref);
    if (this.objects.has(key)) {
      throw new ResourceAlreadyExistsError(ref);
    }
    const stored = this.withNextVersion(resource);
    this.objects.set(key, stored);
    return structuredClone(stored);
  }

  async update(resource: ResourceObject): Promise<ResourceObject> {
    const ref = refOf(resource);
    const key = identityKey(ref);
    const current = this.objects.get(key);
    if (!current) {
      throw new ResourceNotFoundError(ref);
    }
    const expected = resource.metadata.resourceVersion;
    if (expected !== undefined && expected !== current.metadata.resourceVersion) {
      throw new ResourceConflictError(ref);
    }
    const stored = this.withNextVersion(resource);
    this.objects.set(key, stored);
    return structuredClone(stored);
  }

  async list(apiVersion: string, kind: string, namespace?: string): Promise<ResourceObject[]> {
    return this.all().filter(resource =>
      resource.apiVersion === apiVersion &&
      resource.kind === kind &&
      (namespace === undefined || resource.metadata.namespace === namespace)
    );
  }

  /** Insert or replace without any checks, as an external controller would. */
  seed(resource: ResourceObject): ResourceObject {
    const stored = this.withNextVersion(resource);
    this.objects.set(identityKey(refOf(resource)), stored);
    return structuredClone(stored);
  }

  /** Replace the status block of a stored resource. */
  setStatus(ref: ResourceRef, status: Record<string, unknown>): void {
    const current = this.objects.get(identityKey(ref));
    if (!current) {
      throw new ResourceNotFoundError(ref);
    }
    this.seed({ ...current, status });
  }

  all(): ResourceObject[] {
    return Array.from(this.objects.values(), resource => structuredClone(resource));
  }

  count(kind: string): number {
    return this.all().filter(resource => resource.kind === kind).length;
  }

  private withNextVersion(resource: ResourceObject): ResourceObject {
    this.version += 1;
    const copy = structuredClone(resource);
    copy.metadata.resourceVersion = String(this.version);
    return copy;
  }
}
