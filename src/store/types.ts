// Resource store contract
import type { ResourceObject, ResourceRef } from '../types';

/**
 * Minimal capability interface over a declarative resource store.
 *
 * - get resolves null when the resource does not exist
 * - create rejects with ResourceAlreadyExistsError when the identity is taken
 * - update rejects with ResourceConflictError when metadata.resourceVersion is
 *   stale, and with ResourceNotFoundError when the resource is gone
 * - every other failure rejects with StoreOperationError
 */
export interface ResourceStore {
  get(ref: ResourceRef): Promise<ResourceObject | null>;
  create(resource: ResourceObject): Promise<ResourceObject>;
  update(resource: ResourceObject): Promise<ResourceObject>;
  list(apiVersion: string, kind: string, namespace?: string): Promise<ResourceObject[]>;
}

export function refOf(resource: ResourceObject): ResourceRef {
  const ref: ResourceRef = {
    apiVersion: resource.apiVersion,
    kind: resource.kind,
    name: resource.metadata.name
  };
  if (resource.metadata.namespace) {
    ref.namespace = resource.metadata.namespace;
  }
  return ref;
}

export function identityKey(ref: ResourceRef): string {
  return `${ref.kind}/${ref.namespace ?? ''}/${ref.name}`;
}
