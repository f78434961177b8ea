import { KubeConfig, KubernetesObject, KubernetesObjectApi } from '@kubernetes/client-node';
import type { ResourceObject, ResourceRef } from '../types';
import {
  ResourceAlreadyExistsError,
  ResourceConflictError,
  ResourceNotFoundError,
  StoreOperationError
} from '../errors';
import { ResourceStore, refOf } from './types';
import { getNumber, getPath, getString, isRecord } from './fields';

/**
 * The subset of KubernetesObjectApi the store relies on.
 */
export interface ObjectApiClient {
  read(spec: Parameters<KubernetesObjectApi['read']>[0]): Promise<{ body: KubernetesObject }>;
  create(spec: KubernetesObject): Promise<{ body: KubernetesObject }>;
  replace(spec: KubernetesObject): Promise<{ body: KubernetesObject }>;
  list(apiVersion: string, kind: string, namespace?: string): Promise<{ body: { items: KubernetesObject[] } }>;
}

/**
 * ResourceStore backed by the Kubernetes API server.
 */
export class KubernetesResourceStore implements ResourceStore {
  constructor(private readonly client: ObjectApiClient) {}

  /**
   * Build a store from the default kubeconfig resolution
   * (KUBECONFIG, ~/.kube/config, or the in-cluster service account).
   */
  static fromDefaultKubeConfig(): KubernetesResourceStore {
    const kc = new KubeConfig();
    try {
      kc.loadFromDefault();
    } catch (error) {
      throw new Error(`Failed to load Kubernetes config: ${error instanceof Error ? error.message : String(error)}`);
    }
    return new KubernetesResourceStore(KubernetesObjectApi.makeApiClient(kc));
  }

  async get(ref: ResourceRef): Promise<ResourceObject | null> {
    try {
      const { body } = await this.client.read({
        apiVersion: ref.apiVersion,
        kind: ref.kind,
        metadata: { name: ref.name, namespace: ref.namespace ?? '' }
      });
      return toResourceObject(body, ref);
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return null;
      }
      throw new StoreOperationError('get', ref, error, apiErrorMessage(error));
    }
  }

  async create(resource: ResourceObject): Promise<ResourceObject> {
    const ref = refOf(resource);
    try {
      const { body } = await this.client.create(resource);
      return toResourceObject(body, ref);
    } catch (error) {
      if (statusCodeOf(error) === 409) {
        throw new ResourceAlreadyExistsError(ref);
      }
      throw new StoreOperationError('create', ref, error, apiErrorMessage(error));
    }
  }

  async update(resource: ResourceObject): Promise<ResourceObject> {
    const ref = refOf(resource);
    try {
      const { body } = await this.client.replace(resource);
      return toResourceObject(body, ref);
    } catch (error) {
      const status = statusCodeOf(error);
      if (status === 409) {
        throw new ResourceConflictError(ref);
      }
      if (status === 404) {
        throw new ResourceNotFoundError(ref);
      }
      throw new StoreOperationError('update', ref, error, apiErrorMessage(error));
    }
  }

  async list(apiVersion: string, kind: string, namespace?: string): Promise<ResourceObject[]> {
    const ref: ResourceRef = { apiVersion, kind, namespace, name: '*' };
    try {
      const { body } = await this.client.list(apiVersion, kind, namespace);
      // list items usually come back without apiVersion/kind
      return body.items.map(item => toResourceObject(item, ref));
    } catch (error) {
      throw new StoreOperationError('list', ref, error, apiErrorMessage(error));
    }
  }
}

/**
 * HTTP status carried by an API error, across client-node error shapes
 * (HttpError.statusCode, response.statusCode, body.code).
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  return (
    getNumber(error, 'statusCode') ??
    getNumber(error, 'response', 'statusCode') ??
    getNumber(error, 'body', 'code') ??
    getNumber(error, 'code')
  );
}

function toResourceObject(body: KubernetesObject, fallback: ResourceRef): ResourceObject {
  const name = body.metadata?.name;
  if (!body.metadata || !name) {
    throw new StoreOperationError('get', fallback, new Error('response is missing metadata.name'));
  }
  return {
    ...body,
    apiVersion: body.apiVersion ?? fallback.apiVersion,
    kind: body.kind ?? fallback.kind,
    metadata: { ...body.metadata, name }
  };
}

/** Human readable reason of an API error body, for diagnostics. */
export function apiErrorMessage(error: unknown): string {
  const body = getPath(error, 'body');
  if (typeof body === 'string') {
    return body;
  }
  return getString(body, 'message') ?? (error instanceof Error ? error.message : String(error));
}
