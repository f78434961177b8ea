import type { EnsureOutcome, ResourceObject, ResourceRef } from '../types';
import { ResourceAlreadyExistsError, StoreError, StoreOperation, StoreOperationError } from '../errors';
import { Logger, logger as rootLogger } from '../logger';
import { ResourceStore, refOf } from '../store/types';
import type { ResourceEnsurerLike } from './types';

/**
 * Create-if-absent over a ResourceStore.
 *
 * Existing resources are accepted as they are; their spec is never compared
 * or patched. Losing a create race to another writer counts as success.
 */
export class ResourceEnsurer implements ResourceEnsurerLike {
  private readonly log: Logger;

  constructor(private readonly store: ResourceStore, log: Logger = rootLogger) {
    this.log = log.child({ module: 'resource-ensurer' });
  }

  async ensure(descriptor: ResourceObject): Promise<EnsureOutcome> {
    const ref = refOf(descriptor);

    let existing: ResourceObject | null;
    try {
      existing = await this.store.get(ref);
    } catch (error) {
      throw toStoreError('get', ref, error);
    }
    if (existing) {
      this.log.debug('Resource already exists', { ...ref });
      return { ref, status: 'exists' };
    }

    try {
      await this.store.create(descriptor);
    } catch (error) {
      if (error instanceof ResourceAlreadyExistsError) {
        this.log.debug('Resource was created concurrently', { ...ref });
        return { ref, status: 'exists' };
      }
      throw toStoreError('create', ref, error);
    }

    this.log.info('Created resource', { ...ref });
    return { ref, status: 'created' };
  }

  /**
   * Ensure each descriptor in order, stopping at the first failure.
   */
  async ensureAll(descriptors: ResourceObject[]): Promise<EnsureOutcome[]> {
    const outcomes: EnsureOutcome[] = [];
    for (const descriptor of descriptors) {
      outcomes.push(await this.ensure(descriptor));
    }
    return outcomes;
  }
}

function toStoreError(operation: StoreOperation, ref: ResourceRef, error: unknown): StoreError {
  return error instanceof StoreError ? error : new StoreOperationError(operation, ref, error);
}
