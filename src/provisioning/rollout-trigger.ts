import { createHash } from 'crypto';
import type { ResourceObject, ResourceRef } from '../types';
import { Logger, logger as rootLogger } from '../logger';
import type { ResourceStore } from '../store/types';
import { JsonRecord, getPath, isRecord, toStringMap } from '../store/fields';
import { systemClock } from './clock';
import type { Clock, RestartResult } from './types';

export const RESTARTED_AT_ANNOTATION = 'kubectl.kubernetes.io/restartedAt';

export interface RolloutTriggerOptions {
  /** Pod template annotation holding the digest of the workload's inputs */
  digestAnnotation: string;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Forces workloads to roll by stamping their pod template.
 */
export class RolloutTrigger {
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly digestAnnotation: string;

  constructor(private readonly store: ResourceStore, options: RolloutTriggerOptions) {
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ module: 'rollout-trigger' });
    this.digestAnnotation = options.digestAnnotation;
  }

  /**
   * Unconditionally restart the workload. The new marker is strictly later
   * than the previous one, even when the clock has not moved on.
   */
  async triggerRestart(ref: ResourceRef): Promise<RestartResult> {
    const workload = await this.store.get(ref);
    if (!workload) {
      this.log.info('Workload not found, nothing to restart', { ...ref });
      return { status: 'not-found', ref };
    }
    return this.stamp(workload, ref, {});
  }

  /**
   * Restart only when inputDigest differs from the digest recorded on the
   * pod template. A workload without a recorded digest is restarted.
   */
  async restartOnInputChange(ref: ResourceRef, inputDigest: string): Promise<RestartResult> {
    const workload = await this.store.get(ref);
    if (!workload) {
      this.log.info('Workload not found, nothing to restart', { ...ref });
      return { status: 'not-found', ref };
    }
    if (templateAnnotations(workload)[this.digestAnnotation] === inputDigest) {
      this.log.debug('Workload inputs unchanged', { ...ref });
      return { status: 'unchanged', ref };
    }
    return this.stamp(workload, ref, { [this.digestAnnotation]: inputDigest });
  }

  private async stamp(
    workload: ResourceObject,
    ref: ResourceRef,
    extra: Record<string, string>
  ): Promise<RestartResult> {
    const previous = templateAnnotations(workload)[RESTARTED_AT_ANNOTATION];
    const restartedAt = nextRestartMarker(this.clock.now(), previous);

    await this.store.update(
      withTemplateAnnotations(workload, { ...extra, [RESTARTED_AT_ANNOTATION]: restartedAt })
    );
    this.log.info('Triggered workload restart', { ...ref, restartedAt });
    return { status: 'updated', ref, restartedAt };
  }
}

/** RFC3339 at second precision, e.g. 2024-05-01T10:00:00Z */
export function formatRestartMarker(epochMs: number): string {
  return new Date(Math.floor(epochMs / 1000) * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function nextRestartMarker(nowMs: number, previous?: string): string {
  const previousMs = previous === undefined ? NaN : Date.parse(previous);
  const nowSeconds = Math.floor(nowMs / 1000) * 1000;
  if (!Number.isNaN(previousMs) && nowSeconds <= previousMs) {
    return formatRestartMarker(previousMs + 1000);
  }
  return formatRestartMarker(nowSeconds);
}

/** Stable sha256 over the given inputs, in order. */
export function digestOf(...parts: Array<string | Buffer>): string {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(part);
    hash.update('\0');
  }
  return hash.digest('hex');
}

export function templateAnnotations(workload: ResourceObject): Record<string, string> {
  return toStringMap(getPath(workload, 'spec', 'template', 'metadata', 'annotations'));
}

function withTemplateAnnotations(workload: ResourceObject, annotations: Record<string, string>): ResourceObject {
  const spec: JsonRecord = isRecord(workload.spec) ? workload.spec : {};
  const template: JsonRecord = isRecord(spec.template) ? spec.template : {};
  const metadata: JsonRecord = isRecord(template.metadata) ? template.metadata : {};
  return {
    ...workload,
    spec: {
      ...spec,
      template: {
        ...template,
        metadata: {
          ...metadata,
          annotations: { ...toStringMap(metadata.annotations), ...annotations }
        }
      }
    }
  };
}
