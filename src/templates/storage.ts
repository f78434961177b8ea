import type { ResourceNames } from '../config/naming';
import type { ResourceObject } from '../types';
import { MANAGED_BY } from './common';

export const STORAGE_PROVISIONER = 'driver.longhorn.io';

export function storageClass(name: string, replicas: number): ResourceObject {
  return {
    apiVersion: 'storage.k8s.io/v1',
    kind: 'StorageClass',
    metadata: {
      name,
      labels: { 'app.kubernetes.io/managed-by': MANAGED_BY }
    },
    provisioner: STORAGE_PROVISIONER,
    allowVolumeExpansion: true,
    volumeBindingMode: 'WaitForFirstConsumer',
    parameters: {
      numberOfReplicas: String(replicas)
    }
  };
}

export function storageClasses(names: ResourceNames): ResourceObject[] {
  return [storageClass(names.storageClassReplica1, 1), storageClass(names.storageClassReplica2, 2)];
}
