import type { ResourceObject } from '../types';
import { encodeSecretData } from '../store/fields';

export const MANAGED_BY = 'cluster-bootstrap';

export function managedLabels(app: string, component?: string): Record<string, string> {
  const labels: Record<string, string> = {
    app,
    'app.kubernetes.io/name': app,
    'app.kubernetes.io/managed-by': MANAGED_BY
  };
  if (component) {
    labels['app.kubernetes.io/component'] = component;
  }
  return labels;
}

export function namespaceManifest(name: string): ResourceObject {
  return {
    apiVersion: 'v1',
    kind: 'Namespace',
    metadata: {
      name,
      labels: { 'app.kubernetes.io/managed-by': MANAGED_BY }
    }
  };
}

export function opaqueSecret(
  namespace: string,
  name: string,
  values: Record<string, string | Buffer>,
  labels: Record<string, string>,
  annotations?: Record<string, string>
): ResourceObject {
  const metadata: ResourceObject['metadata'] = { name, namespace, labels };
  if (annotations) {
    metadata.annotations = annotations;
  }
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata,
    type: 'Opaque',
    data: encodeSecretData(values)
  };
}
