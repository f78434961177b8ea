import type { ResourceNames } from '../config/naming';
import type { ResourceObject } from '../types';
import { managedLabels, opaqueSecret } from './common';

export const WEBHOOK_SECRET_KEY = 'secret';

/**
 * Secret used to sign outgoing webhook deliveries to targetUrl.
 */
export function webhookSigningSecret(names: ResourceNames, targetUrl: string, signingKey: Buffer): ResourceObject {
  return opaqueSecret(
    names.platformNamespace,
    names.webhookSecret,
    { [WEBHOOK_SECRET_KEY]: signingKey },
    managedLabels('webhook', 'credentials'),
    { [names.webhookTargetAnnotation]: targetUrl }
  );
}
