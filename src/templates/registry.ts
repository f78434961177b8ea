import type { ResourceNames } from '../config/naming';
import type { ResourceObject } from '../types';
import { managedLabels, opaqueSecret } from './common';

export const REGISTRY_HTTP_SECRET_KEY = 'http-secret';
export const JWKS_KEY = 'jwks.json';
export const JWKS_KEY_ID = 'registry-auth-jwt-signer';
export const CA_CERT_KEY = 'ca.crt';
export const TLS_CERT_KEY = 'tls.crt';

/**
 * @param httpSecret - 32 random bytes; the registry reads them base64 encoded
 */
export function registryHttpSecret(names: ResourceNames, httpSecret: Buffer): ResourceObject {
  return opaqueSecret(
    names.registryNamespace,
    names.registryHttpSecret,
    { [REGISTRY_HTTP_SECRET_KEY]: httpSecret.toString('base64') },
    managedLabels('registry', 'credentials')
  );
}

export function registryJwksSecret(names: ResourceNames, jwksDocument: string): ResourceObject {
  return opaqueSecret(
    names.registryNamespace,
    names.registryJwksSecret,
    { [JWKS_KEY]: jwksDocument },
    managedLabels('registry', 'credentials')
  );
}

export function buildkitCaSecret(names: ResourceNames, caCertificate: Buffer): ResourceObject {
  return opaqueSecret(
    names.buildkitNamespace,
    names.buildkitCaSecret,
    { [CA_CERT_KEY]: caCertificate },
    managedLabels('buildkitd', 'credentials')
  );
}
