import { KeyObject, X509Certificate } from 'crypto';
import { MalformedInputError, UnsupportedKeyTypeError } from '../errors';
import { isRecord } from '../store/fields';
import type { JsonWebKey, JsonWebKeySet } from './types';

const CERTIFICATE_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/;

/**
 * Derive a single-key JWKS from the RSA public key of a PEM certificate.
 *
 * Pure and deterministic: the same certificate and key id always produce the
 * same key set, and encodeKeySet() renders it byte-identically.
 *
 * @throws MalformedInputError when there is no certificate block or it does not parse
 * @throws UnsupportedKeyTypeError when the certificate key is not RSA
 */
export function deriveKeySet(certificatePem: string | Buffer, keyId: string): JsonWebKeySet {
  const text = typeof certificatePem === 'string' ? certificatePem : certificatePem.toString('utf8');
  const block = CERTIFICATE_BLOCK.exec(text);
  if (!block) {
    throw new MalformedInputError('No PEM certificate block found');
  }

  let certificate: X509Certificate;
  try {
    certificate = new X509Certificate(block[0]);
  } catch (error) {
    throw new MalformedInputError(
      `Failed to parse certificate: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  return deriveKeySetFromPublicKey(certificate.publicKey, keyId);
}

export function deriveKeySetFromPublicKey(publicKey: KeyObject, keyId: string): JsonWebKeySet {
  const keyType = publicKey.asymmetricKeyType ?? 'unknown';
  if (keyType !== 'rsa') {
    throw new UnsupportedKeyTypeError(keyType);
  }

  const exported: unknown = publicKey.export({ format: 'jwk' });
  const modulus = isRecord(exported) ? exported.n : undefined;
  const exponent = isRecord(exported) ? exported.e : undefined;
  if (typeof modulus !== 'string' || typeof exponent !== 'string') {
    throw new MalformedInputError('RSA public key is missing its modulus or exponent');
  }

  // field order is part of the output format
  const key: JsonWebKey = {
    kty: 'RSA',
    kid: keyId,
    use: 'sig',
    alg: 'RS256',
    n: encodeUnsignedBase64Url(Buffer.from(modulus, 'base64url')),
    e: encodeUnsignedBase64Url(Buffer.from(exponent, 'base64url'))
  };
  return { keys: [key] };
}

/**
 * Base64url without padding of a big-endian unsigned integer, leading zero
 * bytes stripped. Zero itself encodes as a single zero byte.
 */
export function encodeUnsignedBase64Url(bytes: Uint8Array): string {
  let start = 0;
  while (start < bytes.length - 1 && bytes[start] === 0) {
    start += 1;
  }
  return Buffer.from(bytes.subarray(start)).toString('base64url');
}

/** Two-space indented JSON, the format relying parties load. */
export function encodeKeySet(keySet: JsonWebKeySet): string {
  return JSON.stringify(keySet, null, 2);
}
