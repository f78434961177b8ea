// Narrowing helpers for reading kind-specific fields out of stored resources
import type { ResourceObject } from '../types';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walk a path of object keys, returning undefined as soon as a segment is missing. */
export function getPath(source: unknown, ...path: string[]): unknown {
  let current: unknown = source;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function getString(source: unknown, ...path: string[]): string | undefined {
  const value = getPath(source, ...path);
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(source: unknown, ...path: string[]): number | undefined {
  const value = getPath(source, ...path);
  return typeof value === 'number' ? value : undefined;
}

export function getArray(source: unknown, ...path: string[]): unknown[] {
  const value = getPath(source, ...path);
  return Array.isArray(value) ? value : [];
}

export function toStringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(value)) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      result[key] = entry;
    }
  }
  return result;
}

/**
 * Decoded bytes of a Secret data entry. Secret values travel base64 encoded.
 */
export function readSecretData(secret: ResourceObject, key: string): Buffer | undefined {
  const encoded = getString(secret, 'data', key);
  return encoded === undefined ? undefined : Buffer.from(encoded, 'base64');
}

export function encodeSecretData(values: Record<string, string | Buffer>): Record<string, string> {
  const data: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    data[key] = (typeof value === 'string' ? Buffer.from(value, 'utf8') : value).toString('base64');
  }
  return data;
}
