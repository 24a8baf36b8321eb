/**
 * Encoding utilities shared by the signer and the decoders.
 * Canonical JSON comes from the canonicalize package (RFC 8785).
 */

import canonicalizeJson from 'canonicalize';

/** Base64url encode (no padding) */
export function toBase64url(bytes: Uint8Array): string {
  let binary = '';
  for (let i = 0; i < bytes.length; i++) {
    binary += String.fromCharCode(bytes[i]);
  }
  return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/** Base64url decode. Throws on characters outside the base64url alphabet. */
export function fromBase64url(str: string): Uint8Array {
  if (!/^[A-Za-z0-9_-]*$/.test(str)) {
    throw new Error('Invalid base64url input');
  }
  const padded = str.replace(/-/g, '+').replace(/_/g, '/');
  const binary = atob(padded);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function fromUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/** Canonical JSON (RFC 8785) */
export function canonicalize(obj: unknown): string {
  const result = canonicalizeJson(obj);
  if (result === undefined) {
    throw new Error('Failed to canonicalize object');
  }
  return result;
}

/** Canonical JSON, base64url encoded */
export function encodeSegment(obj: unknown): string {
  return toBase64url(utf8(canonicalize(obj)));
}

/** Parse a base64url segment holding JSON */
export function decodeSegment(segment: string): unknown {
  return JSON.parse(fromUtf8(fromBase64url(segment)));
}
