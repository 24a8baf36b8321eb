/**
 * Key material: thin adapter over nkeys.js.
 *
 * Seeds look like `SO...`, `SA...`, `SU...`, `SN...`; public keys carry the role
 * in their first character (`O`, `A`, `U`, `N`). nkeys.js owns the checksum,
 * the base32 codec and Ed25519; this module only maps roles and failures.
 */

import { createAccount, createOperator, createServer, createUser, fromPublic, fromSeed } from 'nkeys.js';
import type { KeyPair } from 'nkeys.js';
import { fromUtf8, utf8 } from './crypto.js';
import { fail, keyTypeMismatch, malformed, ok } from './errors.js';
import type { GeneratedKey, KeyInput, KeyKind, KeyMaterial, Result } from './types.js';

const ROLE_BY_CHAR: Record<string, KeyKind> = {
  O: 'operator',
  A: 'account',
  U: 'user',
  N: 'server',
};

const CHAR_BY_ROLE: Record<KeyKind, string> = {
  operator: 'O',
  account: 'A',
  user: 'U',
  server: 'N',
};

/** Role of a public key by its prefix character, or 'unknown' */
export function kindOfPublicKey(publicKey: string): KeyKind | 'unknown' {
  return ROLE_BY_CHAR[publicKey.charAt(0)] ?? 'unknown';
}

/** Role of a seed by its second character, or 'unknown' */
export function kindOfSeed(seed: string): KeyKind | 'unknown' {
  if (seed.charAt(0) !== 'S') return 'unknown';
  return ROLE_BY_CHAR[seed.charAt(1)] ?? 'unknown';
}

function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function toMaterial(kind: KeyKind, seed: string, pair: KeyPair): KeyMaterial {
  const publicKey = pair.getPublicKey();
  return Object.freeze({
    kind,
    seed,
    publicKey,
    sign: (data: Uint8Array) => pair.sign(data),
  });
}

/**
 * Decode a seed into key material.
 * @param expected - Role the call site requires; a different role is a key_type_mismatch
 * @param field - Field name reported on failure
 */
export function decodeSeed(seed: string, expected?: KeyKind, field = 'seed'): Result<KeyMaterial> {
  const kind = kindOfSeed(seed);
  if (kind === 'unknown') {
    return fail(malformed(field, 'not an operator, account, user or server seed'));
  }
  let pair: KeyPair;
  try {
    pair = fromSeed(utf8(seed));
  } catch (e) {
    return fail(malformed(field, `invalid seed: ${errorText(e)}`));
  }
  const material = toMaterial(kind, seed, pair);
  if (kindOfPublicKey(material.publicKey) !== kind) {
    return fail(malformed(field, 'seed prefix does not match its public key'));
  }
  if (expected && kind !== expected) {
    return fail(keyTypeMismatch(field, expected, kind));
  }
  return ok(material);
}

/** Accept either a seed string or already decoded material, enforcing the role */
export function resolveKey(input: KeyInput, expected: KeyKind, field: string): Result<KeyMaterial> {
  if (typeof input === 'string') return decodeSeed(input, expected, field);
  if (input.kind !== expected) return fail(keyTypeMismatch(field, expected, input.kind));
  return ok(input);
}

/** Validate a public key's checksum and, optionally, its role */
export function parsePublicKey(
  publicKey: string,
  expected?: KeyKind,
  field = 'publicKey',
): Result<{ kind: KeyKind; publicKey: string }> {
  const kind = kindOfPublicKey(publicKey);
  if (kind === 'unknown') {
    return fail(malformed(field, `not an nkey public key: ${publicKey || '(empty)'}`));
  }
  try {
    fromPublic(publicKey);
  } catch (e) {
    return fail(malformed(field, `invalid public key: ${errorText(e)}`));
  }
  if (expected && kind !== expected) {
    return fail(keyTypeMismatch(field, expected, kind));
  }
  return ok({ kind, publicKey });
}

/** Derive the public key of a seed */
export function publicKeyFromSeed(seed: string): Result<string> {
  const decoded = decodeSeed(seed);
  return decoded.ok ? ok(decoded.value.publicKey) : decoded;
}

/** Verify an Ed25519 signature made by the holder of `publicKey` */
export function verifySignature(publicKey: string, data: Uint8Array, signature: Uint8Array): boolean {
  try {
    return fromPublic(publicKey).verify(data, signature);
  } catch {
    return false;
  }
}

/** Generate a fresh key pair of the given role */
export function generateKey(kind: KeyKind): GeneratedKey {
  const pair = createPairFor(kind);
  const seed = fromUtf8(pair.getSeed());
  const publicKey = pair.getPublicKey();
  if (!publicKey.startsWith(CHAR_BY_ROLE[kind])) {
    throw new Error(`Generated ${kind} key has unexpected prefix`);
  }
  return { kind, seed, publicKey };
}

function createPairFor(kind: KeyKind): KeyPair {
  switch (kind) {
    case 'operator':
      return createOperator();
    case 'account':
      return createAccount();
    case 'user':
      return createUser();
    case 'server':
      return createServer();
  }
}
