/**
 * Deterministic signer and token decoder.
 *
 * A token is `base64url(header).base64url(payload).base64url(signature)`, where
 * the header is always `{"alg":"ed25519-nkey","typ":"JWT"}`, the payload is the
 * RFC 8785 serialisation of the claim set, and the signature is Ed25519 over the
 * UTF-8 bytes of `header.payload`. Nothing time- or randomness-dependent enters
 * the payload, so identical inputs always yield identical tokens.
 */

import { fromPayload, toPayload } from './claims.js';
import { decodeSegment, encodeSegment, fromBase64url, toBase64url, utf8 } from './crypto.js';
import { decodingFailure, fail, keyTypeMismatch, ok, signingError } from './errors.js';
import { kindOfPublicKey, parsePublicKey, verifySignature } from './keys.js';
import type {
  AccountClaims,
  ClaimSet,
  DecodedToken,
  JwtHeader,
  KeyKind,
  KeyMaterial,
  OperatorClaims,
  Result,
  SignedToken,
  UserClaims,
} from './types.js';
import {
  validateCidr,
  validateConnectionType,
  validateEpochSeconds,
  validateLocale,
  validateSampling,
  validateSubject,
  validateTimeRange,
} from './validation.js';

export const JWT_HEADER: JwtHeader = { typ: 'JWT', alg: 'ed25519-nkey' };

/** Role the signer of each claim kind must hold */
const SIGNER_KIND: Record<ClaimSet['kind'], KeyKind> = {
  operator: 'operator',
  account: 'operator',
  user: 'account',
};

// ── Claim Validation ──

function check(result: Result<unknown>): string | null {
  return result.ok ? null : `${result.error.field}: ${result.error.detail}`;
}

function firstProblem(checks: Array<() => string | null>): string | null {
  for (const run of checks) {
    const problem = run();
    if (problem) return problem;
  }
  return null;
}

function keysOfKind(keys: readonly string[], kind: KeyKind, field: string): string | null {
  for (let i = 0; i < keys.length; i++) {
    const problem = check(parsePublicKey(keys[i], kind, `${field}[${i}]`));
    if (problem) return problem;
  }
  return null;
}

function operatorProblems(c: OperatorClaims): string | null {
  return firstProblem([
    () => keysOfKind(c.signingKeys, 'operator', 'signingKeys'),
    () => (c.systemAccount ? check(parsePublicKey(c.systemAccount, 'account', 'systemAccount')) : null),
  ]);
}

function accountProblems(c: AccountClaims): string | null {
  return firstProblem([
    () => keysOfKind(c.signingKeys, 'account', 'signingKeys'),
    () => c.exports.map((e, i) => check(validateSubject(e.subject, `exports[${i}].subject`))).find(Boolean) ?? null,
    () => Object.keys(c.tieredJetstream).includes('') ? 'tieredJetstream: tier name must not be empty' : null,
    () => (c.trace ? check(validateSubject(c.trace.destination, 'trace.destination')) : null),
    () => (c.trace ? check(validateSampling(c.trace.sampling, 'trace.sampling')) : null),
  ]);
}

function userProblems(c: UserClaims): string | null {
  return firstProblem([
    () => (c.issuerAccount ? check(parsePublicKey(c.issuerAccount, 'account', 'issuerAccount')) : null),
    () => c.sourceNetworks.map((n, i) => check(validateCidr(n, `sourceNetworks[${i}]`))).find(Boolean) ?? null,
    () => c.timeRestrictions.map((t, i) => check(validateTimeRange(t, `timeRestrictions[${i}]`))).find(Boolean) ?? null,
    () => (c.timeRestrictions.length > 0 && !c.locale ? 'locale: required when timeRestrictions are set' : null),
    () => (c.locale ? check(validateLocale(c.locale, 'locale')) : null),
    () => c.allowedConnectionTypes
      .map((t, i) => check(validateConnectionType(t, `allowedConnectionTypes[${i}]`)))
      .find(Boolean) ?? null,
  ]);
}

/** Returns a description of the first invalid field, or null when the claim set is well formed */
export function claimProblems(claims: ClaimSet): string | null {
  const commonProblem = firstProblem([
    () => check(parsePublicKey(claims.subject, claims.kind, 'subject')),
    () => check(validateEpochSeconds(claims.issuedAt, 'issuedAt')),
    () => check(validateEpochSeconds(claims.expires, 'expires')),
    () => check(validateEpochSeconds(claims.notBefore, 'notBefore')),
  ]);
  if (commonProblem) return commonProblem;
  switch (claims.kind) {
    case 'operator':
      return operatorProblems(claims);
    case 'account':
      return accountProblems(claims);
    case 'user':
      return userProblems(claims);
  }
}

// ── Sign ──

/**
 * Sign a claim set. The issuer is taken from `signer`; the input is not mutated.
 * Fails with key_type_mismatch when the signer's role cannot issue this kind,
 * signing_error "invalid claim data" when a field is malformed, and
 * signing_error "sign failure" when the key cannot produce a signature.
 */
export function signClaims(claims: ClaimSet, signer: KeyMaterial): Result<SignedToken> {
  const expected = SIGNER_KIND[claims.kind];
  if (signer.kind !== expected) {
    return fail(keyTypeMismatch('signer', expected, signer.kind));
  }

  const issued: ClaimSet = { ...claims, issuer: signer.publicKey };
  const problem = claimProblems(issued);
  if (problem) {
    return fail(signingError('claims', 'invalid claim data', problem));
  }

  let signingInput: string;
  try {
    signingInput = `${encodeSegment(JWT_HEADER)}.${encodeSegment(toPayload(issued))}`;
  } catch (e) {
    return fail(signingError('claims', 'invalid claim data', e instanceof Error ? e.message : String(e)));
  }

  let signature: Uint8Array;
  try {
    signature = signer.sign(utf8(signingInput));
  } catch (e) {
    return fail(signingError('signer', 'sign failure', e instanceof Error ? e.message : String(e)));
  }
  return ok(`${signingInput}.${toBase64url(signature)}`);
}

// ── Decode ──

export interface DecodeOptions {
  /** Verify the signature against the payload's issuer (default true) */
  verify?: boolean;
  /** Field name reported on failure */
  field?: string;
}

function isJwtHeader(value: unknown): value is JwtHeader {
  if (typeof value !== 'object' || value === null) return false;
  if (!('typ' in value) || !('alg' in value)) return false;
  return value.typ === JWT_HEADER.typ && value.alg === JWT_HEADER.alg;
}

/**
 * Parse a signed token back into its claim set. Needs no private key material.
 */
export function decodeToken(token: SignedToken, options: DecodeOptions = {}): Result<DecodedToken> {
  const field = options.field ?? 'token';
  const verify = options.verify ?? true;
  const parts = token.trim().split('.');
  if (parts.length !== 3) {
    return fail(decodingFailure(field, `expected 3 segments, got ${parts.length}`));
  }
  const [headerSegment, payloadSegment, signatureSegment] = parts;

  let header: unknown;
  let payload: unknown;
  let signature: Uint8Array;
  try {
    header = decodeSegment(headerSegment);
    payload = decodeSegment(payloadSegment);
    signature = fromBase64url(signatureSegment);
  } catch (e) {
    return fail(decodingFailure(field, `unreadable segment: ${e instanceof Error ? e.message : String(e)}`));
  }

  if (!isJwtHeader(header)) {
    return fail(decodingFailure(field, 'header is not {"typ":"JWT","alg":"ed25519-nkey"}'));
  }

  const claims = fromPayload(payload);
  if (!claims.ok) {
    return fail(decodingFailure(field, `${claims.error.field}: ${claims.error.detail}`));
  }

  const issuer = claims.value.issuer;
  if (kindOfPublicKey(issuer) === 'unknown') {
    return fail(decodingFailure(field, `issuer is not a public key: ${issuer || '(empty)'}`));
  }
  const subjectProblem = check(parsePublicKey(claims.value.subject, claims.value.kind, 'sub'));
  if (subjectProblem) {
    return fail(decodingFailure(field, subjectProblem));
  }
  if (verify && !verifySignature(issuer, utf8(`${headerSegment}.${payloadSegment}`), signature)) {
    return fail(decodingFailure(field, 'signature does not verify against the issuer'));
  }

  return ok({ token: token.trim(), header, claims: claims.value, signatureVerified: verify });
}

export function decodeOperatorToken(token: SignedToken, options: DecodeOptions = {}): Result<DecodedToken<OperatorClaims>> {
  const decoded = decodeToken(token, options);
  if (!decoded.ok) return decoded;
  const { claims } = decoded.value;
  if (claims.kind !== 'operator') {
    return fail(decodingFailure(options.field ?? 'token', `expected an operator token, got ${claims.kind}`));
  }
  return ok({ ...decoded.value, claims });
}

export function decodeAccountToken(token: SignedToken, options: DecodeOptions = {}): Result<DecodedToken<AccountClaims>> {
  const decoded = decodeToken(token, options);
  if (!decoded.ok) return decoded;
  const { claims } = decoded.value;
  if (claims.kind !== 'account') {
    return fail(decodingFailure(options.field ?? 'token', `expected an account token, got ${claims.kind}`));
  }
  return ok({ ...decoded.value, claims });
}

export function decodeUserToken(token: SignedToken, options: DecodeOptions = {}): Result<DecodedToken<UserClaims>> {
  const decoded = decodeToken(token, options);
  if (!decoded.ok) return decoded;
  const { claims } = decoded.value;
  if (claims.kind !== 'user') {
    return fail(decodingFailure(options.field ?? 'token', `expected a user token, got ${claims.kind}`));
  }
  return ok({ ...decoded.value, claims });
}
