/**
 * Failure constructors and the throw-style escape hatch.
 */

import type {
  AssemblyFailureReason,
  ConflictNotice,
  CredentialFailure,
  KeyKind,
  Result,
  SigningFailureReason,
} from './types.js';

// ── Constructors ──

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: CredentialFailure): Result<T> {
  return { ok: false, error };
}

export function keyTypeMismatch(field: string, expected: KeyKind, actual: KeyKind | 'unknown'): CredentialFailure {
  return {
    type: 'key_type_mismatch',
    field,
    expected,
    actual,
    detail: `expected ${expected} key, got ${actual} key`,
  };
}

export function malformed(field: string, detail: string): CredentialFailure {
  return { type: 'malformed_input', field, detail };
}

export function conflict(notice: ConflictNotice): CredentialFailure {
  return { type: 'conflicting_configuration', ...notice };
}

export function decodingFailure(field: string, detail: string): CredentialFailure {
  return { type: 'decoding_failure', field, detail };
}

export function signingError(field: string, reason: SigningFailureReason, detail: string): CredentialFailure {
  return { type: 'signing_error', field, reason, detail };
}

export function assemblyError(field: string, reason: AssemblyFailureReason, detail: string): CredentialFailure {
  return { type: 'assembly_error', field, reason, detail };
}

export function chainViolation(field: string, detail: string): CredentialFailure {
  return { type: 'chain_violation', field, detail };
}

// ── Rendering ──

/** One-line description: `<type> at <field>: <detail>` */
export function describeFailure(failure: CredentialFailure): string {
  switch (failure.type) {
    case 'signing_error':
    case 'assembly_error':
      return `${failure.type} (${failure.reason}) at ${failure.field}: ${failure.detail}`;
    case 'conflicting_configuration':
      return `${failure.type} at ${failure.field} [${failure.key}]: ${failure.detail}`;
    default:
      return `${failure.type} at ${failure.field}: ${failure.detail}`;
  }
}

// ── Exceptions ──

export class CredentialError extends Error {
  constructor(public readonly failure: CredentialFailure) {
    super(describeFailure(failure));
    this.name = 'CredentialError';
  }
}

/** Return the value of a successful result or throw a CredentialError */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new CredentialError(result.error);
  return result.value;
}
