/**
 * trustmint Core Types
 * Single source of truth for the key, claim, token and bundle shapes.
 */

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = CredentialFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── Key Material ──

/** Role encoded in the prefix of every seed and public key */
export type KeyKind = 'operator' | 'account' | 'user' | 'server';

/** A decoded seed. Immutable; only lives for the duration of a signing call. */
export interface KeyMaterial {
  readonly kind: KeyKind;
  readonly seed: string;
  /** Role-prefixed public key (O..., A..., U..., N...) */
  readonly publicKey: string;
  sign(data: Uint8Array): Uint8Array;
}

/** Freshly generated key pair in its textual encodings */
export interface GeneratedKey {
  kind: KeyKind;
  seed: string;
  publicKey: string;
}

/** Seeds may be passed encoded or already decoded */
export type KeyInput = string | KeyMaterial;

// ── Shared Claim Pieces ──

/** Sentinel meaning "no limit" for every numeric limit */
export const NO_LIMIT = -1;

export interface Permission {
  allow: string[];
  deny: string[];
}

export interface Permissions {
  pub: Permission;
  sub: Permission;
}

export interface ResponsePermission {
  maxMsgs: number;
  /** Time to live in nanoseconds */
  ttlNanos: number;
}

export interface ConnectionLimits {
  subs: number;
  data: number;
  payload: number;
}

export interface AccountLimits {
  imports: number;
  exports: number;
  wildcardExports: boolean;
  disallowBearer: boolean;
  conn: number;
  leafNodeConn: number;
}

export interface JetStreamLimits {
  memStorage: number;
  diskStorage: number;
  streams: number;
  consumer: number;
  maxAckPending: number;
  memMaxStreamBytes: number;
  diskMaxStreamBytes: number;
  maxBytesRequired: boolean;
}

export interface MessageTrace {
  destination: string;
  /** Percentage 0-100; 0 leaves sampling to the server */
  sampling: number;
}

export type ExportType = 'service' | 'stream';
export type ResponseType = 'Singleton' | 'Stream' | 'Chunked';

export interface AccountExport {
  name: string;
  subject: string;
  type: ExportType;
  responseType?: ResponseType;
  accountTokenPosition?: number;
  description?: string;
  infoUrl?: string;
}

export type ConnectionType = 'STANDARD' | 'WEBSOCKET' | 'LEAFNODE' | 'MQTT';

export interface TimeRange {
  /** HH:MM:SS */
  start: string;
  /** HH:MM:SS */
  end: string;
}

// ── Claim Sets ──

export interface CommonClaims {
  subject: string;
  /** Filled in by the signer */
  issuer: string;
  issuedAt: number;
  expires: number;
  notBefore: number;
  name: string;
  tags: string[];
}

export interface OperatorClaims extends CommonClaims {
  kind: 'operator';
  signingKeys: string[];
  accountServerUrl: string;
  operatorServiceUrls: string[];
  systemAccount: string;
  strictSigningKeyUsage: boolean;
}

export interface AccountClaims extends CommonClaims {
  kind: 'account';
  signingKeys: string[];
  description: string;
  infoUrl: string;
  exports: AccountExport[];
  natsLimits: ConnectionLimits;
  accountLimits: AccountLimits;
  jetstream: JetStreamLimits;
  /** Tier name → limits; a tier absent here falls back to `jetstream` */
  tieredJetstream: Record<string, JetStreamLimits>;
  defaultPermissions: Permissions;
  trace?: MessageTrace;
}

export interface UserClaims extends CommonClaims {
  kind: 'user';
  issuerAccount: string;
  permissions: Permissions;
  response?: ResponsePermission;
  limits: ConnectionLimits;
  bearerToken: boolean;
  allowedConnectionTypes: ConnectionType[];
  sourceNetworks: string[];
  timeRestrictions: TimeRange[];
  locale: string;
}

export type ClaimSet = OperatorClaims | AccountClaims | UserClaims;
export type ClaimKind = ClaimSet['kind'];

// ── Signed Tokens ──

/** header.payload.signature, each segment base64url */
export type SignedToken = string;

export interface JwtHeader {
  typ: 'JWT';
  alg: 'ed25519-nkey';
}

/** A token parsed back into its typed claim set */
export interface DecodedToken<C extends ClaimSet = ClaimSet> {
  token: SignedToken;
  header: JwtHeader;
  claims: C;
  signatureVerified: boolean;
}

// ── Failures ──

export type SigningFailureReason = 'sign failure' | 'invalid claim data';
export type AssemblyFailureReason = 'unsupported resolver' | 'malformed account token' | 'malformed operator token';

export type CredentialFailure =
  | { type: 'key_type_mismatch'; field: string; expected: KeyKind; actual: KeyKind | 'unknown'; detail: string }
  | { type: 'malformed_input'; field: string; detail: string }
  | { type: 'conflicting_configuration'; field: string; key: string; detail: string }
  | { type: 'decoding_failure'; field: string; detail: string }
  | { type: 'signing_error'; field: string; reason: SigningFailureReason; detail: string }
  | { type: 'assembly_error'; field: string; reason: AssemblyFailureReason; detail: string }
  | { type: 'chain_violation'; field: string; detail: string };

export type FailureType = CredentialFailure['type'];

/** Last-write-wins resolution that the caller can inspect */
export interface ConflictNotice {
  field: string;
  key: string;
  detail: string;
}

export type ConflictPolicy = 'warn' | 'reject';

// ── Issued Credentials ──

export interface IssuedCredential<C extends ClaimSet = ClaimSet> {
  jwt: SignedToken;
  publicKey: string;
  claims: C;
  conflicts: ConflictNotice[];
}

export interface IssuedUser extends IssuedCredential<UserClaims> {
  /** Decorated JWT + seed, ready for a client library */
  creds: string;
}

// ── Trust Bundle ──

export type ResolverKind = 'MEMORY';

export interface Bundle {
  operator: SignedToken;
  /** Empty when no system account was supplied */
  systemAccountPublicKey: string;
  resolverKind: ResolverKind;
  /** Account public key → account token, in assembly order */
  preloadMap: Record<string, SignedToken>;
  conflicts: ConflictNotice[];
}
