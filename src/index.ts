/**
 * trustmint: deterministic operator → account → user credential minting.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  KeyKind,
  KeyMaterial,
  GeneratedKey,
  KeyInput,
  Permission,
  Permissions,
  ResponsePermission,
  ConnectionLimits,
  AccountLimits,
  JetStreamLimits,
  MessageTrace,
  ExportType,
  ResponseType,
  AccountExport,
  ConnectionType,
  TimeRange,
  CommonClaims,
  OperatorClaims,
  AccountClaims,
  UserClaims,
  ClaimSet,
  ClaimKind,
  SignedToken,
  JwtHeader,
  DecodedToken,
  SigningFailureReason,
  AssemblyFailureReason,
  CredentialFailure,
  FailureType,
  ConflictNotice,
  ConflictPolicy,
  IssuedCredential,
  IssuedUser,
  ResolverKind,
  Bundle,
} from './core/types.js';
export { NO_LIMIT } from './core/types.js';

// ── Errors ──
export {
  ok,
  fail,
  describeFailure,
  CredentialError,
  unwrap,
} from './core/errors.js';

// ── Keys ──
export {
  decodeSeed,
  resolveKey,
  parsePublicKey,
  publicKeyFromSeed,
  verifySignature,
  generateKey,
  kindOfPublicKey,
  kindOfSeed,
} from './core/keys.js';

// ── Claims ──
export {
  CLAIMS_VERSION,
  newOperatorClaims,
  newAccountClaims,
  newUserClaims,
  jetstreamLimitsForTier,
  toPayload,
  fromPayload,
} from './core/claims.js';

// ── Validation ──
export {
  CONNECTION_TYPES,
  parseDuration,
  validateCidr,
  validateLocale,
  validateSampling,
  validateSubject,
  validateTimeOfDay,
  validateTimeRange,
} from './core/validation.js';

// ── Signer ──
export {
  JWT_HEADER,
  signClaims,
  decodeToken,
  decodeOperatorToken,
  decodeAccountToken,
  decodeUserToken,
} from './core/signer.js';
export type { DecodeOptions } from './core/signer.js';

// ── Hierarchy ──
export {
  HierarchyBuilder,
  SYSTEM_ACCOUNT_EXPORTS,
  mergeSystemExports,
  buildOperator,
  buildAccount,
  buildSystemAccount,
  buildUser,
} from './core/hierarchy.js';
export type {
  HierarchyConfig,
  TemporalOptions,
  OperatorOptions,
  AccountOptions,
  UserOptions,
  ConnectionLimitOptions,
  AccountLimitOptions,
  JetStreamLimitOptions,
  PermissionOptions,
  UserPermissionOptions,
  TraceOptions,
} from './core/hierarchy.js';

// ── Chain ──
export { verifyChain, operatorMaySign, accountMaySign } from './core/chain.js';
export type { ChainInput, VerifiedChain } from './core/chain.js';

// ── Creds ──
export { renderCreds, parseCreds } from './core/creds.js';
export type { ParsedCreds } from './core/creds.js';

// ── Bundle ──
export {
  TrustBundleAssembler,
  assemble,
  assembleServerConfig,
  renderServerConfig,
} from './core/bundle.js';
export type { AssembleInput, AssemblerConfig } from './core/bundle.js';

// ── Logger ──
export {
  LogLevel,
  ConsoleLogger,
  createLogger,
  parseLogLevel,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
} from './core/logger.js';
export type { Logger, LogEntry } from './core/logger.js';
