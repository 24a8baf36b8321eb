/**
 * Hierarchy builder: turns per-entity options into claim sets and signs them.
 *
 * Operator tokens are issued by the operator itself (or one of its declared
 * signing keys), account tokens by an operator, user tokens by an account or one
 * of its signing keys. Claim construction is all-or-nothing: the first invalid
 * field aborts the build before anything is signed.
 */

import { disabledJetStream, emptyPermissions, newAccountClaims, newOperatorClaims, newUserClaims } from './claims.js';
import { renderCreds } from './creds.js';
import { chainViolation, conflict, fail, malformed, ok } from './errors.js';
import { parsePublicKey, resolveKey } from './keys.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { decodeAccountToken, signClaims } from './signer.js';
import type {
  AccountClaims,
  AccountExport,
  ClaimSet,
  CommonClaims,
  ConflictNotice,
  ConflictPolicy,
  ConnectionLimits,
  CredentialFailure,
  IssuedCredential,
  IssuedUser,
  JetStreamLimits,
  KeyInput,
  KeyKind,
  KeyMaterial,
  OperatorClaims,
  Permissions,
  Result,
  SignedToken,
  TimeRange,
  UserClaims,
} from './types.js';
import { NO_LIMIT } from './types.js';
import {
  dedupe,
  parseDuration,
  validateAll,
  validateCidr,
  validateConnectionType,
  validateEpochSeconds,
  validateLimit,
  validateLocale,
  validateSampling,
  validateSubject,
  validateTimeRange,
} from './validation.js';

// ── Options ──

export interface TemporalOptions {
  /** Seconds since the epoch; defaults to 0, never to the current time */
  issuedAt?: number;
  /** 0 = never */
  expires?: number;
  /** Defaults to issuedAt */
  notBefore?: number;
}

export interface OperatorOptions extends TemporalOptions {
  signingKeys?: string[];
  accountServerUrl?: string;
  operatorServiceUrls?: string[];
  systemAccount?: string;
  strictSigningKeyUsage?: boolean;
  tags?: string[];
}

export interface ConnectionLimitOptions {
  subs?: number;
  data?: number;
  payload?: number;
}

export interface AccountLimitOptions {
  imports?: number;
  exports?: number;
  wildcardExports?: boolean;
  disallowBearer?: boolean;
  conn?: number;
  leafNodeConn?: number;
}

export interface JetStreamLimitOptions {
  /** Replication/storage tier (e.g. "R1"); unlabeled blocks set the global record */
  tier?: string;
  memStorage?: number;
  diskStorage?: number;
  streams?: number;
  consumer?: number;
  maxAckPending?: number;
  memMaxStreamBytes?: number;
  diskMaxStreamBytes?: number;
  maxBytesRequired?: boolean;
}

export interface PermissionOptions {
  pubAllow?: string[];
  pubDeny?: string[];
  subAllow?: string[];
  subDeny?: string[];
}

export interface UserPermissionOptions extends PermissionOptions {
  respMaxMsgs?: number;
  /** Duration string such as "5s" or "1m30s" */
  respTtl?: string;
}

export interface TraceOptions {
  destination?: string;
  sampling?: number;
}

export interface AccountOptions extends TemporalOptions {
  signingKeys?: string[];
  description?: string;
  infoUrl?: string;
  tags?: string[];
  natsLimits?: ConnectionLimitOptions;
  accountLimits?: AccountLimitOptions;
  jetstreamLimits?: JetStreamLimitOptions[];
  defaultPermissions?: PermissionOptions;
  trace?: TraceOptions;
  exports?: AccountExport[];
}

export interface UserOptions extends TemporalOptions {
  /** Account public key, for tokens issued by one of the account's signing keys */
  issuerAccount?: string;
  /** Signed token of the owning account; enables signer and issuerAccount checks */
  parentAccount?: SignedToken;
  /** Copy the parent account's default permissions when no permissions are given */
  inheritDefaultPermissions?: boolean;
  permissions?: UserPermissionOptions;
  limits?: ConnectionLimitOptions;
  bearerToken?: boolean;
  allowedConnectionTypes?: string[];
  sourceNetworks?: string[];
  timeRestrictions?: TimeRange[];
  /** IANA time zone; required when timeRestrictions are set */
  locale?: string;
  tags?: string[];
}

// ── Config ──

export interface HierarchyConfig {
  /** 'warn' resolves last-write-wins and reports; 'reject' fails the build */
  conflictPolicy: ConflictPolicy;
  logger?: Logger;
}

const DEFAULT_CONFIG: HierarchyConfig = {
  conflictPolicy: 'warn',
};

/** Exports every system account carries unless the caller already exports the subject */
const SYSTEM_ACCOUNT_DOCS = 'https://docs.nats.io/nats-server/configuration/sys_accounts';

export const SYSTEM_ACCOUNT_EXPORTS: readonly AccountExport[] = [
  {
    name: 'account-monitoring-services',
    subject: '$SYS.REQ.ACCOUNT.*.*',
    type: 'service',
    responseType: 'Singleton',
    accountTokenPosition: 4,
    description: 'Request account specific monitoring services for: SUBSZ, CONNZ, LEAFZ, JSZ and INFO',
    infoUrl: SYSTEM_ACCOUNT_DOCS,
  },
  {
    name: 'account-monitoring-streams',
    subject: '$SYS.ACCOUNT.*.>',
    type: 'stream',
    accountTokenPosition: 3,
    description: 'Account specific monitoring stream',
    infoUrl: SYSTEM_ACCOUNT_DOCS,
  },
];

/** Ensure the default system exports exist; existing subjects are left untouched */
export function mergeSystemExports(exports: readonly AccountExport[]): AccountExport[] {
  const merged = exports.map(e => ({ ...e }));
  for (const def of SYSTEM_ACCOUNT_EXPORTS) {
    if (!merged.some(e => e.subject === def.subject)) merged.push({ ...def });
  }
  return merged;
}

// ── Conflict Tracking ──

class ConflictLog {
  readonly notices: ConflictNotice[] = [];

  constructor(
    private policy: ConflictPolicy,
    private logger: Logger,
  ) {}

  /** Record a notice; returns a failure when the policy rejects conflicts */
  note(notice: ConflictNotice): CredentialFailure | null {
    if (this.policy === 'reject') return conflict(notice);
    this.notices.push(notice);
    this.logger.warn('Conflicting configuration resolved last-write-wins', { ...notice });
    return null;
  }
}

// ── Field Helpers ──

function applyTemporal<C extends CommonClaims>(claims: C, options: TemporalOptions): Result<C> {
  const issuedAt = validateEpochSeconds(options.issuedAt ?? 0, 'issuedAt');
  if (!issuedAt.ok) return issuedAt;
  const expires = validateEpochSeconds(options.expires ?? 0, 'expires');
  if (!expires.ok) return expires;
  const notBefore = validateEpochSeconds(options.notBefore ?? issuedAt.value, 'notBefore');
  if (!notBefore.ok) return notBefore;
  if (expires.value !== 0 && expires.value < notBefore.value) {
    return fail(malformed('expires', `expires (${expires.value}) is before notBefore (${notBefore.value})`));
  }
  return ok({ ...claims, issuedAt: issuedAt.value, expires: expires.value, notBefore: notBefore.value });
}

function validateName(name: string): Result<string> {
  if (name.trim().length === 0) return fail(malformed('name', 'name must not be empty'));
  return ok(name);
}

function validateUrl(value: string, field: string): Result<string> {
  try {
    new URL(value);
  } catch {
    return fail(malformed(field, `not a valid URL: "${value}"`));
  }
  return ok(value);
}

function publicKeysOfKind(keys: readonly string[], kind: KeyKind, field: string): Result<string[]> {
  const parsed = validateAll(keys, field, (key, f) => parsePublicKey(key, kind, f));
  return parsed.ok ? ok(dedupe(parsed.value.map(k => k.publicKey))) : parsed;
}

function limitOr(value: number | undefined, fallback: number, field: string): Result<number> {
  return validateLimit(value ?? fallback, field);
}

function connectionLimits(options: ConnectionLimitOptions | undefined, field: string): Result<ConnectionLimits> {
  const subs = limitOr(options?.subs, NO_LIMIT, `${field}.subs`);
  if (!subs.ok) return subs;
  const data = limitOr(options?.data, NO_LIMIT, `${field}.data`);
  if (!data.ok) return data;
  const payload = limitOr(options?.payload, NO_LIMIT, `${field}.payload`);
  if (!payload.ok) return payload;
  return ok({ subs: subs.value, data: data.value, payload: payload.value });
}

function subjects(values: readonly string[] | undefined, field: string): Result<string[]> {
  const checked = validateAll(values ?? [], field, validateSubject);
  return checked.ok ? ok(dedupe(checked.value)) : checked;
}

function permissions(options: PermissionOptions, field: string): Result<Permissions> {
  const pubAllow = subjects(options.pubAllow, `${field}.pubAllow`);
  if (!pubAllow.ok) return pubAllow;
  const pubDeny = subjects(options.pubDeny, `${field}.pubDeny`);
  if (!pubDeny.ok) return pubDeny;
  const subAllow = subjects(options.subAllow, `${field}.subAllow`);
  if (!subAllow.ok) return subAllow;
  const subDeny = subjects(options.subDeny, `${field}.subDeny`);
  if (!subDeny.ok) return subDeny;
  return ok({
    pub: { allow: pubAllow.value, deny: pubDeny.value },
    sub: { allow: subAllow.value, deny: subDeny.value },
  });
}

type JetStreamCount = Exclude<keyof JetStreamLimits, 'maxBytesRequired'>;

// Storage is disabled unless set; counts are unlimited unless set
const JETSTREAM_FALLBACKS: Record<JetStreamCount, number> = {
  memStorage: 0,
  diskStorage: 0,
  streams: NO_LIMIT,
  consumer: NO_LIMIT,
  maxAckPending: NO_LIMIT,
  memMaxStreamBytes: 0,
  diskMaxStreamBytes: 0,
};
const JETSTREAM_COUNTS: readonly JetStreamCount[] = [
  'memStorage', 'diskStorage', 'streams', 'consumer', 'maxAckPending', 'memMaxStreamBytes', 'diskMaxStreamBytes',
];

function jetstreamBlock(block: JetStreamLimitOptions, field: string): Result<JetStreamLimits> {
  const out = disabledJetStream();
  for (const key of JETSTREAM_COUNTS) {
    const value = limitOr(block[key], JETSTREAM_FALLBACKS[key], `${field}.${key}`);
    if (!value.ok) return value;
    out[key] = value.value;
  }
  out.maxBytesRequired = block.maxBytesRequired ?? false;
  return ok(out);
}

function jetstreamEnabled(js: JetStreamLimits): boolean {
  return js.memStorage !== 0 || js.diskStorage !== 0;
}

function validateExport(e: AccountExport, field: string): Result<AccountExport> {
  const subject = validateSubject(e.subject, `${field}.subject`);
  if (!subject.ok) return subject;
  if (e.type !== 'service' && e.type !== 'stream') {
    return fail(malformed(`${field}.type`, `must be service or stream, got ${String(e.type)}`));
  }
  if (e.responseType && e.type !== 'service') {
    return fail(malformed(`${field}.responseType`, 'only service exports have a response type'));
  }
  if (e.accountTokenPosition !== undefined && (!Number.isInteger(e.accountTokenPosition) || e.accountTokenPosition < 1)) {
    return fail(malformed(`${field}.accountTokenPosition`, 'must be a positive integer'));
  }
  if (e.infoUrl) {
    const url = validateUrl(e.infoUrl, `${field}.infoUrl`);
    if (!url.ok) return url;
  }
  return ok({ ...e });
}

// ── Builder ──

export class HierarchyBuilder {
  private config: HierarchyConfig;
  private logger: Logger;

  /**
   * @param config - Optional partial config to override defaults
   */
  constructor(config?: Partial<HierarchyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = this.config.logger ?? createLogger('hierarchy');
  }

  /** Issue an operator token, signed by the operator key or one of its signing keys */
  buildOperator(
    name: string,
    ownKey: KeyInput,
    signerKey: KeyInput,
    options: OperatorOptions = {},
  ): Result<IssuedCredential<OperatorClaims>> {
    const own = resolveKey(ownKey, 'operator', 'ownKey');
    if (!own.ok) return own;
    const signer = resolveKey(signerKey, 'operator', 'signerKey');
    if (!signer.ok) return signer;
    const validName = validateName(name);
    if (!validName.ok) return validName;

    const signingKeys = publicKeysOfKind(options.signingKeys ?? [], 'operator', 'signingKeys');
    if (!signingKeys.ok) return signingKeys;
    if (signer.value.publicKey !== own.value.publicKey && !signingKeys.value.includes(signer.value.publicKey)) {
      return fail(chainViolation('signerKey', 'operator tokens are signed by the operator or one of its signing keys'));
    }

    let systemAccount = '';
    if (options.systemAccount) {
      const parsed = parsePublicKey(options.systemAccount, 'account', 'systemAccount');
      if (!parsed.ok) return parsed;
      systemAccount = parsed.value.publicKey;
    }

    let accountServerUrl = '';
    if (options.accountServerUrl) {
      const url = validateUrl(options.accountServerUrl, 'accountServerUrl');
      if (!url.ok) return url;
      accountServerUrl = url.value;
    }
    const serviceUrls = validateAll(options.operatorServiceUrls ?? [], 'operatorServiceUrls', validateUrl);
    if (!serviceUrls.ok) return serviceUrls;

    const claims = applyTemporal(
      {
        ...newOperatorClaims(own.value.publicKey),
        name: validName.value,
        tags: dedupe(options.tags ?? []),
        signingKeys: signingKeys.value,
        accountServerUrl,
        operatorServiceUrls: serviceUrls.value,
        systemAccount,
        strictSigningKeyUsage: options.strictSigningKeyUsage ?? false,
      },
      options,
    );
    if (!claims.ok) return claims;
    return this.issue(claims.value, signer.value, []);
  }

  /** Issue an account token signed by an operator key */
  buildAccount(
    name: string,
    ownKey: KeyInput,
    signerKey: KeyInput,
    options: AccountOptions = {},
  ): Result<IssuedCredential<AccountClaims>> {
    const prepared = this.prepareAccount(name, ownKey, signerKey, options);
    if (!prepared.ok) return prepared;
    const { claims, signer, conflicts } = prepared.value;
    return this.issue(claims, signer, conflicts);
  }

  /**
   * Issue a system account token: a regular account that always carries the
   * default monitoring exports. Repeated builds never duplicate them.
   */
  buildSystemAccount(
    name: string,
    ownKey: KeyInput,
    signerKey: KeyInput,
    options: AccountOptions = {},
  ): Result<IssuedCredential<AccountClaims>> {
    const prepared = this.prepareAccount(name, ownKey, signerKey, options);
    if (!prepared.ok) return prepared;
    const { claims, signer, conflicts } = prepared.value;
    return this.issue({ ...claims, exports: mergeSystemExports(claims.exports) }, signer, conflicts);
  }

  /** Issue a user token signed by an account key or one of its signing keys */
  buildUser(
    name: string,
    ownKey: KeyInput,
    signerKey: KeyInput,
    options: UserOptions = {},
  ): Result<IssuedUser> {
    const own = resolveKey(ownKey, 'user', 'ownKey');
    if (!own.ok) return own;
    const signer = resolveKey(signerKey, 'account', 'signerKey');
    if (!signer.ok) return signer;
    const validName = validateName(name);
    if (!validName.ok) return validName;

    const lineage = this.resolveIssuerAccount(signer.value, options);
    if (!lineage.ok) return lineage;

    let perms: Permissions = emptyPermissions();
    let response: UserClaims['response'];
    if (options.permissions) {
      const built = permissions(options.permissions, 'permissions');
      if (!built.ok) return built;
      perms = built.value;
      const { respMaxMsgs, respTtl } = options.permissions;
      if (respMaxMsgs !== undefined || respTtl !== undefined) {
        const maxMsgs = validateLimit(respMaxMsgs ?? 0, 'permissions.respMaxMsgs');
        if (!maxMsgs.ok) return maxMsgs;
        const ttl = respTtl !== undefined ? parseDuration(respTtl, 'permissions.respTtl') : ok(0);
        if (!ttl.ok) return ttl;
        response = { maxMsgs: maxMsgs.value, ttlNanos: ttl.value };
      }
    } else if (options.inheritDefaultPermissions && lineage.value.inherited) {
      perms = lineage.value.inherited;
    }

    const limits = connectionLimits(options.limits, 'limits');
    if (!limits.ok) return limits;

    const connectionTypes = validateAll(options.allowedConnectionTypes ?? [], 'allowedConnectionTypes', validateConnectionType);
    if (!connectionTypes.ok) return connectionTypes;
    const networks = validateAll(options.sourceNetworks ?? [], 'sourceNetworks', validateCidr);
    if (!networks.ok) return networks;
    const times = validateAll(options.timeRestrictions ?? [], 'timeRestrictions', validateTimeRange);
    if (!times.ok) return times;

    let locale = '';
    if (options.locale !== undefined) {
      const checked = validateLocale(options.locale, 'locale');
      if (!checked.ok) return checked;
      locale = checked.value;
    }
    if (times.value.length > 0 && !locale) {
      return fail(malformed('locale', 'a locale is required when timeRestrictions are set'));
    }

    const base: UserClaims = {
      ...newUserClaims(own.value.publicKey),
      name: validName.value,
      tags: dedupe(options.tags ?? []),
      issuerAccount: lineage.value.issuerAccount,
      permissions: perms,
      limits: limits.value,
      bearerToken: options.bearerToken ?? false,
      allowedConnectionTypes: dedupe(connectionTypes.value),
      sourceNetworks: dedupe(networks.value),
      timeRestrictions: times.value,
      locale,
    };
    if (response) base.response = response;

    const claims = applyTemporal(base, options);
    if (!claims.ok) return claims;
    const issued = this.issue(claims.value, signer.value, []);
    if (!issued.ok) return issued;

    const creds = renderCreds(issued.value.jwt, own.value.seed);
    if (!creds.ok) return creds;
    return ok({ ...issued.value, creds: creds.value });
  }

  // ── Internals ──

  private prepareAccount(
    name: string,
    ownKey: KeyInput,
    signerKey: KeyInput,
    options: AccountOptions,
  ): Result<{ claims: AccountClaims; signer: KeyMaterial; conflicts: ConflictNotice[] }> {
    const own = resolveKey(ownKey, 'account', 'ownKey');
    if (!own.ok) return own;
    const signer = resolveKey(signerKey, 'operator', 'signerKey');
    if (!signer.ok) return signer;
    const validName = validateName(name);
    if (!validName.ok) return validName;
    const log = new ConflictLog(this.config.conflictPolicy, this.logger);

    const signingKeys = publicKeysOfKind(options.signingKeys ?? [], 'account', 'signingKeys');
    if (!signingKeys.ok) return signingKeys;

    const natsLimits = connectionLimits(options.natsLimits, 'natsLimits');
    if (!natsLimits.ok) return natsLimits;

    const al = options.accountLimits ?? {};
    const imports = limitOr(al.imports, NO_LIMIT, 'accountLimits.imports');
    if (!imports.ok) return imports;
    const exportsLimit = limitOr(al.exports, NO_LIMIT, 'accountLimits.exports');
    if (!exportsLimit.ok) return exportsLimit;
    const conn = limitOr(al.conn, NO_LIMIT, 'accountLimits.conn');
    if (!conn.ok) return conn;
    const leaf = limitOr(al.leafNodeConn, NO_LIMIT, 'accountLimits.leafNodeConn');
    if (!leaf.ok) return leaf;

    // Unlabeled blocks overwrite the global record; labeled ones upsert by tier
    let jetstream = disabledJetStream();
    const tiers = new Map<string, JetStreamLimits>();
    let globalIndex = -1;
    const blocks = options.jetstreamLimits ?? [];
    for (let i = 0; i < blocks.length; i++) {
      const field = `jetstreamLimits[${i}]`;
      const limits = jetstreamBlock(blocks[i], field);
      if (!limits.ok) return limits;
      const tier = blocks[i].tier?.trim() ?? '';
      if (tier === '') {
        if (globalIndex >= 0) {
          const rejected = log.note({
            field,
            key: '(global)',
            detail: `unlabeled JetStream block overrides jetstreamLimits[${globalIndex}]`,
          });
          if (rejected) return fail(rejected);
        }
        globalIndex = i;
        jetstream = limits.value;
      } else {
        if (tiers.has(tier)) {
          const rejected = log.note({ field, key: tier, detail: `tier ${tier} is defined more than once` });
          if (rejected) return fail(rejected);
        }
        tiers.set(tier, limits.value);
      }
    }
    if (jetstreamEnabled(jetstream) && tiers.size > 0) {
      const rejected = log.note({
        field: 'jetstreamLimits',
        key: '(global+tiered)',
        detail: 'global and tiered JetStream limits are both set; servers honour only one of them',
      });
      if (rejected) return fail(rejected);
    }

    const defaults = permissions(options.defaultPermissions ?? {}, 'defaultPermissions');
    if (!defaults.ok) return defaults;

    let trace: AccountClaims['trace'];
    if (options.trace?.destination) {
      const dest = validateSubject(options.trace.destination, 'trace.destination');
      if (!dest.ok) return dest;
      const sampling = validateSampling(options.trace.sampling ?? 0, 'trace.sampling');
      if (!sampling.ok) return sampling;
      trace = { destination: dest.value, sampling: sampling.value };
    } else if (options.trace?.sampling !== undefined) {
      const sampling = validateSampling(options.trace.sampling, 'trace.sampling');
      if (!sampling.ok) return sampling;
    }

    const bySubject = new Map<string, AccountExport>();
    const supplied = options.exports ?? [];
    for (let i = 0; i < supplied.length; i++) {
      const checked = validateExport(supplied[i], `exports[${i}]`);
      if (!checked.ok) return checked;
      if (bySubject.has(checked.value.subject)) {
        const rejected = log.note({
          field: `exports[${i}]`,
          key: checked.value.subject,
          detail: `export subject ${checked.value.subject} is declared more than once`,
        });
        if (rejected) return fail(rejected);
      }
      bySubject.set(checked.value.subject, checked.value);
    }

    let infoUrl = '';
    if (options.infoUrl) {
      const url = validateUrl(options.infoUrl, 'infoUrl');
      if (!url.ok) return url;
      infoUrl = url.value;
    }

    const base: AccountClaims = {
      ...newAccountClaims(own.value.publicKey),
      name: validName.value,
      tags: dedupe(options.tags ?? []),
      signingKeys: signingKeys.value,
      description: options.description ?? '',
      infoUrl,
      exports: Array.from(bySubject.values()),
      natsLimits: natsLimits.value,
      accountLimits: {
        imports: imports.value,
        exports: exportsLimit.value,
        wildcardExports: al.wildcardExports ?? true,
        disallowBearer: al.disallowBearer ?? false,
        conn: conn.value,
        leafNodeConn: leaf.value,
      },
      jetstream,
      tieredJetstream: Object.fromEntries(tiers),
      defaultPermissions: defaults.value,
    };
    if (trace) base.trace = trace;

    const claims = applyTemporal(base, options);
    if (!claims.ok) return claims;
    return ok({ claims: claims.value, signer: signer.value, conflicts: log.notices });
  }

  /**
   * Work out `issuerAccount` for a user token and, when the parent account is
   * known, the default permissions it would pass down.
   */
  private resolveIssuerAccount(
    signer: KeyMaterial,
    options: UserOptions,
  ): Result<{ issuerAccount: string; inherited?: Permissions }> {
    let explicit = '';
    if (options.issuerAccount) {
      const parsed = parsePublicKey(options.issuerAccount, 'account', 'issuerAccount');
      if (!parsed.ok) return parsed;
      explicit = parsed.value.publicKey;
    }

    if (!options.parentAccount) {
      if (options.inheritDefaultPermissions) {
        return fail(malformed('inheritDefaultPermissions', 'requires parentAccount'));
      }
      if (explicit && explicit === signer.publicKey) {
        return fail(chainViolation('issuerAccount', 'issuerAccount is only set when a signing key issues the token'));
      }
      return ok({ issuerAccount: explicit });
    }

    const parent = decodeAccountToken(options.parentAccount, { field: 'parentAccount' });
    if (!parent.ok) return parent;
    const account = parent.value.claims;
    const inherited: Permissions = {
      pub: { allow: [...account.defaultPermissions.pub.allow], deny: [...account.defaultPermissions.pub.deny] },
      sub: { allow: [...account.defaultPermissions.sub.allow], deny: [...account.defaultPermissions.sub.deny] },
    };

    if (signer.publicKey === account.subject) {
      if (explicit) {
        return fail(chainViolation('issuerAccount', 'issuerAccount is only set when a signing key issues the token'));
      }
      return ok({ issuerAccount: '', inherited });
    }
    if (!account.signingKeys.includes(signer.publicKey)) {
      return fail(chainViolation('signerKey', 'signer is neither the parent account nor one of its signing keys'));
    }
    if (explicit && explicit !== account.subject) {
      return fail(chainViolation('issuerAccount', 'issuerAccount does not match the parent account'));
    }
    return ok({ issuerAccount: account.subject, inherited });
  }

  private issue<C extends ClaimSet>(
    claims: C,
    signer: KeyMaterial,
    conflicts: ConflictNotice[],
  ): Result<IssuedCredential<C>> {
    const jwt = signClaims(claims, signer);
    if (!jwt.ok) return jwt;
    this.logger.debug('Issued token', { kind: claims.kind, subject: claims.subject, issuer: signer.publicKey });
    return ok({
      jwt: jwt.value,
      publicKey: claims.subject,
      claims: { ...claims, issuer: signer.publicKey },
      conflicts,
    });
  }
}

// ── Module-level entry points ──

const defaultBuilder = new HierarchyBuilder();

export function buildOperator(
  name: string,
  ownKey: KeyInput,
  signerKey: KeyInput,
  options?: OperatorOptions,
): Result<IssuedCredential<OperatorClaims>> {
  return defaultBuilder.buildOperator(name, ownKey, signerKey, options);
}

export function buildAccount(
  name: string,
  ownKey: KeyInput,
  signerKey: KeyInput,
  options?: AccountOptions,
): Result<IssuedCredential<AccountClaims>> {
  return defaultBuilder.buildAccount(name, ownKey, signerKey, options);
}

export function buildSystemAccount(
  name: string,
  ownKey: KeyInput,
  signerKey: KeyInput,
  options?: AccountOptions,
): Result<IssuedCredential<AccountClaims>> {
  return defaultBuilder.buildSystemAccount(name, ownKey, signerKey, options);
}

export function buildUser(
  name: string,
  ownKey: KeyInput,
  signerKey: KeyInput,
  options?: UserOptions,
): Result<IssuedUser> {
  return defaultBuilder.buildUser(name, ownKey, signerKey, options);
}
