/**
 * Claim sets: fresh defaults per entity kind and the mapping to and from the
 * bus server's JWT payload.
 *
 * The payload carries `nats.version = 2` directly; there is no stateful encoder
 * whose side effects need to be triggered before serialising.
 */

import { decodingFailure, fail, ok } from './errors.js';
import {
  schemaErrorsText,
  validateAccountPayload,
  validateOperatorPayload,
  validateUserPayload,
} from './schema.js';
import type {
  JwtPayload,
  WireAccountLimits,
  WireAccountNats,
  WireExport,
  WireJetStreamLimits,
  WireOperatorNats,
  WirePermission,
  WireUserNats,
} from './schema.js';
import type {
  AccountClaims,
  AccountExport,
  ClaimSet,
  CommonClaims,
  ConnectionLimits,
  ConnectionType,
  JetStreamLimits,
  OperatorClaims,
  Permission,
  Permissions,
  Result,
  UserClaims,
} from './types.js';
import { NO_LIMIT } from './types.js';
import { validateConnectionType } from './validation.js';

/** Version stamp written into every `nats` section */
export const CLAIMS_VERSION = 2;

// ── Defaults ──

export function emptyPermissions(): Permissions {
  return { pub: { allow: [], deny: [] }, sub: { allow: [], deny: [] } };
}

export function unlimitedConnections(): ConnectionLimits {
  return { subs: NO_LIMIT, data: NO_LIMIT, payload: NO_LIMIT };
}

/** JetStream disabled: every storage and count at zero */
export function disabledJetStream(): JetStreamLimits {
  return {
    memStorage: 0,
    diskStorage: 0,
    streams: 0,
    consumer: 0,
    maxAckPending: 0,
    memMaxStreamBytes: 0,
    diskMaxStreamBytes: 0,
    maxBytesRequired: false,
  };
}

function common(subject: string): CommonClaims {
  return { subject, issuer: '', issuedAt: 0, expires: 0, notBefore: 0, name: '', tags: [] };
}

export function newOperatorClaims(subject: string): OperatorClaims {
  return {
    kind: 'operator',
    ...common(subject),
    signingKeys: [],
    accountServerUrl: '',
    operatorServiceUrls: [],
    systemAccount: '',
    strictSigningKeyUsage: false,
  };
}

export function newAccountClaims(subject: string): AccountClaims {
  return {
    kind: 'account',
    ...common(subject),
    signingKeys: [],
    description: '',
    infoUrl: '',
    exports: [],
    natsLimits: unlimitedConnections(),
    accountLimits: {
      imports: NO_LIMIT,
      exports: NO_LIMIT,
      wildcardExports: true,
      disallowBearer: false,
      conn: NO_LIMIT,
      leafNodeConn: NO_LIMIT,
    },
    jetstream: disabledJetStream(),
    tieredJetstream: {},
    defaultPermissions: emptyPermissions(),
  };
}

export function newUserClaims(subject: string): UserClaims {
  return {
    kind: 'user',
    ...common(subject),
    issuerAccount: '',
    permissions: emptyPermissions(),
    limits: unlimitedConnections(),
    bearerToken: false,
    allowedConnectionTypes: [],
    sourceNetworks: [],
    timeRestrictions: [],
    locale: '',
  };
}

/**
 * JetStream limits that apply to a tier: the tier's own record when present,
 * otherwise the global record.
 */
export function jetstreamLimitsForTier(claims: AccountClaims, tier: string): JetStreamLimits {
  return Object.hasOwn(claims.tieredJetstream, tier) ? claims.tieredJetstream[tier] : claims.jetstream;
}

// ── Encode ──

function optionalList<K extends string>(key: K, values: readonly string[]): Partial<Record<K, string[]>> {
  if (values.length === 0) return {};
  const out: Partial<Record<K, string[]>> = {};
  out[key] = [...values];
  return out;
}

function optionalString<K extends string>(key: K, value: string): Partial<Record<K, string>> {
  if (value === '') return {};
  const out: Partial<Record<K, string>> = {};
  out[key] = value;
  return out;
}

function permissionToWire(p: Permission): WirePermission {
  return { ...optionalList('allow', p.allow), ...optionalList('deny', p.deny) };
}

function jetstreamToWire(js: JetStreamLimits): WireJetStreamLimits {
  return {
    mem_storage: js.memStorage,
    disk_storage: js.diskStorage,
    streams: js.streams,
    consumer: js.consumer,
    max_ack_pending: js.maxAckPending,
    mem_max_stream_bytes: js.memMaxStreamBytes,
    disk_max_stream_bytes: js.diskMaxStreamBytes,
    max_bytes_required: js.maxBytesRequired,
  };
}

function exportToWire(e: AccountExport): WireExport {
  const wire: WireExport = { name: e.name, subject: e.subject, type: e.type };
  if (e.responseType) wire.response_type = e.responseType;
  if (e.accountTokenPosition !== undefined) wire.account_token_position = e.accountTokenPosition;
  if (e.description) wire.description = e.description;
  if (e.infoUrl) wire.info_url = e.infoUrl;
  return wire;
}

function operatorNats(c: OperatorClaims): WireOperatorNats {
  return {
    type: 'operator',
    version: CLAIMS_VERSION,
    ...optionalList('signing_keys', c.signingKeys),
    ...optionalString('account_server_url', c.accountServerUrl),
    ...optionalList('operator_service_urls', c.operatorServiceUrls),
    ...optionalString('system_account', c.systemAccount),
    ...(c.strictSigningKeyUsage ? { strict_signing_key_usage: true } : {}),
    ...optionalList('tags', c.tags),
  };
}

function accountNats(c: AccountClaims): WireAccountNats {
  const tiers = Object.keys(c.tieredJetstream);
  const limits: WireAccountLimits = {
    subs: c.natsLimits.subs,
    data: c.natsLimits.data,
    payload: c.natsLimits.payload,
    imports: c.accountLimits.imports,
    exports: c.accountLimits.exports,
    wildcards: c.accountLimits.wildcardExports,
    disallow_bearer: c.accountLimits.disallowBearer,
    conn: c.accountLimits.conn,
    leaf: c.accountLimits.leafNodeConn,
    ...jetstreamToWire(c.jetstream),
  };
  if (tiers.length > 0) {
    limits.tiered_limits = Object.fromEntries(
      tiers.map(tier => [tier, jetstreamToWire(c.tieredJetstream[tier])]),
    );
  }
  const nats: WireAccountNats = {
    type: 'account',
    version: CLAIMS_VERSION,
    ...optionalList('signing_keys', c.signingKeys),
    ...optionalString('description', c.description),
    ...optionalString('info_url', c.infoUrl),
    limits,
    default_permissions: {
      pub: permissionToWire(c.defaultPermissions.pub),
      sub: permissionToWire(c.defaultPermissions.sub),
    },
    ...optionalList('tags', c.tags),
  };
  if (c.exports.length > 0) nats.exports = c.exports.map(exportToWire);
  if (c.trace) nats.trace = { dest: c.trace.destination, sampling: c.trace.sampling };
  return nats;
}

function userNats(c: UserClaims): WireUserNats {
  const nats: WireUserNats = {
    type: 'user',
    version: CLAIMS_VERSION,
    pub: permissionToWire(c.permissions.pub),
    sub: permissionToWire(c.permissions.sub),
    ...optionalList('src', c.sourceNetworks),
    ...optionalString('times_location', c.locale),
    subs: c.limits.subs,
    data: c.limits.data,
    payload: c.limits.payload,
    ...optionalList('allowed_connection_types', c.allowedConnectionTypes),
    ...optionalString('issuer_account', c.issuerAccount),
    ...optionalList('tags', c.tags),
  };
  if (c.response) nats.resp = { max: c.response.maxMsgs, ttl: c.response.ttlNanos };
  if (c.timeRestrictions.length > 0) {
    nats.times = c.timeRestrictions.map(t => ({ start: t.start, end: t.end }));
  }
  if (c.bearerToken) nats.bearer_token = true;
  return nats;
}

function natsSection(claims: ClaimSet): JwtPayload['nats'] {
  switch (claims.kind) {
    case 'operator':
      return operatorNats(claims);
    case 'account':
      return accountNats(claims);
    case 'user':
      return userNats(claims);
  }
}

/** Map a claim set to its JWT payload. `jti` is always empty. */
export function toPayload(claims: ClaimSet): JwtPayload {
  return {
    jti: '',
    iat: claims.issuedAt,
    iss: claims.issuer,
    sub: claims.subject,
    name: claims.name,
    exp: claims.expires,
    nbf: claims.notBefore,
    nats: natsSection(claims),
  };
}

// ── Decode ──

function commonFromPayload(p: JwtPayload<{ tags?: string[] }>): CommonClaims {
  return {
    subject: p.sub,
    issuer: p.iss,
    issuedAt: p.iat ?? 0,
    expires: p.exp ?? 0,
    notBefore: p.nbf ?? 0,
    name: p.name ?? '',
    tags: p.nats.tags ?? [],
  };
}

function permissionFromWire(p: WirePermission = {}): Permission {
  return { allow: p.allow ?? [], deny: p.deny ?? [] };
}

function jetstreamFromWire(js: WireJetStreamLimits): JetStreamLimits {
  return {
    memStorage: js.mem_storage ?? 0,
    diskStorage: js.disk_storage ?? 0,
    streams: js.streams ?? 0,
    consumer: js.consumer ?? 0,
    maxAckPending: js.max_ack_pending ?? 0,
    memMaxStreamBytes: js.mem_max_stream_bytes ?? 0,
    diskMaxStreamBytes: js.disk_max_stream_bytes ?? 0,
    maxBytesRequired: js.max_bytes_required ?? false,
  };
}

function exportFromWire(e: WireExport): AccountExport {
  const out: AccountExport = { name: e.name, subject: e.subject, type: e.type };
  if (e.response_type) out.responseType = e.response_type;
  if (e.account_token_position !== undefined) out.accountTokenPosition = e.account_token_position;
  if (e.description) out.description = e.description;
  if (e.info_url) out.infoUrl = e.info_url;
  return out;
}

function operatorFromPayload(p: JwtPayload<WireOperatorNats>): OperatorClaims {
  const n = p.nats;
  return {
    kind: 'operator',
    ...commonFromPayload(p),
    signingKeys: n.signing_keys ?? [],
    accountServerUrl: n.account_server_url ?? '',
    operatorServiceUrls: n.operator_service_urls ?? [],
    systemAccount: n.system_account ?? '',
    strictSigningKeyUsage: n.strict_signing_key_usage ?? false,
  };
}

function accountFromPayload(p: JwtPayload<WireAccountNats>): AccountClaims {
  const n = p.nats;
  const limits: WireAccountLimits = n.limits ?? {};
  const tiers = limits.tiered_limits ?? {};
  const defaults: NonNullable<WireAccountNats['default_permissions']> = n.default_permissions ?? {};
  const claims: AccountClaims = {
    kind: 'account',
    ...commonFromPayload(p),
    signingKeys: n.signing_keys ?? [],
    description: n.description ?? '',
    infoUrl: n.info_url ?? '',
    exports: (n.exports ?? []).map(exportFromWire),
    natsLimits: { subs: limits.subs ?? 0, data: limits.data ?? 0, payload: limits.payload ?? 0 },
    accountLimits: {
      imports: limits.imports ?? 0,
      exports: limits.exports ?? 0,
      wildcardExports: limits.wildcards ?? false,
      disallowBearer: limits.disallow_bearer ?? false,
      conn: limits.conn ?? 0,
      leafNodeConn: limits.leaf ?? 0,
    },
    jetstream: jetstreamFromWire(limits),
    tieredJetstream: Object.fromEntries(
      Object.entries(tiers).map(([tier, js]) => [tier, jetstreamFromWire(js)]),
    ),
    defaultPermissions: {
      pub: permissionFromWire(defaults.pub),
      sub: permissionFromWire(defaults.sub),
    },
  };
  if (n.trace) claims.trace = { destination: n.trace.dest, sampling: n.trace.sampling };
  return claims;
}

function userFromPayload(p: JwtPayload<WireUserNats>): Result<UserClaims> {
  const n = p.nats;
  const connectionTypes: ConnectionType[] = [];
  for (const [i, t] of (n.allowed_connection_types ?? []).entries()) {
    const r = validateConnectionType(t, `nats.allowed_connection_types[${i}]`);
    if (!r.ok) return fail(decodingFailure(r.error.field, r.error.detail));
    connectionTypes.push(r.value);
  }
  const claims: UserClaims = {
    kind: 'user',
    ...commonFromPayload(p),
    issuerAccount: n.issuer_account ?? '',
    permissions: { pub: permissionFromWire(n.pub), sub: permissionFromWire(n.sub) },
    limits: { subs: n.subs ?? 0, data: n.data ?? 0, payload: n.payload ?? 0 },
    bearerToken: n.bearer_token ?? false,
    allowedConnectionTypes: connectionTypes,
    sourceNetworks: n.src ?? [],
    timeRestrictions: (n.times ?? []).map(t => ({ start: t.start, end: t.end })),
    locale: n.times_location ?? '',
  };
  if (n.resp) claims.response = { maxMsgs: n.resp.max, ttlNanos: n.resp.ttl };
  return ok(claims);
}

function natsType(payload: unknown): unknown {
  if (typeof payload !== 'object' || payload === null || !('nats' in payload)) return undefined;
  const nats = payload.nats;
  if (typeof nats !== 'object' || nats === null || !('type' in nats)) return undefined;
  return nats.type;
}

/**
 * Validate a parsed JWT payload and map it to a claim set.
 * The `nats.type` field selects the schema.
 */
export function fromPayload(payload: unknown): Result<ClaimSet> {
  const type = natsType(payload);
  switch (type) {
    case 'operator':
      if (!validateOperatorPayload(payload)) {
        return fail(decodingFailure('payload', schemaErrorsText(validateOperatorPayload.errors)));
      }
      return ok(operatorFromPayload(payload));
    case 'account':
      if (!validateAccountPayload(payload)) {
        return fail(decodingFailure('payload', schemaErrorsText(validateAccountPayload.errors)));
      }
      return ok(accountFromPayload(payload));
    case 'user':
      if (!validateUserPayload(payload)) {
        return fail(decodingFailure('payload', schemaErrorsText(validateUserPayload.errors)));
      }
      return userFromPayload(payload);
    default:
      return fail(decodingFailure('payload.nats.type', `unsupported claim type: ${String(type)}`));
  }
}
