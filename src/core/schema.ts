/**
 * Wire shapes of token payloads and the ajv validators that guard decoding.
 * Field names follow the bus server's JWT format. Encoders in the wild omit
 * zero values, so only `iss`, `sub` and `nats.type` are required; decoding
 * fills the rest with 0, '' or false.
 */

import { Ajv } from 'ajv';
import type { ErrorObject, SchemaObject } from 'ajv';

// ── Wire Types ──

export interface WirePermission {
  allow?: string[];
  deny?: string[];
}

export interface WireJetStreamLimits {
  mem_storage?: number;
  disk_storage?: number;
  streams?: number;
  consumer?: number;
  max_ack_pending?: number;
  mem_max_stream_bytes?: number;
  disk_max_stream_bytes?: number;
  max_bytes_required?: boolean;
}

export interface WireAccountLimits extends WireJetStreamLimits {
  subs?: number;
  data?: number;
  payload?: number;
  imports?: number;
  exports?: number;
  wildcards?: boolean;
  disallow_bearer?: boolean;
  conn?: number;
  leaf?: number;
  tiered_limits?: Record<string, WireJetStreamLimits>;
}

export interface WireExport {
  name: string;
  subject: string;
  type: 'service' | 'stream';
  response_type?: 'Singleton' | 'Stream' | 'Chunked';
  account_token_position?: number;
  description?: string;
  info_url?: string;
}

export interface WireOperatorNats {
  type: 'operator';
  version?: number;
  signing_keys?: string[];
  account_server_url?: string;
  operator_service_urls?: string[];
  system_account?: string;
  strict_signing_key_usage?: boolean;
  tags?: string[];
}

export interface WireAccountNats {
  type: 'account';
  version?: number;
  signing_keys?: string[];
  description?: string;
  info_url?: string;
  exports?: WireExport[];
  limits?: WireAccountLimits;
  default_permissions?: { pub?: WirePermission; sub?: WirePermission };
  trace?: { dest: string; sampling: number };
  tags?: string[];
}

export interface WireUserNats {
  type: 'user';
  version?: number;
  pub?: WirePermission;
  sub?: WirePermission;
  resp?: { max: number; ttl: number };
  src?: string[];
  times?: Array<{ start: string; end: string }>;
  times_location?: string;
  subs?: number;
  data?: number;
  payload?: number;
  bearer_token?: boolean;
  allowed_connection_types?: string[];
  issuer_account?: string;
  tags?: string[];
}

export interface JwtPayload<N = WireOperatorNats | WireAccountNats | WireUserNats> {
  jti?: string;
  iat?: number;
  iss: string;
  sub: string;
  name?: string;
  exp?: number;
  nbf?: number;
  nats: N;
}

// ── Schemas ──

const stringList = { type: 'array', items: { type: 'string' } };
const integer = { type: 'integer' };

const permission = {
  type: 'object',
  properties: { allow: stringList, deny: stringList },
};

const jetstreamLimits = {
  type: 'object',
  properties: {
    mem_storage: integer,
    disk_storage: integer,
    streams: integer,
    consumer: integer,
    max_ack_pending: integer,
    mem_max_stream_bytes: integer,
    disk_max_stream_bytes: integer,
    max_bytes_required: { type: 'boolean' },
  },
};

function envelope(nats: SchemaObject): SchemaObject {
  return {
    type: 'object',
    required: ['iss', 'sub', 'nats'],
    properties: {
      jti: { type: 'string' },
      iat: integer,
      iss: { type: 'string' },
      sub: { type: 'string' },
      name: { type: 'string' },
      exp: integer,
      nbf: integer,
      nats,
    },
  };
}

const operatorSchema = envelope({
  type: 'object',
  required: ['type'],
  properties: {
    type: { const: 'operator' },
    version: integer,
    signing_keys: stringList,
    account_server_url: { type: 'string' },
    operator_service_urls: stringList,
    system_account: { type: 'string' },
    strict_signing_key_usage: { type: 'boolean' },
    tags: stringList,
  },
});

const accountSchema = envelope({
  type: 'object',
  required: ['type'],
  properties: {
    type: { const: 'account' },
    version: integer,
    signing_keys: stringList,
    description: { type: 'string' },
    info_url: { type: 'string' },
    exports: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'subject', 'type'],
        properties: {
          name: { type: 'string' },
          subject: { type: 'string' },
          type: { enum: ['service', 'stream'] },
          response_type: { enum: ['Singleton', 'Stream', 'Chunked'] },
          account_token_position: integer,
          description: { type: 'string' },
          info_url: { type: 'string' },
        },
      },
    },
    limits: {
      type: 'object',
      properties: {
        ...jetstreamLimits.properties,
        subs: integer,
        data: integer,
        payload: integer,
        imports: integer,
        exports: integer,
        wildcards: { type: 'boolean' },
        disallow_bearer: { type: 'boolean' },
        conn: integer,
        leaf: integer,
        tiered_limits: { type: 'object', additionalProperties: jetstreamLimits },
      },
    },
    default_permissions: {
      type: 'object',
      properties: { pub: permission, sub: permission },
    },
    trace: {
      type: 'object',
      required: ['dest', 'sampling'],
      properties: { dest: { type: 'string' }, sampling: integer },
    },
    tags: stringList,
  },
});

const userSchema = envelope({
  type: 'object',
  required: ['type'],
  properties: {
    type: { const: 'user' },
    version: integer,
    pub: permission,
    sub: permission,
    resp: {
      type: 'object',
      required: ['max', 'ttl'],
      properties: { max: integer, ttl: integer },
    },
    src: stringList,
    times: {
      type: 'array',
      items: {
        type: 'object',
        required: ['start', 'end'],
        properties: { start: { type: 'string' }, end: { type: 'string' } },
      },
    },
    times_location: { type: 'string' },
    subs: integer,
    data: integer,
    payload: integer,
    bearer_token: { type: 'boolean' },
    allowed_connection_types: stringList,
    issuer_account: { type: 'string' },
    tags: stringList,
  },
});

const ajv = new Ajv({ strict: false, allErrors: false });

export const validateOperatorPayload = ajv.compile<JwtPayload<WireOperatorNats>>(operatorSchema);
export const validateAccountPayload = ajv.compile<JwtPayload<WireAccountNats>>(accountSchema);
export const validateUserPayload = ajv.compile<JwtPayload<WireUserNats>>(userSchema);

/** Render ajv errors as a single line */
export function schemaErrorsText(errors: ErrorObject[] | null | undefined): string {
  return ajv.errorsText(errors);
}
