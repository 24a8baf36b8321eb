/**
 * Field validators shared by the builders and the claim codec.
 * Every failure is a malformed_input naming the offending field.
 */

import { isIPv4, isIPv6 } from 'node:net';
import { fail, malformed, ok } from './errors.js';
import type { ConnectionType, Result, TimeRange } from './types.js';

export const CONNECTION_TYPES: readonly ConnectionType[] = ['STANDARD', 'WEBSOCKET', 'LEAFNODE', 'MQTT'];

// ── Scalars ──

/** Non-negative integer seconds (issuedAt, expires, notBefore) */
export function validateEpochSeconds(value: number, field: string): Result<number> {
  if (!Number.isSafeInteger(value) || value < 0) {
    return fail(malformed(field, `must be a non-negative integer number of seconds, got ${value}`));
  }
  return ok(value);
}

/** Integer limit; -1 means unlimited */
export function validateLimit(value: number, field: string): Result<number> {
  if (!Number.isSafeInteger(value) || value < -1) {
    return fail(malformed(field, `must be an integer >= -1, got ${value}`));
  }
  return ok(value);
}

export function validateSampling(value: number, field: string): Result<number> {
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    return fail(malformed(field, `sampling must be an integer between 0 and 100, got ${value}`));
  }
  return ok(value);
}

export function validateConnectionType(value: string, field: string): Result<ConnectionType> {
  const match = CONNECTION_TYPES.find(t => t === value);
  if (!match) {
    return fail(malformed(field, `must be one of ${CONNECTION_TYPES.join(', ')}, got ${value}`));
  }
  return ok(match);
}

/** Subject or subject pattern: non-empty, no whitespace, no empty tokens */
export function validateSubject(value: string, field: string): Result<string> {
  if (value.length === 0) return fail(malformed(field, 'subject must not be empty'));
  if (/\s/.test(value)) return fail(malformed(field, `subject contains whitespace: "${value}"`));
  if (value.split('.').some(token => token.length === 0)) {
    return fail(malformed(field, `subject has an empty token: "${value}"`));
  }
  return ok(value);
}

// ── Time ──

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d):([0-5]\d)$/;

export function validateTimeOfDay(value: string, field: string): Result<string> {
  if (!TIME_OF_DAY.test(value)) {
    return fail(malformed(field, `expected HH:MM:SS, got "${value}"`));
  }
  return ok(value);
}

export function validateTimeRange(range: TimeRange, field: string): Result<TimeRange> {
  const start = validateTimeOfDay(range.start, `${field}.start`);
  if (!start.ok) return start;
  const end = validateTimeOfDay(range.end, `${field}.end`);
  if (!end.ok) return end;
  return ok({ start: range.start, end: range.end });
}

/**
 * IANA time zone known to the runtime, returned in its canonical spelling.
 * Zone lookup here ignores case but the server's does not.
 */
export function validateLocale(value: string, field: string): Result<string> {
  if (value.length === 0) return fail(malformed(field, 'locale must not be empty'));
  let timeZone: string;
  try {
    timeZone = new Intl.DateTimeFormat('en-US', { timeZone: value }).resolvedOptions().timeZone;
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return fail(malformed(field, `unknown time zone "${value}": ${reason}`));
  }
  return ok(timeZone);
}

const DURATION_UNITS: Record<string, number> = {
  ns: 1,
  us: 1_000,
  'µs': 1_000,
  'μs': 1_000,
  ms: 1_000_000,
  s: 1_000_000_000,
  m: 60_000_000_000,
  h: 3_600_000_000_000,
};

const DURATION_PART = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y;

/**
 * Parse a duration such as "300ms", "1.5h" or "2h45m" into nanoseconds.
 * A bare "0" is accepted; negative durations are not.
 */
export function parseDuration(value: string, field: string): Result<number> {
  if (value === '0') return ok(0);
  if (value.length === 0) return fail(malformed(field, 'duration must not be empty'));

  let total = 0;
  DURATION_PART.lastIndex = 0;
  while (DURATION_PART.lastIndex < value.length) {
    const start = DURATION_PART.lastIndex;
    const match = DURATION_PART.exec(value);
    if (!match) {
      return fail(malformed(field, `invalid duration "${value}" at offset ${start}`));
    }
    total += parseFloat(match[1]) * DURATION_UNITS[match[2]];
  }

  const nanos = Math.round(total);
  if (!Number.isSafeInteger(nanos)) {
    return fail(malformed(field, `duration "${value}" is out of range`));
  }
  return ok(nanos);
}

// ── Networks ──

function ipv4ToBits(address: string): number[] {
  return address.split('.').flatMap(octet => {
    const n = Number(octet);
    return Array.from({ length: 8 }, (_, i) => (n >> (7 - i)) & 1);
  });
}

function ipv6ToBits(address: string): number[] {
  let text = address;
  const groups: string[] = [];
  // Embedded IPv4 tail, e.g. ::ffff:10.0.0.1
  const v4 = /:(\d+\.\d+\.\d+\.\d+)$/.exec(text);
  if (v4) {
    const bits = ipv4ToBits(v4[1]);
    const hi = parseInt(bits.slice(0, 16).join(''), 2).toString(16);
    const lo = parseInt(bits.slice(16).join(''), 2).toString(16);
    text = `${text.slice(0, v4.index)}:${hi}:${lo}`;
  }
  const [head, tail] = text.split('::');
  const headGroups = head ? head.split(':') : [];
  const tailGroups = tail !== undefined && tail.length > 0 ? tail.split(':') : [];
  groups.push(...headGroups);
  if (tail !== undefined) {
    const missing = 8 - headGroups.length - tailGroups.length;
    for (let i = 0; i < missing; i++) groups.push('0');
  }
  groups.push(...tailGroups);
  return groups.flatMap(group => {
    const n = parseInt(group, 16);
    return Array.from({ length: 16 }, (_, i) => (n >> (15 - i)) & 1);
  });
}

/**
 * CIDR in canonical form: valid address, prefix within range, and no bits set
 * past the prefix (`10.0.0.0/8` passes, `10.0.0.1/8` does not).
 */
export function validateCidr(value: string, field: string): Result<string> {
  const slash = value.indexOf('/');
  if (slash < 0) return fail(malformed(field, `"${value}" is not in CIDR notation`));
  const address = value.slice(0, slash);
  const prefixText = value.slice(slash + 1);
  if (!/^\d{1,3}$/.test(prefixText)) {
    return fail(malformed(field, `"${value}" has an invalid prefix length`));
  }
  const prefix = Number(prefixText);

  let bits: number[];
  if (isIPv4(address)) {
    if (prefix > 32) return fail(malformed(field, `"${value}" prefix exceeds 32`));
    bits = ipv4ToBits(address);
  } else if (isIPv6(address) && !address.includes('%')) {
    if (prefix > 128) return fail(malformed(field, `"${value}" prefix exceeds 128`));
    bits = ipv6ToBits(address);
  } else {
    return fail(malformed(field, `"${address}" is not an IP address`));
  }

  if (bits.slice(prefix).some(bit => bit === 1)) {
    return fail(malformed(field, `"${value}" has host bits set past the /${prefix} prefix`));
  }
  return ok(value);
}

// ── Collections ──

/** Ordered de-duplication (first occurrence wins) */
export function dedupe<T>(values: Iterable<T>): T[] {
  return Array.from(new Set(values));
}

/** Apply a validator to every element, stopping at the first failure */
export function validateAll<T, U>(
  values: readonly T[],
  field: string,
  validate: (value: T, field: string) => Result<U>,
): Result<U[]> {
  const out: U[] = [];
  for (let i = 0; i < values.length; i++) {
    const r = validate(values[i], `${field}[${i}]`);
    if (!r.ok) return r;
    out.push(r.value);
  }
  return ok(out);
}
