import { describe, it, expect } from 'vitest';
import { jetstreamLimitsForTier, newAccountClaims } from '../src/core/claims.js';
import { unwrap } from '../src/core/errors.js';
import {
  HierarchyBuilder,
  SYSTEM_ACCOUNT_EXPORTS,
  buildAccount,
  buildOperator,
  buildSystemAccount,
  buildUser,
  mergeSystemExports,
} from '../src/core/hierarchy.js';
import { generateKey } from '../src/core/keys.js';
import type { Logger } from '../src/core/logger.js';
import { decodeAccountToken, decodeOperatorToken, decodeUserToken } from '../src/core/signer.js';
import type { CredentialFailure, Result } from '../src/core/types.js';

function failure<T>(result: Result<T>): CredentialFailure {
  if (result.ok) throw new Error('expected a failure');
  return result.error;
}

function captureLogger(): { logger: Logger; warnings: Array<Record<string, unknown> | undefined> } {
  const warnings: Array<Record<string, unknown> | undefined> = [];
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: (_message, context) => {
      warnings.push(context);
    },
    error: () => {},
  };
  return { logger, warnings };
}

describe('Hierarchy Builder', () => {
  const operator = generateKey('operator');
  const account = generateKey('account');
  const user = generateKey('user');

  describe('buildOperator', () => {
    it('should self-sign the operator token', () => {
      const issued = unwrap(buildOperator('root', operator.seed, operator.seed));
      const decoded = unwrap(decodeOperatorToken(issued.jwt));
      expect(decoded.claims.issuer).toBe(operator.publicKey);
      expect(decoded.claims.subject).toBe(operator.publicKey);
      expect(issued.publicKey).toBe(operator.publicKey);
    });

    it('should accept one of its own signing keys as signer', () => {
      const signingKey = generateKey('operator');
      const issued = unwrap(buildOperator('root', operator.seed, signingKey.seed, { signingKeys: [signingKey.publicKey] }));
      expect(issued.claims.issuer).toBe(signingKey.publicKey);
      expect(issued.claims.signingKeys).toEqual([signingKey.publicKey]);
    });

    it('should refuse an unrelated operator key as signer', () => {
      const other = generateKey('operator');
      expect(failure(buildOperator('root', operator.seed, other.seed))).toMatchObject({
        type: 'chain_violation',
        field: 'signerKey',
      });
    });

    it('should validate the system account key role', () => {
      expect(failure(buildOperator('root', operator.seed, operator.seed, { systemAccount: user.publicKey }))).toMatchObject({
        type: 'key_type_mismatch',
        field: 'systemAccount',
        expected: 'account',
        actual: 'user',
      });
    });

    it('should validate service URLs', () => {
      const error = failure(buildOperator('root', operator.seed, operator.seed, {
        operatorServiceUrls: ['nats://localhost:4222', 'not a url'],
      }));
      expect(error).toMatchObject({ type: 'malformed_input', field: 'operatorServiceUrls[1]' });
    });

    it('should reject an empty name', () => {
      expect(failure(buildOperator('  ', operator.seed, operator.seed))).toMatchObject({
        type: 'malformed_input',
        field: 'name',
      });
    });
  });

  describe('buildAccount', () => {
    it('should link issuer and subject to the keys used', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed));
      const decoded = unwrap(decodeAccountToken(issued.jwt));
      expect(decoded.claims.issuer).toBe(operator.publicKey);
      expect(decoded.claims.subject).toBe(account.publicKey);
    });

    it('should be deterministic', () => {
      const first = unwrap(buildAccount('acme', account.seed, operator.seed));
      const second = unwrap(buildAccount('acme', account.seed, operator.seed));
      expect(first.jwt).toBe(second.jwt);
    });

    it('should reject a user seed as signer', () => {
      expect(failure(buildAccount('acme', account.seed, user.seed))).toEqual({
        type: 'key_type_mismatch',
        field: 'signerKey',
        expected: 'operator',
        actual: 'user',
        detail: 'expected operator key, got user key',
      });
    });

    it('should reject an operator seed as the account key', () => {
      expect(failure(buildAccount('acme', operator.seed, operator.seed))).toMatchObject({
        type: 'key_type_mismatch',
        field: 'ownKey',
      });
    });

    it('should default notBefore to issuedAt', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, { issuedAt: 1_700_000_000 }));
      expect(issued.claims.issuedAt).toBe(1_700_000_000);
      expect(issued.claims.notBefore).toBe(1_700_000_000);
      expect(issued.claims.expires).toBe(0);
    });

    it('should reject expiry before notBefore', () => {
      expect(failure(buildAccount('acme', account.seed, operator.seed, { notBefore: 200, expires: 100 }))).toMatchObject({
        type: 'malformed_input',
        field: 'expires',
      });
    });

    it('should apply limits and default permissions', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, {
        natsLimits: { subs: 100 },
        accountLimits: { conn: 10, wildcardExports: false },
        defaultPermissions: { pubAllow: ['acme.>', 'acme.>'], subDeny: ['admin.>'] },
      }));
      expect(issued.claims.natsLimits).toEqual({ subs: 100, data: -1, payload: -1 });
      expect(issued.claims.accountLimits.conn).toBe(10);
      expect(issued.claims.accountLimits.wildcardExports).toBe(false);
      expect(issued.claims.accountLimits.imports).toBe(-1);
      expect(issued.claims.defaultPermissions).toEqual({
        pub: { allow: ['acme.>'], deny: [] },
        sub: { allow: [], deny: ['admin.>'] },
      });
    });

    it('should name the failing limit field', () => {
      expect(failure(buildAccount('acme', account.seed, operator.seed, { natsLimits: { payload: -5 } }))).toMatchObject({
        type: 'malformed_input',
        field: 'natsLimits.payload',
      });
    });

    it('should reject sampling out of range', () => {
      const error = failure(buildAccount('acme', account.seed, operator.seed, {
        trace: { destination: 'trace.acme', sampling: 150 },
      }));
      expect(error).toMatchObject({ type: 'malformed_input', field: 'trace.sampling' });
    });

    it('should keep a trace with destination', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, {
        trace: { destination: 'trace.acme', sampling: 50 },
      }));
      expect(unwrap(decodeAccountToken(issued.jwt)).claims.trace).toEqual({ destination: 'trace.acme', sampling: 50 });
    });

    it('should reject signing keys of the wrong role', () => {
      expect(failure(buildAccount('acme', account.seed, operator.seed, { signingKeys: [operator.publicKey] }))).toMatchObject({
        type: 'key_type_mismatch',
        field: 'signingKeys[0]',
      });
    });
  });

  describe('JetStream limits', () => {
    it('should partition labeled blocks into the tier map and leave the global record untouched', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, {
        jetstreamLimits: [{ tier: 'R1', streams: 5 }, { tier: 'R3', streams: 10 }],
      }));
      const claims = unwrap(decodeAccountToken(issued.jwt)).claims;
      expect(claims.tieredJetstream.R1.streams).toBe(5);
      expect(claims.tieredJetstream.R3.streams).toBe(10);
      expect(Object.keys(claims.tieredJetstream)).toEqual(['R1', 'R3']);
      expect(claims.jetstream).toEqual(newAccountClaims(account.publicKey).jetstream);
      expect(issued.conflicts).toEqual([]);
    });

    it('should fill unset tier fields with the unlimited sentinel', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, {
        jetstreamLimits: [{ tier: 'R1', diskStorage: 1024 }],
      }));
      expect(issued.claims.tieredJetstream.R1).toEqual({
        memStorage: 0,
        diskStorage: 1024,
        streams: -1,
        consumer: -1,
        maxAckPending: -1,
        memMaxStreamBytes: 0,
        diskMaxStreamBytes: 0,
        maxBytesRequired: false,
      });
    });

    it('should set the global record from an unlabeled block', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, {
        jetstreamLimits: [{ memStorage: 1024, diskStorage: 4096 }],
      }));
      expect(issued.claims.jetstream.memStorage).toBe(1024);
      expect(issued.claims.jetstream.diskStorage).toBe(4096);
      expect(issued.claims.tieredJetstream).toEqual({});
    });

    it('should report a second unlabeled block and keep the last one', () => {
      const { logger, warnings } = captureLogger();
      const builder = new HierarchyBuilder({ logger });
      const issued = unwrap(builder.buildAccount('acme', account.seed, operator.seed, {
        jetstreamLimits: [{ memStorage: 1 }, { memStorage: 2 }],
      }));
      expect(issued.claims.jetstream.memStorage).toBe(2);
      expect(issued.conflicts).toEqual([
        { field: 'jetstreamLimits[1]', key: '(global)', detail: 'unlabeled JetStream block overrides jetstreamLimits[0]' },
      ]);
      expect(warnings).toEqual([
        { field: 'jetstreamLimits[1]', key: '(global)', detail: 'unlabeled JetStream block overrides jetstreamLimits[0]' },
      ]);
    });

    it('should report a repeated tier label', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, {
        jetstreamLimits: [{ tier: 'R1', streams: 1 }, { tier: 'R1', streams: 2 }],
      }));
      expect(issued.claims.tieredJetstream.R1.streams).toBe(2);
      expect(issued.conflicts.map(c => c.key)).toEqual(['R1']);
    });

    it('should treat a tier named like an object property as an ordinary tier', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, {
        jetstreamLimits: [{ tier: 'constructor', streams: 3 }],
      }));
      expect(issued.conflicts).toEqual([]);
      const claims = unwrap(decodeAccountToken(issued.jwt)).claims;
      expect(Object.keys(claims.tieredJetstream)).toEqual(['constructor']);
      expect(jetstreamLimitsForTier(claims, 'constructor').streams).toBe(3);
      expect(jetstreamLimitsForTier(claims, 'toString')).toEqual(claims.jetstream);
    });

    it('should fail on conflicts under the reject policy', () => {
      const builder = new HierarchyBuilder({ conflictPolicy: 'reject' });
      expect(failure(builder.buildAccount('acme', account.seed, operator.seed, {
        jetstreamLimits: [{ memStorage: 1 }, { memStorage: 2 }],
      }))).toEqual({
        type: 'conflicting_configuration',
        field: 'jetstreamLimits[1]',
        key: '(global)',
        detail: 'unlabeled JetStream block overrides jetstreamLimits[0]',
      });
    });

    it('should flag enabled global limits next to tiers', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, {
        jetstreamLimits: [{ memStorage: 1024 }, { tier: 'R1', streams: 1 }],
      }));
      expect(issued.conflicts.map(c => c.key)).toEqual(['(global+tiered)']);
    });
  });

  describe('exports', () => {
    it('should collapse duplicate subjects last-write-wins', () => {
      const issued = unwrap(buildAccount('acme', account.seed, operator.seed, {
        exports: [
          { name: 'first', subject: 'svc.a', type: 'service' },
          { name: 'second', subject: 'svc.a', type: 'service' },
        ],
      }));
      expect(issued.claims.exports).toEqual([{ name: 'second', subject: 'svc.a', type: 'service' }]);
      expect(issued.conflicts).toHaveLength(1);
      expect(issued.conflicts[0].field).toBe('exports[1]');
    });

    it('should reject a response type on a stream export', () => {
      const error = failure(buildAccount('acme', account.seed, operator.seed, {
        exports: [{ name: 'feed', subject: 'feed.>', type: 'stream', responseType: 'Singleton' }],
      }));
      expect(error).toMatchObject({ type: 'malformed_input', field: 'exports[0].responseType' });
    });
  });

  describe('buildSystemAccount', () => {
    it('should add the default monitoring exports', () => {
      const issued = unwrap(buildSystemAccount('SYS', account.seed, operator.seed));
      expect(issued.claims.exports).toEqual([...SYSTEM_ACCOUNT_EXPORTS]);
      const decoded = unwrap(decodeAccountToken(issued.jwt)).claims;
      expect(decoded.exports).toEqual([...SYSTEM_ACCOUNT_EXPORTS]);
    });

    it('should describe the monitoring exports and link their documentation', () => {
      const issued = unwrap(buildSystemAccount('SYS', account.seed, operator.seed));
      const decoded = unwrap(decodeAccountToken(issued.jwt)).claims;
      expect(decoded.exports.map(e => [e.description, e.infoUrl])).toEqual([
        [
          'Request account specific monitoring services for: SUBSZ, CONNZ, LEAFZ, JSZ and INFO',
          'https://docs.nats.io/nats-server/configuration/sys_accounts',
        ],
        ['Account specific monitoring stream', 'https://docs.nats.io/nats-server/configuration/sys_accounts'],
      ]);
    });

    it('should reject an export info URL that does not parse', () => {
      const error = failure(buildAccount('acme', account.seed, operator.seed, {
        exports: [{ name: 'feed', subject: 'feed.>', type: 'stream', infoUrl: 'not a url' }],
      }));
      expect(error).toEqual({ type: 'malformed_input', field: 'exports[0].infoUrl', detail: 'not a valid URL: "not a url"' });
    });

    it('should be idempotent across repeated builds', () => {
      const first = unwrap(buildSystemAccount('SYS', account.seed, operator.seed));
      const second = unwrap(buildSystemAccount('SYS', account.seed, operator.seed));
      expect(second.claims.exports).toEqual(first.claims.exports);
      expect(second.jwt).toBe(first.jwt);
    });

    it('should not duplicate an export the caller already declares', () => {
      const custom = { name: 'custom', subject: '$SYS.REQ.ACCOUNT.*.*', type: 'service' as const };
      const issued = unwrap(buildSystemAccount('SYS', account.seed, operator.seed, { exports: [custom] }));
      expect(issued.claims.exports.map(e => e.subject)).toEqual(['$SYS.REQ.ACCOUNT.*.*', '$SYS.ACCOUNT.*.>']);
      expect(issued.claims.exports[0].name).toBe('custom');
    });

    it('mergeSystemExports is stable when applied twice', () => {
      const once = mergeSystemExports([]);
      expect(mergeSystemExports(once)).toEqual(once);
    });
  });

  describe('buildUser', () => {
    it('should issue a user signed by the account', () => {
      const issued = unwrap(buildUser('worker', user.seed, account.seed));
      const decoded = unwrap(decodeUserToken(issued.jwt)).claims;
      expect(decoded.issuer).toBe(account.publicKey);
      expect(decoded.subject).toBe(user.publicKey);
      expect(decoded.issuerAccount).toBe('');
      expect(issued.creds.startsWith('-----BEGIN NATS USER JWT-----\n')).toBe(true);
    });

    it('should require a locale with time restrictions', () => {
      const error = failure(buildUser('worker', user.seed, account.seed, {
        timeRestrictions: [{ start: '08:00:00', end: '17:00:00' }],
      }));
      expect(error).toEqual({
        type: 'malformed_input',
        field: 'locale',
        detail: 'a locale is required when timeRestrictions are set',
      });
    });

    it('should round-trip time restrictions with a locale', () => {
      const issued = unwrap(buildUser('worker', user.seed, account.seed, {
        timeRestrictions: [{ start: '08:00:00', end: '17:00:00' }],
        locale: 'America/New_York',
      }));
      const decoded = unwrap(decodeUserToken(issued.jwt)).claims;
      expect(decoded.timeRestrictions).toEqual([{ start: '08:00:00', end: '17:00:00' }]);
      expect(decoded.locale).toBe('America/New_York');
    });

    it('should write the locale in its canonical spelling', () => {
      const issued = unwrap(buildUser('worker', user.seed, account.seed, {
        timeRestrictions: [{ start: '08:00:00', end: '17:00:00' }],
        locale: 'america/new_york',
      }));
      expect(unwrap(decodeUserToken(issued.jwt)).claims.locale).toBe('America/New_York');
    });

    it('should convert the response TTL to nanoseconds', () => {
      const issued = unwrap(buildUser('worker', user.seed, account.seed, {
        permissions: { pubAllow: ['jobs.>'], respMaxMsgs: 1, respTtl: '1m30s' },
      }));
      expect(issued.claims.response).toEqual({ maxMsgs: 1, ttlNanos: 90_000_000_000 });
      expect(issued.claims.permissions.pub.allow).toEqual(['jobs.>']);
    });

    it('should name the failing field for bad inputs', () => {
      expect(failure(buildUser('worker', user.seed, account.seed, {
        permissions: { respTtl: 'soon' },
      })).field).toBe('permissions.respTtl');
      expect(failure(buildUser('worker', user.seed, account.seed, {
        sourceNetworks: ['10.0.0.0/8', '192.168.1.1/24'],
      })).field).toBe('sourceNetworks[1]');
      expect(failure(buildUser('worker', user.seed, account.seed, {
        allowedConnectionTypes: ['STANDARD', 'TELNET'],
      })).field).toBe('allowedConnectionTypes[1]');
      expect(failure(buildUser('worker', user.seed, account.seed, {
        timeRestrictions: [{ start: '8am', end: '17:00:00' }],
        locale: 'UTC',
      })).field).toBe('timeRestrictions[0].start');
    });

    it('should reject an operator seed as signer', () => {
      expect(failure(buildUser('worker', user.seed, operator.seed))).toMatchObject({
        type: 'key_type_mismatch',
        field: 'signerKey',
        expected: 'account',
        actual: 'operator',
      });
    });

    describe('with a parent account', () => {
      const signingKey = generateKey('account');
      const parent = unwrap(buildAccount('acme', account.seed, operator.seed, {
        signingKeys: [signingKey.publicKey],
        defaultPermissions: { pubAllow: ['acme.>'], subAllow: ['_INBOX.>'] },
      }));

      it('should fill issuerAccount when a signing key issues the token', () => {
        const issued = unwrap(buildUser('worker', user.seed, signingKey.seed, { parentAccount: parent.jwt }));
        expect(issued.claims.issuer).toBe(signingKey.publicKey);
        expect(issued.claims.issuerAccount).toBe(account.publicKey);
      });

      it('should leave issuerAccount empty when the account key issues the token', () => {
        const issued = unwrap(buildUser('worker', user.seed, account.seed, { parentAccount: parent.jwt }));
        expect(issued.claims.issuerAccount).toBe('');
      });

      it('should refuse a signer the account does not declare', () => {
        const stranger = generateKey('account');
        expect(failure(buildUser('worker', user.seed, stranger.seed, { parentAccount: parent.jwt }))).toMatchObject({
          type: 'chain_violation',
          field: 'signerKey',
        });
      });

      it('should refuse a mismatching issuerAccount', () => {
        const error = failure(buildUser('worker', user.seed, signingKey.seed, {
          parentAccount: parent.jwt,
          issuerAccount: generateKey('account').publicKey,
        }));
        expect(error).toMatchObject({ type: 'chain_violation', field: 'issuerAccount' });
      });

      it('should inherit default permissions when asked', () => {
        const issued = unwrap(buildUser('worker', user.seed, account.seed, {
          parentAccount: parent.jwt,
          inheritDefaultPermissions: true,
        }));
        expect(issued.claims.permissions).toEqual({
          pub: { allow: ['acme.>'], deny: [] },
          sub: { allow: ['_INBOX.>'], deny: [] },
        });
      });

      it('should prefer explicit permissions over inherited ones', () => {
        const issued = unwrap(buildUser('worker', user.seed, account.seed, {
          parentAccount: parent.jwt,
          inheritDefaultPermissions: true,
          permissions: { subAllow: ['jobs.>'] },
        }));
        expect(issued.claims.permissions.sub.allow).toEqual(['jobs.>']);
        expect(issued.claims.permissions.pub.allow).toEqual([]);
      });

      it('should reject a parent that is not an account token', () => {
        const op = unwrap(buildOperator('root', operator.seed, operator.seed));
        expect(failure(buildUser('worker', user.seed, account.seed, { parentAccount: op.jwt }))).toMatchObject({
          type: 'decoding_failure',
          field: 'parentAccount',
        });
      });
    });

    it('should require a parent account to inherit permissions', () => {
      expect(failure(buildUser('worker', user.seed, account.seed, { inheritDefaultPermissions: true }))).toMatchObject({
        type: 'malformed_input',
        field: 'inheritDefaultPermissions',
      });
    });

    it('should accept an explicit issuerAccount without a parent', () => {
      const signingKey = generateKey('account');
      const issued = unwrap(buildUser('worker', user.seed, signingKey.seed, { issuerAccount: account.publicKey }));
      expect(issued.claims.issuerAccount).toBe(account.publicKey);
    });
  });
});
