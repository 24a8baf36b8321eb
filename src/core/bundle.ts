/**
 * Trust bundle assembler.
 *
 * Works only on already-issued tokens: decodes each account token to learn its
 * subject, builds the resolver preload map and renders the server configuration
 * fragment. No seed is ever needed here.
 */

import { assemblyError, conflict, fail, ok } from './errors.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { decodeAccountToken, decodeOperatorToken } from './signer.js';
import type { Bundle, ConflictNotice, ConflictPolicy, Result, SignedToken } from './types.js';

export interface AssembleInput {
  operatorToken: SignedToken;
  systemAccountToken?: SignedToken;
  accountTokens?: SignedToken[];
  /** Only MEMORY is supported */
  resolverKind?: string;
}

export interface AssemblerConfig {
  conflictPolicy: ConflictPolicy;
  /** Check each token's signature against its issuer while decoding */
  verifySignatures: boolean;
  logger?: Logger;
}

const DEFAULT_CONFIG: AssemblerConfig = {
  conflictPolicy: 'warn',
  verifySignatures: true,
};

export class TrustBundleAssembler {
  private config: AssemblerConfig;
  private logger: Logger;

  constructor(config?: Partial<AssemblerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = this.config.logger ?? createLogger('bundle');
  }

  /**
   * Build a bundle from an operator token and its account tokens.
   * The system account (if any) enters the preload map first, followed by
   * `accountTokens` in order; a repeated subject keeps the later token.
   */
  assemble(input: AssembleInput): Result<Bundle> {
    const resolverKind = input.resolverKind ?? 'MEMORY';
    if (resolverKind !== 'MEMORY') {
      return fail(assemblyError('resolverKind', 'unsupported resolver', `resolver ${resolverKind} is not supported`));
    }

    const verify = this.config.verifySignatures;
    const operator = decodeOperatorToken(input.operatorToken, { verify, field: 'operatorToken' });
    if (!operator.ok) {
      return fail(assemblyError('operatorToken', 'malformed operator token', operator.error.detail));
    }

    const entries: Array<{ field: string; token: SignedToken }> = [];
    if (input.systemAccountToken !== undefined) {
      entries.push({ field: 'systemAccountToken', token: input.systemAccountToken });
    }
    (input.accountTokens ?? []).forEach((token, i) => entries.push({ field: `accountTokens[${i}]`, token }));

    const conflicts: ConflictNotice[] = [];
    const noteConflict = (notice: ConflictNotice): Result<void> => {
      if (this.config.conflictPolicy === 'reject') return fail(conflict(notice));
      conflicts.push(notice);
      this.logger.warn('Conflicting bundle input resolved last-write-wins', { ...notice });
      return ok(undefined);
    };

    const preload = new Map<string, SignedToken>();
    let systemAccountPublicKey = '';
    for (const { field, token } of entries) {
      const account = decodeAccountToken(token, { verify, field });
      if (!account.ok) {
        return fail(assemblyError(field, 'malformed account token', account.error.detail));
      }
      const subject = account.value.claims.subject;
      if (field === 'systemAccountToken') systemAccountPublicKey = subject;

      if (preload.has(subject)) {
        const noted = noteConflict({ field, key: subject, detail: `account ${subject} appears more than once` });
        if (!noted.ok) return noted;
      }
      preload.set(subject, account.value.token);
      this.logger.debug('Preloaded account', { field, subject });
    }

    const declared = operator.value.claims.systemAccount;
    if (systemAccountPublicKey && declared && declared !== systemAccountPublicKey) {
      const noted = noteConflict({
        field: 'systemAccountToken',
        key: systemAccountPublicKey,
        detail: `operator declares system account ${declared}`,
      });
      if (!noted.ok) return noted;
    }

    return ok({
      operator: operator.value.token,
      systemAccountPublicKey,
      resolverKind: 'MEMORY',
      preloadMap: Object.fromEntries(preload),
      conflicts,
    });
  }
}

/** Render a bundle as the server configuration fragment */
export function renderServerConfig(bundle: Bundle): string {
  const lines = [`operator: ${bundle.operator}`];
  if (bundle.systemAccountPublicKey) lines.push(`system_account: ${bundle.systemAccountPublicKey}`);
  lines.push(`resolver: ${bundle.resolverKind}`);
  const preload = Object.entries(bundle.preloadMap);
  if (preload.length > 0) {
    lines.push('resolver_preload: {');
    for (const [key, token] of preload) lines.push(`  ${key}: ${token}`);
    lines.push('}');
  }
  return lines.map(line => `${line}\n`).join('');
}

const defaultAssembler = new TrustBundleAssembler();

export function assemble(input: AssembleInput): Result<Bundle> {
  return defaultAssembler.assemble(input);
}

/** Assemble and render in one step */
export function assembleServerConfig(input: AssembleInput): Result<{ bundle: Bundle; config: string }> {
  const bundle = defaultAssembler.assemble(input);
  if (!bundle.ok) return bundle;
  return ok({ bundle: bundle.value, config: renderServerConfig(bundle.value) });
}
