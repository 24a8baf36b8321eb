/**
 * Trust chain verification: operator → account → user linkage over signed tokens.
 */

import { chainViolation, fail, ok } from './errors.js';
import { decodeAccountToken, decodeOperatorToken, decodeUserToken } from './signer.js';
import type { AccountClaims, DecodedToken, OperatorClaims, Result, SignedToken, UserClaims } from './types.js';

export interface ChainInput {
  operator: SignedToken;
  account: SignedToken;
  user?: SignedToken;
}

export interface VerifiedChain {
  operator: DecodedToken<OperatorClaims>;
  account: DecodedToken<AccountClaims>;
  user?: DecodedToken<UserClaims>;
}

/** Whether `issuer` may sign on behalf of the operator */
export function operatorMaySign(operator: OperatorClaims, issuer: string): boolean {
  if (operator.signingKeys.includes(issuer)) return true;
  return issuer === operator.subject && !operator.strictSigningKeyUsage;
}

/** Whether `issuer` may sign user tokens for the account */
export function accountMaySign(account: AccountClaims, issuer: string): boolean {
  return issuer === account.subject || account.signingKeys.includes(issuer);
}

/**
 * Verify signatures and parent linkage of a chain.
 * Each violation names the link at fault (`operator`, `account`, `user`).
 */
export function verifyChain(input: ChainInput): Result<VerifiedChain> {
  const operator = decodeOperatorToken(input.operator, { field: 'operator' });
  if (!operator.ok) return operator;
  const op = operator.value.claims;
  if (op.issuer !== op.subject && !op.signingKeys.includes(op.issuer)) {
    return fail(chainViolation('operator', 'operator token is not signed by the operator or one of its signing keys'));
  }

  const account = decodeAccountToken(input.account, { field: 'account' });
  if (!account.ok) return account;
  const acct = account.value.claims;
  if (!operatorMaySign(op, acct.issuer)) {
    const detail = op.strictSigningKeyUsage && acct.issuer === op.subject
      ? 'operator requires a signing key but the account was signed by the operator identity key'
      : `account issuer ${acct.issuer} is not the operator or one of its signing keys`;
    return fail(chainViolation('account', detail));
  }

  if (input.user === undefined) {
    return ok({ operator: operator.value, account: account.value });
  }

  const user = decodeUserToken(input.user, { field: 'user' });
  if (!user.ok) return user;
  const usr = user.value.claims;
  if (!accountMaySign(acct, usr.issuer)) {
    return fail(chainViolation('user', `user issuer ${usr.issuer} is not the account or one of its signing keys`));
  }
  if (usr.issuer !== acct.subject && usr.issuerAccount !== acct.subject) {
    return fail(chainViolation('user', 'user signed by a signing key must name the account in issuerAccount'));
  }
  if (usr.issuer === acct.subject && usr.issuerAccount !== '') {
    return fail(chainViolation('user', 'issuerAccount is set on a token signed by the account key itself'));
  }

  return ok({ operator: operator.value, account: account.value, user: user.value });
}
