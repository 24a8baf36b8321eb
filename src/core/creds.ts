/**
 * Credentials file: a user token and its seed in one decorated text artifact,
 * the format client libraries read to authenticate.
 */

import { chainViolation, fail, malformed, ok } from './errors.js';
import { decodeSeed } from './keys.js';
import { decodeUserToken } from './signer.js';
import type { Result, SignedToken } from './types.js';

export interface ParsedCreds {
  jwt: SignedToken;
  seed: string;
  /** Public key derived from the embedded seed; equals the token's subject */
  publicKey: string;
}

const BLOCK = /-{3,}[^\n]*-{3,}\r?\n([\w\-.=]+)\r?\n-{3,}[^\n]*-{3,}/g;

/** Check that `jwt` is a user token issued to the holder of `seed` */
function checkPair(jwt: SignedToken, seed: string): Result<ParsedCreds> {
  const key = decodeSeed(seed, 'user', 'seed');
  if (!key.ok) return key;
  const token = decodeUserToken(jwt, { field: 'jwt' });
  if (!token.ok) return token;
  if (token.value.claims.subject !== key.value.publicKey) {
    return fail(chainViolation('seed', 'seed public key does not match the token subject'));
  }
  return ok({ jwt: token.value.token, seed, publicKey: key.value.publicKey });
}

/** Render a user token and its seed in the decorated creds format */
export function renderCreds(jwt: SignedToken, seed: string): Result<string> {
  const pair = checkPair(jwt.trim(), seed.trim());
  if (!pair.ok) return pair;
  const { jwt: token, seed: userSeed } = pair.value;
  return ok(
    `-----BEGIN NATS USER JWT-----
${token}
------END NATS USER JWT------

************************* IMPORTANT *************************
NKEY Seed printed below can be used to sign and prove identity.
NKEYs are sensitive and should be treated as secrets.

-----BEGIN USER NKEY SEED-----
${userSeed}
------END USER NKEY SEED------

*************************************************************
`,
  );
}

/** Extract and cross-check the token and seed of a creds file */
export function parseCreds(text: string): Result<ParsedCreds> {
  const blocks = Array.from(text.matchAll(BLOCK), m => m[1]);
  if (blocks.length < 2) {
    return fail(malformed('creds', `expected a JWT block and a seed block, found ${blocks.length} block(s)`));
  }
  return checkPair(blocks[0], blocks[1]);
}
