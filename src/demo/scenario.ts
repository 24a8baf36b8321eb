#!/usr/bin/env tsx
// trustmint Demo Scenario: mint a small hierarchy and print the server config
// Usage: npm run demo

import { assembleServerConfig } from '../core/bundle.js';
import { verifyChain } from '../core/chain.js';
import { unwrap } from '../core/errors.js';
import { HierarchyBuilder } from '../core/hierarchy.js';
import { generateKey } from '../core/keys.js';

// ═══════════════════════════════════════════
// Utility
// ═══════════════════════════════════════════

function banner(title: string): void {
  console.log('\n' + '═'.repeat(60));
  console.log(`  ${title}`);
  console.log('═'.repeat(60));
}

function section(title: string): void {
  console.log(`\n── ${title} ${'─'.repeat(Math.max(0, 50 - title.length))}`);
}

// ═══════════════════════════════════════════
// Scenario
// ═══════════════════════════════════════════

function main(): void {
  banner('trustmint: Operator / Account / User Demo');

  section('Generating Keys');
  const operatorKey = generateKey('operator');
  const systemKey = generateKey('account');
  const appKey = generateKey('account');
  const appSigningKey = generateKey('account');
  const userKey = generateKey('user');
  console.log(`  Operator:        ${operatorKey.publicKey}`);
  console.log(`  System account:  ${systemKey.publicKey}`);
  console.log(`  App account:     ${appKey.publicKey}`);
  console.log(`  User:            ${userKey.publicKey}`);

  const builder = new HierarchyBuilder();

  section('Minting Tokens');
  const operator = unwrap(builder.buildOperator('demo-operator', operatorKey.seed, operatorKey.seed, {
    systemAccount: systemKey.publicKey,
  }));
  const system = unwrap(builder.buildSystemAccount('SYS', systemKey.seed, operatorKey.seed));
  const app = unwrap(builder.buildAccount('app', appKey.seed, operatorKey.seed, {
    signingKeys: [appSigningKey.publicKey],
    jetstreamLimits: [
      { tier: 'R1', memStorage: 1 << 20, diskStorage: 1 << 30, streams: 5 },
      { tier: 'R3', memStorage: 1 << 20, diskStorage: 1 << 30, streams: 10 },
    ],
    defaultPermissions: { pubAllow: ['app.>'], subAllow: ['app.>', '_INBOX.>'] },
  }));
  const user = unwrap(builder.buildUser('worker', userKey.seed, appSigningKey.seed, {
    parentAccount: app.jwt,
    inheritDefaultPermissions: true,
    allowedConnectionTypes: ['STANDARD', 'WEBSOCKET'],
    timeRestrictions: [{ start: '08:00:00', end: '17:00:00' }],
    locale: 'Europe/Berlin',
  }));
  console.log(`  System exports:  ${system.claims.exports.map(e => e.name).join(', ')}`);
  console.log(`  User issuer:     ${user.claims.issuer}`);
  console.log(`  Issuer account:  ${user.claims.issuerAccount}`);

  section('Verifying Chain');
  const chain = unwrap(verifyChain({ operator: operator.jwt, account: app.jwt, user: user.jwt }));
  console.log(`  ✓ ${chain.operator.claims.name} → ${chain.account.claims.name} → ${chain.user?.claims.name}`);

  section('Server Configuration');
  const { config } = unwrap(assembleServerConfig({
    operatorToken: operator.jwt,
    systemAccountToken: system.jwt,
    accountTokens: [app.jwt],
  }));
  process.stdout.write(config);

  section('User Credentials');
  console.log(user.creds.split('\n')[0]);
  console.log('  (seed block omitted)');
}

main();
