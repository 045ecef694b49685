#!/usr/bin/env tsx
/**
 * Tops up a few demo balances on a running server and places an opening
 * round of bids, each one clearing the 5% increment over the last.
 */

import 'dotenv/config';

const SERVER_BASE = process.env.SERVER_BASE_URL || 'http://localhost:3000';
const API_BASE = `${SERVER_BASE}/api`;

type DemoAccount = {
  participantId: string;
  depositAmount: string;
};

const DEMO_ACCOUNTS: DemoAccount[] = [
  { participantId: 'alice', depositAmount: '5000' },
  { participantId: 'bob', depositAmount: '5000' },
  { participantId: 'carol', depositAmount: '5000' },
];

const OPENING_BIDS: Array<{ participantId: string; amount: string }> = [
  { participantId: 'alice', amount: '100' },
  { participantId: 'bob', amount: '105' },
  { participantId: 'carol', amount: '110.25' },
];

async function request(url: string, options: RequestInit = {}, participantId?: string): Promise<unknown> {
  console.log(`→ ${options.method || 'GET'} ${url}`);

  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (participantId) headers['x-participant-id'] = participantId;
  const response = await fetch(url, { ...options, headers });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(`HTTP ${response.status}: ${text}`);
  }

  return response.json();
}

async function createDemoAccounts() {
  console.log('\nTopping up demo balances...');

  for (const account of DEMO_ACCOUNTS) {
    await request(`${API_BASE}/accounts/${account.participantId}/deposit`, {
      method: 'POST',
      body: JSON.stringify({ amount: account.depositAmount, txId: `seed:${account.participantId}` }),
    });
    console.log(`  ${account.participantId}: ${account.depositAmount}`);
  }
}

async function placeOpeningBids() {
  console.log('\nPlacing opening bids...');

  for (const bid of OPENING_BIDS) {
    await request(
      `${API_BASE}/auction/bid`,
      { method: 'POST', body: JSON.stringify({ amount: bid.amount }) },
      bid.participantId
    );
    console.log(`  ${bid.participantId}: ${bid.amount}`);
  }
}

async function main() {
  console.log(`Server: ${SERVER_BASE}\n`);

  await request(`${SERVER_BASE}/health`);
  await createDemoAccounts();
  await placeOpeningBids();

  const state = await request(`${API_BASE}/auction`);
  console.log('\nAuction state:', JSON.stringify(state, null, 2));
}

main().catch((error: unknown) => {
  console.error('\nSeeding failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
