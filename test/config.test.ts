import { describe, expect, it } from 'vitest';

import { ConfigError, loadConfig } from '../src/config';

const BASE_ENV = {
  AUCTION_OWNER: 'owner',
  AUCTION_COMMISSION_RECIPIENT: 'fees',
  AUCTION_PROCEEDS_RECIPIENT: 'seller',
};

describe('loadConfig', () => {
  it('should fill defaults around the required identities', () => {
    const config = loadConfig(BASE_ENV);
    expect(config).toEqual({
      port: 3000,
      host: '0.0.0.0',
      ledgerBackend: 'memory',
      mongo: {
        uri: 'mongodb://127.0.0.1:27017/auction-settlement?replicaSet=rs0',
        dbName: 'auction-settlement',
        debug: false,
      },
      auction: {
        owner: 'owner',
        commissionRecipient: 'fees',
        proceedsRecipient: 'seller',
        durationSeconds: 3600,
        extensionSeconds: 60,
        currency: 'RUB',
        escrowId: 'escrow',
      },
      worker: { inline: true, intervalMs: 1000 },
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ...BASE_ENV,
      PORT: '8080',
      LEDGER_BACKEND: ' Mongo ',
      MONGO_DEBUG: 'yes',
      AUCTION_DURATION_SEC: '600',
      WORKER_INLINE: 'off',
    });
    expect(config.port).toBe(8080);
    expect(config.ledgerBackend).toBe('mongo');
    expect(config.mongo.debug).toBe(true);
    expect(config.auction.durationSeconds).toBe(600);
    expect(config.worker.inline).toBe(false);
  });

  it('should reject a duration below the minimum', () => {
    let caught: unknown;
    try {
      loadConfig({ ...BASE_ENV, AUCTION_DURATION_SEC: '60' });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0]).toMatch(/^\/auction\/durationSeconds: /);
    }
  });

  it('should require the auction identities', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
  });
});
