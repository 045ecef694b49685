import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { MIN_DURATION_SEC, MIN_EXTENSION_SEC } from './modules/auction/constants';

const Identity = Type.String({ minLength: 1 });

export const ConfigSchema = Type.Object({
  port: Type.Integer({ minimum: 0, maximum: 65535 }),
  host: Type.String({ minLength: 1 }),
  ledgerBackend: Type.Union([Type.Literal('memory'), Type.Literal('mongo')]),
  mongo: Type.Object({
    uri: Type.String({ minLength: 1 }),
    dbName: Type.String({ minLength: 1 }),
    debug: Type.Boolean(),
  }),
  auction: Type.Object({
    owner: Identity,
    commissionRecipient: Identity,
    proceedsRecipient: Identity,
    durationSeconds: Type.Integer({ minimum: MIN_DURATION_SEC }),
    extensionSeconds: Type.Integer({ minimum: MIN_EXTENSION_SEC }),
    currency: Type.String({ minLength: 1 }),
    escrowId: Identity,
  }),
  worker: Type.Object({
    inline: Type.Boolean(),
    intervalMs: Type.Integer({ minimum: 50 }),
  }),
});

export type AppConfig = Static<typeof ConfigSchema>;

export class ConfigError extends Error {
  readonly name = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
  }
}

function envTruthy(v: string | undefined | null): boolean {
  if (v == null) return false;
  const s = String(v).trim().toLowerCase();
  return ['1', 'true', 'yes', 'on'].includes(s);
}

function envFalsy(v: string | undefined | null): boolean {
  if (v == null) return false;
  const s = String(v).trim().toLowerCase();
  return ['0', 'false', 'no', 'off'].includes(s);
}

function envInt(v: string | undefined, fallback: number): number {
  if (v == null || !v.trim()) return fallback;
  return Number(v);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    port: envInt(env.PORT, 3000),
    host: env.HOST ?? '0.0.0.0',
    ledgerBackend: (env.LEDGER_BACKEND ?? 'memory').trim().toLowerCase(),
    mongo: {
      uri: env.MONGODB_URI ?? 'mongodb://127.0.0.1:27017/auction-settlement?replicaSet=rs0',
      dbName: env.MONGO_DB ?? 'auction-settlement',
      debug: envTruthy(env.MONGO_DEBUG),
    },
    auction: {
      owner: env.AUCTION_OWNER ?? '',
      commissionRecipient: env.AUCTION_COMMISSION_RECIPIENT ?? '',
      proceedsRecipient: env.AUCTION_PROCEEDS_RECIPIENT ?? '',
      durationSeconds: envInt(env.AUCTION_DURATION_SEC, 3600),
      extensionSeconds: envInt(env.AUCTION_EXTENSION_SEC, 60),
      currency: env.AUCTION_CURRENCY ?? 'RUB',
      escrowId: env.AUCTION_ESCROW_ID ?? 'escrow',
    },
    worker: {
      // enabled unless explicitly disabled
      inline: !envFalsy(env.WORKER_INLINE),
      intervalMs: envInt(env.WORKER_INTERVAL_MS, 1000),
    },
  };

  if (!Value.Check(ConfigSchema, raw)) {
    const issues = [...Value.Errors(ConfigSchema, raw)].map((e) => `${e.path || '/'}: ${e.message}`);
    throw new ConfigError(issues);
  }
  return raw;
}
