import './env';

import { buildApp } from './app';
import { loadConfig } from './config';
import { SettlementAuction } from './modules/auction/auction';
import { AuctionService } from './modules/auction/service';
import { InMemoryLedger } from './modules/ledger/memory';
import { MongoLedger } from './modules/ledger/mongo';
import type { EscrowLedger } from './modules/ledger/types';
import { connectMongo, disconnectMongo } from './shared/db';
import { jsonLineLogger } from './shared/log';
import { startFinalizeWorker } from './worker';

async function main() {
  const config = loadConfig();
  const { auction: auctionConfig } = config;

  let ledger: EscrowLedger;
  if (config.ledgerBackend === 'mongo') {
    await connectMongo(config.mongo, jsonLineLogger);
    ledger = new MongoLedger({ escrowId: auctionConfig.escrowId, currency: auctionConfig.currency });
  } else {
    ledger = new InMemoryLedger({ escrowId: auctionConfig.escrowId, currency: auctionConfig.currency });
  }

  const auction = SettlementAuction.create(
    {
      owner: auctionConfig.owner,
      commissionRecipient: auctionConfig.commissionRecipient,
      proceedsRecipient: auctionConfig.proceedsRecipient,
      durationSeconds: auctionConfig.durationSeconds,
      extensionSeconds: auctionConfig.extensionSeconds,
    },
    ledger,
    { logger: jsonLineLogger }
  );
  const service = new AuctionService(auction, ledger, jsonLineLogger);
  const app = await buildApp({ service, allowedOrigins: process.env.ALLOWED_ORIGINS?.split(',') });

  const worker = config.worker.inline
    ? startFinalizeWorker(service, { intervalMs: config.worker.intervalMs, logger: app.log })
    : null;
  if (!worker) app.log.info({ WORKER_INLINE: process.env.WORKER_INLINE }, '[finalize-worker] disabled');

  app.addHook('onClose', async () => {
    worker?.stop();
    await disconnectMongo();
  });

  app.log.info(
    { ledger: config.ledgerBackend, owner: auction.owner, auctionEndTime: auction.snapshot().auctionEndTime },
    'auction created'
  );

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
