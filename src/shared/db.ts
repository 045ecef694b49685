import mongoose from 'mongoose';

import type { Logger } from './log';

let isConnected = false;

function stripReplicaSet(uri: string): string {
  // remove `replicaSet=...` from query string
  let next = uri.replace(/([?&])replicaSet=[^&]+(&?)/i, (_m, p1: string, p2: string) => {
    // if it was the first param and there are more params, keep '?'
    if (p1 === '?' && p2 === '&') return '?';
    return p1;
  });

  next = next.replace(/[?&]$/, '');
  next = next.replace(/\?&/, '?');
  return next;
}

function shouldFallbackToStandalone(err: unknown, uri: string): boolean {
  if (!/replicaSet=/i.test(uri)) return false;

  const msg = err instanceof Error ? err.message : String(err);
  return (
    /ReplicaSetNoPrimary/i.test(msg) ||
    /server selection timed out/i.test(msg) ||
    /RSGhost/i.test(msg)
  );
}

export type MongoConnectOptions = {
  uri: string;
  dbName: string;
  debug?: boolean;
};

export async function connectMongo(opts: MongoConnectOptions, logger: Logger): Promise<void> {
  if (isConnected) return;

  mongoose.set('strictQuery', true);
  if (opts.debug) mongoose.set('debug', true);

  const connect = async (targetUri: string) =>
    mongoose.connect(targetUri, {
      dbName: opts.dbName,
      serverSelectionTimeoutMS: 10_000,
    });

  try {
    await connect(opts.uri);
  } catch (err) {
    if (!shouldFallbackToStandalone(err, opts.uri)) throw err;

    const fallbackUri = stripReplicaSet(opts.uri);
    if (fallbackUri === opts.uri) throw err;

    logger.warn({ uri: fallbackUri }, '[mongo] cannot connect to replica set; retrying without replicaSet');
    await connect(fallbackUri);
  }

  isConnected = true;
  logger.info({ dbName: opts.dbName }, '[mongo] connected');
}

export async function disconnectMongo(): Promise<void> {
  if (!isConnected) return;
  await mongoose.disconnect();
  isConnected = false;
}

export function startSession(): Promise<mongoose.ClientSession> {
  return mongoose.startSession();
}
