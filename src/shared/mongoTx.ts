import mongoose from 'mongoose';

import { retriesTotal } from './metrics';

function errorLabels(e: unknown): string[] {
  if (!(e instanceof Error) || !('errorLabels' in e)) return [];
  const labels = e.errorLabels;
  if (Array.isArray(labels)) return labels.map(String);
  // MongoError keeps them in a Set
  if (labels instanceof Set) return [...labels].map(String);
  return [];
}

// Retries transactions that hit a write conflict or an unknown commit result.
export async function withTransactionRetries<T>(
  session: mongoose.ClientSession,
  fn: () => Promise<T>,
  opts?: { maxAttempts?: number }
): Promise<T> {
  const maxAttempts = opts?.maxAttempts ?? 7;
  let lastErr: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      // eslint-disable-next-line no-await-in-loop
      return await session.withTransaction(fn);
    } catch (e) {
      lastErr = e;
      const labels = errorLabels(e);
      const isTransient = labels.includes('TransientTransactionError');
      const isCommitUnknown = labels.includes('UnknownTransactionCommitResult');

      if (!(isTransient || isCommitUnknown) || attempt === maxAttempts) throw e;

      retriesTotal.labels('transaction', isTransient ? 'transient' : 'commit_unknown').inc();
      // eslint-disable-next-line no-await-in-loop
      await new Promise((r) => setTimeout(r, 10 * attempt));
    }
  }

  throw lastErr;
}
