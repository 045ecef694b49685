import { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import fastifyCookie from '@fastify/cookie';

import { auctionRoutes } from './routes/auction';
import { accountsRoutes } from './routes/accounts';
import type { AuctionService } from '../modules/auction/service';

const PARTICIPANT_HEADER = 'x-participant-id';
const PARTICIPANT_COOKIE = 'participantId';

declare module 'fastify' {
  interface FastifyRequest {
    participantId: string | null;
  }
}

export type ApiPluginOptions = {
  service: AuctionService;
  allowedOrigins?: string[];
  rateLimitMax?: number;
};

function resolveParticipant(header: string | string[] | undefined, cookie: string | undefined): string | null {
  const fromHeader = typeof header === 'string' ? header.trim() : '';
  if (fromHeader) return fromHeader;
  const fromCookie = cookie?.trim() ?? '';
  return fromCookie || null;
}

export async function apiPlugin(app: FastifyInstance, opts: ApiPluginOptions) {
  await app.register(helmet);

  await app.register(cors, {
    origin: opts.allowedOrigins?.length ? opts.allowedOrigins : '*',
    credentials: true,
  });

  await app.register(rateLimit, {
    max: opts.rateLimitMax ?? 100,
    timeWindow: '15 minutes',
    errorResponseBuilder: () => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: 'Too many requests from this IP, please try again later',
    }),
  });

  await app.register(fastifyCookie);

  // identities are opaque: whoever sends the header or cookie acts as that participant
  app.decorateRequest('participantId', null);
  app.addHook('onRequest', async (req) => {
    req.participantId = resolveParticipant(req.headers[PARTICIPANT_HEADER], req.cookies[PARTICIPANT_COOKIE]);
  });

  await app.register(auctionRoutes, { service: opts.service });
  await app.register(accountsRoutes, { service: opts.service });
}
