import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';

import { apiPlugin } from './api';
import type { AuctionService } from './modules/auction/service';
import { sendError } from './shared/http';
import { auctionTimeLeftSeconds, httpRequestDurationSeconds, registry } from './shared/metrics';

export type BuildAppOptions = {
  service: AuctionService;
  logger?: FastifyServerOptions['logger'];
  allowedOrigins?: string[];
  rateLimitMax?: number;
};

declare module 'fastify' {
  interface FastifyRequest {
    metricsStartNs?: bigint;
  }
}

export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger ?? true,
  });

  app.addHook('onRequest', async (req) => {
    req.metricsStartNs = process.hrtime.bigint();
  });

  app.addHook('onResponse', async (req, reply) => {
    const startNs = req.metricsStartNs;
    if (!startNs) return;
    const tookSeconds = Number(process.hrtime.bigint() - startNs) / 1e9;
    const route = req.routeOptions.url ?? 'unknown';
    httpRequestDurationSeconds.labels(req.method, route, String(reply.statusCode)).observe(tookSeconds);
  });

  app.get('/health', async () => {
    return { status: 'ok' };
  });

  app.get('/metrics', async (_req, reply) => {
    auctionTimeLeftSeconds.set(opts.service.auction.timeLeft());
    const body = await registry.metrics();
    return reply.header('content-type', registry.contentType).send(body);
  });

  app.setErrorHandler(async (err, req, reply) => {
    if (err.validation) {
      return sendError(reply, 400, 'BadRequest', 'validation failed', err.validation);
    }
    if (typeof err.statusCode === 'number' && err.statusCode < 500) {
      return sendError(reply, err.statusCode, err.code ?? err.name, err.message);
    }
    req.log.error({ err }, 'request failed');
    return sendError(reply, 500, 'InternalError', err.message);
  });

  await app.register(apiPlugin, {
    prefix: '/api',
    service: opts.service,
    allowedOrigins: opts.allowedOrigins,
    rateLimitMax: opts.rateLimitMax,
  });

  app.setNotFoundHandler(async (_req, reply) => {
    return sendError(reply, 404, 'NotFound', 'Route not found');
  });

  return app;
}
