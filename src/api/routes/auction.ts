import { type TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { type FastifyInstance } from 'fastify';

import { BidBody, ClaimKindParam, EventsQuery, ParticipantIdParam } from '../schemas';
import type { AuctionService } from '../../modules/auction/service';
import { isApiError, sendApiError, sendError } from '../../shared/http';

export type AuctionRoutesOptions = {
  service: AuctionService;
};

export async function auctionRoutes(fastify: FastifyInstance, opts: AuctionRoutesOptions) {
  const { service } = opts;
  const app = fastify.withTypeProvider<TypeBoxTypeProvider>();

  // GET /api/auction - snapshot plus ended/timeLeft
  app.get('/auction', async (_req, reply) => {
    return reply.send(service.view());
  });

  app.get('/auction/bids', async (_req, reply) => {
    return reply.send({ bids: service.bids() });
  });

  app.get(
    '/auction/participants/:participantId',
    { schema: { params: ParticipantIdParam } },
    async (req, reply) => {
      return reply.send(service.participant(req.params.participantId));
    }
  );

  app.get(
    '/auction/events',
    { schema: { querystring: EventsQuery } },
    async (req, reply) => {
      return reply.send({ events: service.events(req.query.since) });
    }
  );

  // POST /api/auction/bid - stake goes to escrow, previous leader gets refunded
  app.post(
    '/auction/bid',
    {
      schema: { body: BidBody },
      config: {
        rateLimit: {
          max: 20,
          timeWindow: '1 minute',
        },
      },
    },
    async (req, reply) => {
      const participantId = req.participantId;
      if (!participantId) return sendError(reply, 401, 'Unauthorized', 'not authenticated');

      const res = await service.placeBid(participantId, req.body.amount);
      if (isApiError(res)) return sendApiError(reply, res);
      return reply.send(res);
    }
  );

  app.post('/auction/finalize', async (_req, reply) => {
    const res = await service.finalize();
    if (isApiError(res)) return sendApiError(reply, res);
    return reply.send(res);
  });

  app.post(
    '/auction/claims/:kind',
    { schema: { params: ClaimKindParam } },
    async (req, reply) => {
      const participantId = req.participantId;
      if (!participantId) return sendError(reply, 401, 'Unauthorized', 'not authenticated');

      const res = await service.claim(req.params.kind, participantId);
      if (isApiError(res)) return sendApiError(reply, res);
      return reply.send(res);
    }
  );
}
