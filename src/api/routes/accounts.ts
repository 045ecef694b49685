import { type TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { type FastifyInstance } from 'fastify';

import { DepositBody, SubjectIdParam } from '../schemas';
import type { AuctionService } from '../../modules/auction/service';
import { isApiError, sendApiError, sendError } from '../../shared/http';

export type AccountsRoutesOptions = {
  service: AuctionService;
};

export async function accountsRoutes(fastify: FastifyInstance, opts: AccountsRoutesOptions) {
  const { service } = opts;
  const app = fastify.withTypeProvider<TypeBoxTypeProvider>();

  app.get(
    '/accounts/:subjectId',
    { schema: { params: SubjectIdParam } },
    async (req, reply) => {
      const account = await service.getAccount(req.params.subjectId);
      if (!account) return sendError(reply, 404, 'NotFound', 'account not found');
      return reply.send(account);
    }
  );

  // POST /api/accounts/:subjectId/deposit - top up a balance (demo/testing)
  app.post(
    '/accounts/:subjectId/deposit',
    { schema: { params: SubjectIdParam, body: DepositBody } },
    async (req, reply) => {
      const headerTxId = req.headers['idempotency-key'];
      const txId = req.body.txId ?? (typeof headerTxId === 'string' ? headerTxId.trim() : undefined);
      try {
        const res = await service.deposit(req.params.subjectId, req.body.amount, txId || undefined);
        if (isApiError(res)) return sendApiError(reply, res);
        return reply.send({ account: res });
      } catch (e) {
        return sendError(reply, 400, 'BadRequest', e instanceof Error ? e.message : String(e));
      }
    }
  );
}
