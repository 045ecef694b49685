import { type FastifyReply } from 'fastify';

export type ApiErrorBody = {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
};

export function sendError(
  reply: FastifyReply,
  statusCode: number,
  error: string,
  message: string,
  details?: unknown
) {
  const body: ApiErrorBody = { statusCode, error, message };
  if (details !== undefined) body.details = details;
  return reply.status(statusCode).send(body);
}

export function sendApiError(reply: FastifyReply, err: ApiErrorBody) {
  return sendError(reply, err.statusCode, err.error, err.message, err.details);
}

export function isApiError(x: object): x is ApiErrorBody {
  return 'statusCode' in x && 'error' in x && 'message' in x;
}
