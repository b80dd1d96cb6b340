import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';
import { toHttpError } from '../domain/errors';
import type { ErrorCode } from '../domain/errors';

export function invalidInput(reply: FastifyReply, error: ZodError) {
  const issue = error.issues[0];
  const field = issue?.path?.join('.') || 'unknown';
  return reply.status(400).send({
    error: 'invalid_input',
    detail: `${field}: ${issue?.message || 'Invalid value'}`,
  });
}

export function sendFailure(
  reply: FastifyReply,
  errorCode: ErrorCode,
  detail: string,
  extra: Record<string, unknown> = {}
) {
  const http = toHttpError(errorCode);
  return reply.status(http.statusCode).send({ error: http.code, detail, ...extra });
}

export function idempotencyKeyOf(req: FastifyRequest): string | undefined {
  const header = req.headers['idempotency-key'];
  const key = Array.isArray(header) ? header[0] : header;
  return key?.trim() || undefined;
}
