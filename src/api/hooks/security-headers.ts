/**
 * Security Headers Hook
 *
 * Fastify onSend hook that stamps the security header set on every
 * response, including those Fastify produces itself (404s, parser
 * errors) which never pass through the pipeline.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { SECURITY_HEADERS } from '../../config/auth';

export async function securityHeadersHook(
  _request: FastifyRequest,
  reply: FastifyReply,
  payload: unknown
): Promise<unknown> {
  reply.headers(SECURITY_HEADERS);
  return payload;
}
