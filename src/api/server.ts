import Fastify, { type FastifyError, type FastifyReply, type FastifyRequest } from 'fastify';
import type { LoggerOptions } from 'pino';
import { Readable } from 'stream';
import type { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { HealthResponseSchema, ObjectQuerySchema, type ErrorResponse } from './schemas';
import type { GatewayPipeline } from './pipeline';
import { securityHeadersHook } from './hooks/security-headers';
import { HEALTH_ROUTE, SECURITY_HEADERS } from '../config/auth';
import type { RateLimiter } from '../utils/ratelimit';

export interface ServerDeps {
  pipeline: GatewayPipeline;
  rateLimiter: RateLimiter;
  /** Fastify's pino logger settings; false silences it */
  logger?: LoggerOptions | boolean;
}

function frameworkStatus(error: FastifyError): number {
  return error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;
}

function errorBody(status: number, message: string): string {
  const body: ErrorResponse = { error: message, status };
  return JSON.stringify(body);
}

/**
 * Build the gateway HTTP server. Does not listen.
 */
export function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: deps.logger ?? true,
    // Router-level failures skip hooks and the error handler, so headers are set here
    frameworkErrors: (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const status = error.code === 'FST_ERR_BAD_URL' ? 400 : frameworkStatus(error);
      const message =
        error.code === 'FST_ERR_BAD_URL'
          ? 'Invalid path format'
          : status >= 500
            ? 'Internal server error'
            : error.message;
      request.log.warn({ code: error.code, status }, message);
      reply
        .code(status)
        .headers({ ...SECURITY_HEADERS, 'content-type': 'application/json; charset=utf-8' })
        .send(errorBody(status, message));
    },
  }).withTypeProvider<TypeBoxTypeProvider>();

  // Object bodies are forwarded untouched whatever their content type
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', (_request, payload, done) => {
    done(null, payload);
  });

  // Security headers also on responses that never reach the pipeline
  app.addHook('onSend', securityHeadersHook);

  app.addHook('onClose', async () => {
    await deps.rateLimiter.close();
  });

  app.setNotFoundHandler(async (_request, reply) => {
    return reply
      .code(404)
      .header('content-type', 'application/json; charset=utf-8')
      .send(errorBody(404, 'Not Found'));
  });

  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    const status = frameworkStatus(error);
    if (status >= 500) {
      request.log.error({ err: error }, 'Unhandled request error');
    }
    return reply
      .code(status)
      .header('content-type', 'application/json; charset=utf-8')
      .send(errorBody(status, status >= 500 ? 'Internal server error' : error.message));
  });

  /**
   * GET /_health - Liveness check, no credentials required
   */
  app.get(
    HEALTH_ROUTE,
    { schema: { response: { 200: HealthResponseSchema } } },
    async () => ({ status: 'ok' as const })
  );

  /**
   * GET /{bucket}            - List objects (optional ?prefix=)
   * GET /{bucket}/{key...}   - Fetch an object
   * PUT /{bucket}/{key...}   - Store an object
   *
   * Path parsing, credentials, rate limiting and authorization all
   * happen in the pipeline, in that order.
   */
  app.route({
    method: ['GET', 'PUT'],
    url: '/*',
    exposeHeadRoute: false,
    schema: {
      querystring: ObjectQuerySchema,
    },
    handler: async (request, reply) => {
      const body =
        request.body instanceof Readable || Buffer.isBuffer(request.body) ? request.body : undefined;

      const response = await deps.pipeline.handle(
        {
          method: request.method,
          path: request.url.split('?')[0],
          prefix: firstValue(request.query.prefix),
          headers: request.headers,
          body,
        },
        request.log
      );

      reply.code(response.status).headers(response.headers);
      return reply.send(response.body);
    },
  });

  return app;
}

/** Repeated query parameters arrive as arrays; only the first counts */
function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export type GatewayServer = ReturnType<typeof buildServer>;
