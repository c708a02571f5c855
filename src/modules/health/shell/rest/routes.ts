/**
 * Health routes for local tooling and process supervisors.
 *
 * GET /health/live answers as long as the process serves requests.
 * GET /health/ready runs the checkers and answers 503 once a critical one fails.
 * Neither reply may be cached; both report seconds since registration.
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

export interface HealthRoutesDeps extends GetReadinessDeps {
  /** Clock for uptime and timestamps */
  now?: () => Date;
}

const secondsBetween = (from: Date, to: Date): number =>
  Math.max(0, Math.floor((to.getTime() - from.getTime()) / 1000));

const statusCodeFor = (status: ReadinessResponse['status']): 200 | 503 =>
  status === 'unhealthy' ? 503 : 200;

export const makeHealthRoutes = (deps: HealthRoutesDeps): FastifyPluginAsync => {
  const now = deps.now ?? (() => new Date());
  const readiness: GetReadinessDeps = { checkers: deps.checkers, version: deps.version };

  return async (fastify) => {
    const registeredAt = now();

    fastify.addHook('onRequest', (_request, reply, done) => {
      reply.header('cache-control', 'no-store');
      done();
    });

    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async () => ({ status: 'ok' as const, uptime: secondsBetween(registeredAt, now()) })
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      { schema: { response: { 200: ReadinessResponseSchema, 503: ReadinessResponseSchema } } },
      async (_request, reply) => {
        const checkedAt = now();
        const response = await getReadiness(readiness, {
          uptime: secondsBetween(registeredAt, checkedAt),
          timestamp: checkedAt.toISOString(),
        });

        return reply.status(statusCodeFor(response.status)).send(response);
      }
    );
  };
};
