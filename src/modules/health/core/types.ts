import { Type, type Static } from '@sinclair/typebox';

/**
 * Result of a single dependency check
 */
export const HealthCheckResultSchema = Type.Object({
  name: Type.String({ description: 'Checked component' }),
  status: Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]),
  message: Type.Optional(Type.String()),
  latencyMs: Type.Optional(Type.Number()),
  /** Unhealthy critical checks fail readiness; others only degrade it */
  critical: Type.Optional(Type.Boolean()),
});

export type HealthCheckResult = Static<typeof HealthCheckResultSchema>;

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
  uptime: Type.Number({ description: 'Seconds since the routes were registered' }),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessResponseSchema = Type.Object({
  status: Type.Union([Type.Literal('ok'), Type.Literal('degraded'), Type.Literal('unhealthy')]),
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Seconds since the routes were registered' }),
  checks: Type.Array(HealthCheckResultSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;

export type HealthChecker = () => Promise<HealthCheckResult>;
