import type { HealthChecker, HealthCheckResult, ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * A checker that rejects counts as a critical failure.
 */
const toCheckResult = (settled: PromiseSettledResult<HealthCheckResult>): HealthCheckResult => {
  if (settled.status === 'fulfilled') {
    return settled.value;
  }
  return {
    name: 'unknown',
    status: 'unhealthy',
    message: settled.reason instanceof Error ? settled.reason.message : 'Check failed',
    critical: true,
  };
};

/**
 * ok: every check healthy; degraded: only non-critical failures; unhealthy otherwise.
 */
export const overallStatus = (checks: HealthCheckResult[]): ReadinessResponse['status'] => {
  const failing = checks.filter((check) => check.status === 'unhealthy');
  if (failing.length === 0) {
    return 'ok';
  }
  return failing.some((check) => check.critical !== false) ? 'unhealthy' : 'degraded';
};

export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const settled = await Promise.allSettled(deps.checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: overallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(deps.version !== undefined && { version: deps.version }),
  };
}
