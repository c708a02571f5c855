/**
 * Progress store health checker
 *
 * Reads the progress record through the store. A missing file is healthy
 * (it is created on first save); an unreadable or corrupt one is not.
 */

import type { ProgressStore } from '../../../gamification/core/ports.js';
import type { HealthChecker, HealthCheckResult } from '../../core/types.js';

export interface ProgressStoreCheckerOptions {
  name?: string;
}

export const makeProgressStoreHealthChecker = (
  store: ProgressStore,
  options: ProgressStoreCheckerOptions = {}
): HealthChecker => {
  const name = options.name ?? 'progress-store';

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    const loaded = store.load();
    const latencyMs = Date.now() - startTime;

    if (loaded.isErr()) {
      return {
        name,
        status: 'unhealthy',
        message: loaded.error.message,
        latencyMs,
        critical: true,
      };
    }

    return { name, status: 'healthy', latencyMs, critical: true };
  };
};
