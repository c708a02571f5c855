/**
 * Health module exports
 */

export { makeHealthRoutes, type HealthRoutesDeps } from './shell/rest/routes.js';
export {
  makeProgressStoreHealthChecker,
  type ProgressStoreCheckerOptions,
} from './shell/checkers/progress-store-checker.js';
export { getReadiness, overallStatus } from './core/usecases/get-readiness.js';

export type {
  HealthChecker,
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
} from './core/types.js';
