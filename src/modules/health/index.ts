/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';
export { makeDbHealthChecker, type DbHealthCheckerOptions } from './shell/checkers/db-checker.js';
export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';
export { mapCheckResults, determineReadinessStatus } from './core/logic.js';

export type { HealthChecker } from './core/ports.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
