import type { HealthCheckResult, ReadinessStatus } from './types.js';

/**
 * A checker that throws counts as a critical failure.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] =>
  results.map((result) =>
    result.status === 'fulfilled'
      ? result.value
      : {
          name: 'unknown',
          status: 'unhealthy',
          message: result.reason instanceof Error ? result.reason.message : 'Check failed',
          critical: true,
        }
  );

/**
 * unhealthy if a critical check failed, degraded if only optional ones did.
 */
export const determineReadinessStatus = (checks: HealthCheckResult[]): ReadinessStatus => {
  const failed = checks.filter((check) => check.status === 'unhealthy');
  if (failed.some((check) => check.critical !== false)) {
    return 'unhealthy';
  }
  return failed.length > 0 ? 'degraded' : 'ok';
};
