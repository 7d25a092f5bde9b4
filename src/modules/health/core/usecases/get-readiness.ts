import { determineReadinessStatus, mapCheckResults } from '../logic.js';

import type { HealthChecker } from '../ports.js';
import type { ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * Runs every checker in parallel and aggregates their results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const results = await Promise.allSettled(deps.checkers.map((checker) => checker()));
  const checks = mapCheckResults(results);

  return {
    status: determineReadinessStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(deps.version !== undefined && { version: deps.version }),
  };
}
