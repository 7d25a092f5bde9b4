import type { HealthCheckResult } from './types.js';

export type HealthChecker = () => Promise<HealthCheckResult>;
