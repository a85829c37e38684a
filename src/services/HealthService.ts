/**
 * Liveness and readiness. Readiness runs each named dependency check; any
 * failure marks the service degraded.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { HealthResponse } from '../types/api.js';

export type HealthCheck = () => Promise<unknown>;

export class HealthService {
  constructor(
    private readonly checks: Record<string, HealthCheck>,
    private readonly logProvider: ILogProvider
  ) {}

  live(): HealthResponse {
    return { status: 'ok' };
  }

  async ready(): Promise<HealthResponse> {
    const names = Object.keys(this.checks);
    const results = await Promise.allSettled(names.map((name) => this.checks[name]()));

    const checks: Record<string, 'ok' | 'error'> = {};
    results.forEach((result, i) => {
      const name = names[i];
      if (result.status === 'fulfilled') {
        checks[name] = 'ok';
        return;
      }
      checks[name] = 'error';
      this.logProvider.warn('Readiness check failed', {
        check: name,
        error: result.reason instanceof Error ? result.reason.message : String(result.reason),
      });
    });

    const degraded = Object.values(checks).includes('error');
    return { status: degraded ? 'degraded' : 'ok', checks };
  }
}
