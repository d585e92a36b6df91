/**
 * Readiness checks. Each check is synchronous and reports its own status;
 * a check that throws counts as down.
 */

import v8 from 'v8';

import { ENTITY_KINDS } from './store';
import type { MemoryStore } from './store';

export type HealthStatus = 'ok' | 'degraded' | 'down';

export interface CheckOutcome {
  status: HealthStatus;
  message?: string;
}

export interface CheckResult extends CheckOutcome {
  name: string;
  latencyMs?: number;
}

export interface ReadinessCheck {
  name: string;
  run: () => CheckOutcome;
}

export interface ReadinessReport {
  status: HealthStatus;
  checks: CheckResult[];
}

export const memoryCheck = (threshold: number): ReadinessCheck => ({
  name: 'memory',
  run: () => {
    const { used_heap_size: used, heap_size_limit: limit } = v8.getHeapStatistics();
    const ratio = used / limit;
    if (ratio >= threshold) {
      return { status: 'degraded', message: `Heap usage at ${Math.round(ratio * 100)}% of limit` };
    }
    return { status: 'ok' };
  }
});

export const storeCheck = (store: MemoryStore): ReadinessCheck => ({
  name: 'store',
  run: () => {
    const records = ENTITY_KINDS.reduce((sum, kind) => sum + store.count(kind), 0);
    return { status: 'ok', message: `${records} records held` };
  }
});

const runCheck = (check: ReadinessCheck): CheckResult => {
  const startTime = Date.now();
  try {
    const outcome = check.run();
    return { name: check.name, ...outcome, latencyMs: Date.now() - startTime };
  } catch (error) {
    return {
      name: check.name,
      status: 'down',
      latencyMs: Date.now() - startTime,
      message: error instanceof Error ? error.message : String(error)
    };
  }
};

export const runReadinessChecks = (checks: ReadinessCheck[]): ReadinessReport => {
  const results = checks.map(runCheck);
  const allOk = results.every((result) => result.status === 'ok');
  return { status: allOk ? 'ok' : 'degraded', checks: results };
};
