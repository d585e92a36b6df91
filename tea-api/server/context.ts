import type { Clock } from './clock';
import type { AppConfig } from './config';
import type { ReadinessCheck } from './health';
import type { MemoryStore } from './store';

/** Everything a router needs, built once per app. */
export interface AppContext {
  config: AppConfig;
  store: MemoryStore;
  clock: Clock;
  readinessChecks: ReadinessCheck[];
}
