/**
 * Shared helpers for route tests: an app over a fresh store with a
 * deterministic clock.
 */

import { createApp } from './app';
import type { AppDeps } from './app';
import type { Clock } from './clock';
import { loadConfig } from './config';
import { MemoryStore } from './store';

export const START = Date.parse('2025-01-01T00:00:00.000Z');

/** Advances one second on every call, starting at START. */
export const tickingClock = (start = START): Clock => {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
};

export const isoAt = (seconds: number): string => new Date(START + 1000 * seconds).toISOString();

export const createTestApp = (overrides: Partial<AppDeps> = {}) => {
  const store = overrides.store ?? new MemoryStore();
  const app = createApp({
    config: loadConfig({ NODE_ENV: 'test' }),
    clock: tickingClock(),
    ...overrides,
    store
  });
  return { app, store };
};

export const kyusuPayload = {
  name: 'My Kyusu',
  material: 'clay',
  capacityMl: 350,
  style: 'kyusu'
};

export const senchaPayload = {
  name: 'Sencha',
  type: 'green',
  origin: 'Shizuoka',
  caffeineLevel: 'medium',
  steepTempCelsius: 75,
  steepTimeSeconds: 60
};
