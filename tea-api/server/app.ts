/**
 * Express application factory. The store is created here (or injected by
 * tests) and handed to every router; there is no module-level state.
 */

import cors from 'cors';
import express from 'express';
import type { Express } from 'express';

import { systemClock } from './clock';
import type { Clock } from './clock';
import type { AppConfig } from './config';
import type { AppContext } from './context';
import { memoryCheck, storeCheck } from './health';
import type { ReadinessCheck } from './health';
import { errorHandler, notFoundHandler, requestLogger } from './middleware';
import { brewRouter } from './routes/brews';
import { healthRouter } from './routes/health';
import { teaRouter } from './routes/teas';
import { teapotRouter } from './routes/teapots';
import { MemoryStore } from './store';

export interface AppDeps {
  config: AppConfig;
  store?: MemoryStore;
  clock?: Clock;
  readinessChecks?: ReadinessCheck[];
}

export const createApp = (deps: AppDeps): Express => {
  const store = deps.store ?? new MemoryStore();
  const context: AppContext = {
    config: deps.config,
    store,
    clock: deps.clock ?? systemClock,
    readinessChecks: deps.readinessChecks ?? [memoryCheck(deps.config.memoryThreshold), storeCheck(store)]
  };

  const app = express();

  app.use(cors({
    origin: deps.config.allowedOrigins,
    methods: ['GET', 'POST', 'DELETE', 'PATCH', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type']
  }));
  app.use(express.json());
  app.use(requestLogger(deps.config.slowRequestMs));

  app.use(healthRouter(context));
  app.use('/teapots', teapotRouter(context));
  app.use('/teas', teaRouter(context));
  app.use('/brews', brewRouter(context));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
