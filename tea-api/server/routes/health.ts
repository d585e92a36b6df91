import { Router } from 'express';

import type { AppContext } from '../context';
import { runReadinessChecks } from '../health';
import logger from '../logger';

export const TEAPOT_RESPONSE = {
  error: "I'm a teapot",
  message: 'This server is TIF-compliant and cannot brew coffee',
  spec: 'https://teapotframework.dev'
} as const;

export const healthRouter = ({ config, clock, readinessChecks }: AppContext): Router => {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: clock().toISOString(), version: config.apiVersion });
  });

  // Liveness: the process answers, nothing else is checked
  router.get('/health/live', (_req, res) => {
    res.json({ status: 'ok' });
  });

  router.get('/health/ready', (_req, res) => {
    const report = runReadinessChecks(readinessChecks);
    if (report.status !== 'ok') {
      const failing = report.checks.filter((check) => check.status !== 'ok').map((check) => check.name);
      logger.warn(`Readiness degraded - failing checks: ${failing.join(', ')}`);
    }
    res
      .status(report.status === 'ok' ? 200 : 503)
      .json({ status: report.status, timestamp: clock().toISOString(), checks: report.checks });
  });

  // Signature endpoint: always 418, whatever the method
  router.all('/brew', (_req, res) => {
    res.status(418).json(TEAPOT_RESPONSE);
  });

  return router;
};
