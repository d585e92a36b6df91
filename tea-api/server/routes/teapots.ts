import { randomUUID } from 'crypto';

import { Router } from 'express';

import {
  CreateTeapotSchema,
  PageQuerySchema,
  PatchTeapotSchema,
  TeapotQuerySchema,
  UpdateTeapotSchema
} from '../../../shared/types';
import type { Teapot } from '../../../shared/types';
import { NO_ALIASES, TEAPOT_ALIASES, serializeBrew, serializeTeapot } from '../../../shared/wire';
import { nextUpdatedAt } from '../clock';
import type { AppContext } from '../context';
import { NotFoundError } from '../errors';
import logger from '../logger';
import { paginate } from '../pagination';
import { parseBody, parseQuery } from '../validation';

export const teapotRouter = ({ store, clock }: AppContext): Router => {
  const router = Router();

  const findTeapot = (id: string): Teapot => {
    const teapot = store.get('teapots', id);
    if (!teapot) {
      logger.warn(`Teapot not found: id ${id}`);
      throw new NotFoundError('Teapot');
    }
    return teapot;
  };

  router.get('/', (req, res) => {
    const query = parseQuery(TeapotQuerySchema, TEAPOT_ALIASES, req.query);
    const page = store.list('teapots', { material: query.material, style: query.style }, query.page, query.limit);
    res.json(paginate(page, query, serializeTeapot));
  });

  router.post('/', (req, res) => {
    const data = parseBody(CreateTeapotSchema, TEAPOT_ALIASES, req.body);
    const now = clock();
    const teapot: Teapot = { id: randomUUID(), ...data, created_at: now, updated_at: now };

    store.create('teapots', teapot);
    logger.info(`Teapot created - id: ${teapot.id}, name: "${teapot.name}"`);
    res.status(201).json(serializeTeapot(teapot));
  });

  router.get('/:id', (req, res) => {
    res.json(serializeTeapot(findTeapot(req.params.id)));
  });

  router.put('/:id', (req, res) => {
    const existing = findTeapot(req.params.id);
    const data = parseBody(UpdateTeapotSchema, TEAPOT_ALIASES, req.body);
    const teapot: Teapot = {
      id: existing.id,
      ...data,
      created_at: existing.created_at,
      updated_at: nextUpdatedAt(existing.updated_at, clock)
    };

    store.update('teapots', teapot);
    logger.info(`Teapot replaced - id: ${teapot.id}, name: "${teapot.name}"`);
    res.json(serializeTeapot(teapot));
  });

  router.patch('/:id', (req, res) => {
    const existing = findTeapot(req.params.id);
    const changes = parseBody(PatchTeapotSchema, TEAPOT_ALIASES, req.body);
    const teapot: Teapot = { ...existing, ...changes, updated_at: nextUpdatedAt(existing.updated_at, clock) };

    store.update('teapots', teapot);
    logger.info(`Teapot updated - id: ${teapot.id}, fields: ${Object.keys(changes).join(', ') || 'none'}`);
    res.json(serializeTeapot(teapot));
  });

  router.delete('/:id', (req, res) => {
    const { id } = req.params;
    if (!store.delete('teapots', id)) {
      logger.warn(`Delete failed - teapot not found: id ${id}`);
      throw new NotFoundError('Teapot');
    }
    logger.info(`Teapot deleted - id: ${id}`);
    res.status(204).send();
  });

  router.get('/:id/brews', (req, res) => {
    const teapot = findTeapot(req.params.id);
    const query = parseQuery(PageQuerySchema, NO_ALIASES, req.query);
    const page = store.list('brews', { teapot_id: teapot.id }, query.page, query.limit);
    res.json(paginate(page, query, serializeBrew));
  });

  return router;
};
