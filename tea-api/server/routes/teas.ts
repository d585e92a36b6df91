import { randomUUID } from 'crypto';

import { Router } from 'express';

import { CreateTeaSchema, PatchTeaSchema, TeaQuerySchema, UpdateTeaSchema } from '../../../shared/types';
import type { Tea } from '../../../shared/types';
import { TEA_ALIASES, serializeTea } from '../../../shared/wire';
import { nextUpdatedAt } from '../clock';
import type { AppContext } from '../context';
import { NotFoundError } from '../errors';
import logger from '../logger';
import { paginate } from '../pagination';
import { parseBody, parseQuery } from '../validation';

export const teaRouter = ({ store, clock }: AppContext): Router => {
  const router = Router();

  const findTea = (id: string): Tea => {
    const tea = store.get('teas', id);
    if (!tea) {
      logger.warn(`Tea not found: id ${id}`);
      throw new NotFoundError('Tea');
    }
    return tea;
  };

  router.get('/', (req, res) => {
    const query = parseQuery(TeaQuerySchema, TEA_ALIASES, req.query);
    const filters = { type: query.type, caffeine_level: query.caffeine_level };
    const page = store.list('teas', filters, query.page, query.limit);
    res.json(paginate(page, query, serializeTea));
  });

  router.post('/', (req, res) => {
    const data = parseBody(CreateTeaSchema, TEA_ALIASES, req.body);
    const now = clock();
    const tea: Tea = { id: randomUUID(), ...data, created_at: now, updated_at: now };

    store.create('teas', tea);
    logger.info(`Tea created - id: ${tea.id}, name: "${tea.name}"`);
    res.status(201).json(serializeTea(tea));
  });

  router.get('/:id', (req, res) => {
    res.json(serializeTea(findTea(req.params.id)));
  });

  router.put('/:id', (req, res) => {
    const existing = findTea(req.params.id);
    const data = parseBody(UpdateTeaSchema, TEA_ALIASES, req.body);
    const tea: Tea = {
      id: existing.id,
      ...data,
      created_at: existing.created_at,
      updated_at: nextUpdatedAt(existing.updated_at, clock)
    };

    store.update('teas', tea);
    logger.info(`Tea replaced - id: ${tea.id}, name: "${tea.name}"`);
    res.json(serializeTea(tea));
  });

  router.patch('/:id', (req, res) => {
    const existing = findTea(req.params.id);
    const changes = parseBody(PatchTeaSchema, TEA_ALIASES, req.body);
    const tea: Tea = { ...existing, ...changes, updated_at: nextUpdatedAt(existing.updated_at, clock) };

    store.update('teas', tea);
    logger.info(`Tea updated - id: ${tea.id}, fields: ${Object.keys(changes).join(', ') || 'none'}`);
    res.json(serializeTea(tea));
  });

  router.delete('/:id', (req, res) => {
    const { id } = req.params;
    if (!store.delete('teas', id)) {
      logger.warn(`Delete failed - tea not found: id ${id}`);
      throw new NotFoundError('Tea');
    }
    logger.info(`Tea deleted - id: ${id}`);
    res.status(204).send();
  });

  return router;
};
