import { randomUUID } from 'crypto';

import { Router } from 'express';

import { DEFAULT_WATER_TEMP_CELSIUS } from '../../../shared/constants';
import {
  BrewQuerySchema,
  CreateBrewSchema,
  CreateSteepSchema,
  PageQuerySchema,
  PatchBrewSchema
} from '../../../shared/types';
import type { Brew, Steep } from '../../../shared/types';
import {
  BREW_ALIASES,
  NO_ALIASES,
  STEEP_ALIASES,
  serializeBrew,
  serializeBrewWithDetails,
  serializeSteep
} from '../../../shared/wire';
import { nextUpdatedAt } from '../clock';
import type { AppContext } from '../context';
import { NotFoundError } from '../errors';
import logger from '../logger';
import { paginate } from '../pagination';
import { parseBody, parseQuery } from '../validation';

export const brewRouter = ({ store, clock }: AppContext): Router => {
  const router = Router();

  const findBrew = (id: string): Brew => {
    const brew = store.get('brews', id);
    if (!brew) {
      logger.warn(`Brew not found: id ${id}`);
      throw new NotFoundError('Brew');
    }
    return brew;
  };

  router.get('/', (req, res) => {
    const query = parseQuery(BrewQuerySchema, BREW_ALIASES, req.query);
    const filters = { status: query.status, teapot_id: query.teapot_id, tea_id: query.tea_id };
    const page = store.list('brews', filters, query.page, query.limit);
    res.json(paginate(page, query, serializeBrew));
  });

  // teapotId and teaId are taken as given; a dangling reference is allowed
  router.post('/', (req, res) => {
    const data = parseBody(CreateBrewSchema, BREW_ALIASES, req.body);
    const tea = store.get('teas', data.tea_id);
    const now = clock();
    const brew: Brew = {
      id: randomUUID(),
      teapot_id: data.teapot_id,
      tea_id: data.tea_id,
      status: 'preparing',
      water_temp_celsius: data.water_temp_celsius ?? tea?.steep_temp_celsius ?? DEFAULT_WATER_TEMP_CELSIUS,
      notes: data.notes,
      started_at: now,
      completed_at: null,
      created_at: now,
      updated_at: now
    };

    store.create('brews', brew);
    logger.info(`Brew created - id: ${brew.id}, teapot: ${brew.teapot_id}, tea: ${brew.tea_id}`);
    res.status(201).json(serializeBrew(brew));
  });

  router.get('/:id', (req, res) => {
    res.json(serializeBrew(findBrew(req.params.id)));
  });

  router.get('/:id/details', (req, res) => {
    const brew = findBrew(req.params.id);
    const teapot = store.get('teapots', brew.teapot_id);
    const tea = store.get('teas', brew.tea_id);
    res.json(serializeBrewWithDetails(brew, teapot, tea));
  });

  router.patch('/:id', (req, res) => {
    const existing = findBrew(req.params.id);
    const changes = parseBody(PatchBrewSchema, BREW_ALIASES, req.body);
    const brew: Brew = { ...existing, ...changes, updated_at: nextUpdatedAt(existing.updated_at, clock) };

    store.update('brews', brew);
    logger.info(`Brew updated - id: ${brew.id}, status: ${brew.status}`);
    res.json(serializeBrew(brew));
  });

  // Removes the brew's steeps along with it
  router.delete('/:id', (req, res) => {
    const { id } = req.params;
    if (!store.delete('brews', id)) {
      logger.warn(`Delete failed - brew not found: id ${id}`);
      throw new NotFoundError('Brew');
    }
    logger.info(`Brew deleted - id: ${id}`);
    res.status(204).send();
  });

  router.get('/:id/steeps', (req, res) => {
    const brew = findBrew(req.params.id);
    const query = parseQuery(PageQuerySchema, NO_ALIASES, req.query);
    const page = store.list('steeps', { brew_id: brew.id }, query.page, query.limit);
    res.json(paginate(page, query, serializeSteep));
  });

  // The parent is checked before the body: an unknown brew is a 404 even for a bad payload
  router.post('/:id/steeps', (req, res) => {
    const brew = findBrew(req.params.id);
    const data = parseBody(CreateSteepSchema, STEEP_ALIASES, req.body);
    const steep: Steep = {
      id: randomUUID(),
      brew_id: brew.id,
      steep_number: store.nextSteepNumber(brew.id),
      ...data,
      created_at: clock()
    };

    store.create('steeps', steep);
    logger.info(`Steep recorded - brew: ${brew.id}, steep #${steep.steep_number}, ${steep.duration_seconds}s`);
    res.status(201).json(serializeSteep(steep));
  });

  return router;
};
