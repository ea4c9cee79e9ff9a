import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { validateComponentData } from '../../store/schema.js';
import type { ComponentStore, TComponentRecord } from '../../store/types.js';
import { HttpError } from '../errors.js';
import { ComponentListQuerySchema, paginate, toComponentFilter } from '../query.js';
import type { ComponentListResponse, StageStatsResponse } from '../types.js';

const IdParamsSchema = z.object({ id: z.string().min(1) });

const SearchQuerySchema = z.object({ name: z.string().optional() });

function notFound(): HttpError {
  return new HttpError(404, 'Component not found');
}

export const componentRoutes: FastifyPluginAsync<{ store: ComponentStore }> = async (app, { store }) => {
  app.get('/components', async (request): Promise<ComponentListResponse> => {
    const query = ComponentListQuerySchema.parse(request.query);
    const matches = await store.find(toComponentFilter(query));
    const components = paginate(matches, query.offset, query.limit);
    return { count: components.length, total: matches.length, components };
  });

  app.get('/components/search', async (request): Promise<ComponentListResponse> => {
    const { name } = SearchQuerySchema.parse(request.query);
    if (!name) {
      throw new HttpError(400, 'Name query parameter is required');
    }
    const components = await store.find({ nameContains: name });
    return { count: components.length, total: components.length, components };
  });

  app.get('/components/stats', async (): Promise<StageStatsResponse> => {
    return { stats: await store.stageStats() };
  });

  app.get('/components/:id', async (request): Promise<TComponentRecord> => {
    const { id } = IdParamsSchema.parse(request.params);
    const component = await store.findById(id);
    if (!component) throw notFound();
    return component;
  });

  app.post('/components', async (request, reply) => {
    const component = await store.create(validateComponentData(request.body));
    reply.status(201);
    return { message: 'Component created successfully', component };
  });

  app.put('/components/:id', async (request) => {
    const { id } = IdParamsSchema.parse(request.params);
    const component = await store.update(id, validateComponentData(request.body));
    if (!component) throw notFound();
    return { message: 'Component updated successfully', component };
  });

  app.delete('/components/:id', async (request) => {
    const { id } = IdParamsSchema.parse(request.params);
    if (!(await store.delete(id))) throw notFound();
    return { message: 'Component deleted successfully', id };
  });
};
