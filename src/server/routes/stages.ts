import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ComponentStageSchema } from '../../store/schema.js';
import type { ComponentStore, TComponentRecord, TComponentStage } from '../../store/types.js';
import { HttpError } from '../errors.js';

const StageParamsSchema = z.object({ stage: z.string() });

export const stageRoutes: FastifyPluginAsync<{ store: ComponentStore }> = async (app, { store }) => {
  app.get(
    '/stages/:stage/components',
    async (request): Promise<{ stage: TComponentStage; count: number; components: TComponentRecord[] }> => {
      const { stage: raw } = StageParamsSchema.parse(request.params);
      const stage = ComponentStageSchema.safeParse(raw);
      if (!stage.success) {
        throw new HttpError(400, 'Invalid stage. Must be stage1, stage2, stage3, or stage4');
      }
      const components = await store.findByStage(stage.data);
      return { stage: stage.data, count: components.length, components };
    }
  );
};
