/**
 * Workflow endpoints
 *
 * - `POST /workflow/run`: concatenate components and inline code, execute
 * - `POST /workflow/generate-script`: manifest + component source → script text
 * - `POST /workflow/export`: stored components + bindings → script download
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { assembleScript } from '../../generator/assembler.js';
import { parseManifest } from '../../manifest/schema.js';
import type { TExecutionResult } from '../../executor/types.js';
import { buildManifestFromComponents, resolveWorkflowItems, type TResolvedItem } from '../../workflow/resolver.js';
import { ComponentEntrySchema, WorkflowItemsSchema } from '../../workflow/schema.js';
import type { ServerDeps } from '../types.js';

const RunBodySchema = z.object({
  items: WorkflowItemsSchema,
});

const GenerateScriptBodySchema = z.object({
  workflow: z.unknown(),
  code: z.string(),
  strict: z.boolean().default(false),
});

const ExportBodySchema = z.object({
  components: z.array(ComponentEntrySchema).min(1, 'At least one component is required'),
  filename: z
    .string()
    .regex(/^[A-Za-z0-9_.-]+\.py$/, 'Filename must be a plain name ending in .py')
    .default('pipeline.py'),
  strict: z.boolean().default(false),
});

export interface RunResponse {
  message: string;
  totalItems: number;
  concatenatedCode: string;
  components: TResolvedItem[];
  execution: TExecutionResult;
}

export const workflowRoutes: FastifyPluginAsync<ServerDeps> = async (app, deps) => {
  const { store, executor, now } = deps;

  app.post('/workflow/run', async (request, reply): Promise<RunResponse> => {
    const { items } = RunBodySchema.parse(request.body);
    const resolved = await resolveWorkflowItems(items, store);

    const controller = new AbortController();
    // Client went away before the response was written: stop the container
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    const execution = await executor.execute(resolved.code, { signal: controller.signal });
    if (execution.error) {
      request.log.warn({ error: execution.error }, 'workflow execution failed');
    }

    // A failed script is still a successful request; the failure is in the body
    return {
      message: execution.error ? 'Code execution failed' : 'Code executed successfully',
      totalItems: items.length,
      concatenatedCode: resolved.code,
      components: resolved.items,
      execution,
    };
  });

  app.post('/workflow/generate-script', async (request) => {
    const body = GenerateScriptBodySchema.parse(request.body);
    const manifest = parseManifest(body.workflow);
    const script = assembleScript(manifest, body.code, { now, strict: body.strict });
    return { message: 'Script generated successfully', nodeCount: manifest.nodes.length, script };
  });

  app.post('/workflow/export', async (request, reply) => {
    const body = ExportBodySchema.parse(request.body);
    const { manifest, bodyText } = await buildManifestFromComponents(body.components, store, {
      exportedAt: (now ?? (() => new Date()))().toISOString(),
    });
    const script = assembleScript(manifest, bodyText, { now, strict: body.strict });

    reply
      .header('Content-Type', 'text/x-python; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${body.filename}"`);
    return script;
  });
};
