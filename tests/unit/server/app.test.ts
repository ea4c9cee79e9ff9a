/**
 * Tests for the HTTP API, driven through Fastify's inject so no port is opened
 */

import type { FastifyInstance } from 'fastify';
import type { Mock } from 'vitest';
import type { ScriptExecutor, TExecuteOptions, TExecutionResult } from '../../../src/executor/types.js';
import { buildApp, API_PREFIX } from '../../../src/server/app.js';
import { InMemoryComponentStore } from '../../../src/store/memory-store.js';
import { createComponentData, FIXED_NOW, fixedClock } from '../../helpers/pipeline-fixtures.js';

const SCALER_CODE = 'def standard_scaler(df):\n    return df\n';

type ExecuteFn = (script: string, options?: TExecuteOptions) => Promise<TExecutionResult>;

let app: FastifyInstance;
let store: InMemoryComponentStore;
let execute: Mock<ExecuteFn>;

beforeEach(async () => {
  let nextId = 0;
  store = new InMemoryComponentStore({ generateId: () => `c${++nextId}`, now: fixedClock });
  execute = vi.fn<ExecuteFn>(async () => ({ output: 'ran\n' }));
  const executor: ScriptExecutor = { execute };
  app = await buildApp({ store, executor, now: fixedClock, corsOrigin: '*' });
});

afterEach(async () => {
  await app.close();
});

describe('health', () => {
  it('should report ok with the injected clock', async () => {
    const response = await app.inject({ method: 'GET', url: `${API_PREFIX}/health` });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ok');
    expect(body.timestamp).toBe(FIXED_NOW.toISOString());
    expect(typeof body.uptime).toBe('number');
  });
});

describe('components', () => {
  it('should create a component and return it with server fields', async () => {
    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/components`,
      payload: createComponentData({ code: SCALER_CODE }),
    });

    expect(response.statusCode).toBe(201);
    const body = response.json();
    expect(body.message).toBe('Component created successfully');
    expect(body.component.id).toBe('c1');
    expect(body.component.createdAt).toBe(FIXED_NOW.toISOString());
  });

  it('should reject invalid component data with every problem listed', async () => {
    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/components`,
      payload: createComponentData({ name: '', inputs: [] }),
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'name: Name is required; inputs: Component must have at least one input',
    });
  });

  it('should filter and paginate the component list', async () => {
    await store.create(createComponentData({ name: 'A' }));
    await store.create(createComponentData({ name: 'B', stage: 'stage2' }));
    await store.create(createComponentData({ name: 'C' }));

    const response = await app.inject({
      method: 'GET',
      url: `${API_PREFIX}/components?stage=stage1&limit=1&offset=1`,
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.count).toBe(1);
    expect(body.total).toBe(2);
    expect(body.components[0].name).toBe('A');
  });

  it('should filter on whether a component has a usable output', async () => {
    await store.create(createComponentData({ name: 'Plotter', output: { type: 'none' } }));
    await store.create(createComponentData({ name: 'Scaler' }));

    const response = await app.inject({ method: 'GET', url: `${API_PREFIX}/components?has_output=false` });
    expect(response.json().components.map((c: { name: string }) => c.name)).toEqual(['Plotter']);
  });

  it('should reject an unknown stage filter', async () => {
    const response = await app.inject({ method: 'GET', url: `${API_PREFIX}/components?stage=stage9` });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'stage: Invalid stage. Must be stage1, stage2, stage3, or stage4' });
  });

  it('should search names case-insensitively and require a name', async () => {
    await store.create(createComponentData({ name: 'Standard Scaler' }));
    await store.create(createComponentData({ name: 'Random Forest' }));

    const found = await app.inject({ method: 'GET', url: `${API_PREFIX}/components/search?name=SCAL` });
    expect(found.json().components.map((c: { name: string }) => c.name)).toEqual(['Standard Scaler']);

    const missing = await app.inject({ method: 'GET', url: `${API_PREFIX}/components/search` });
    expect(missing.statusCode).toBe(400);
    expect(missing.json()).toEqual({ error: 'Name query parameter is required' });
  });

  it('should count components per stage', async () => {
    await store.create(createComponentData({ stage: 'stage3' }));
    await store.create(createComponentData({ stage: 'stage1' }));
    await store.create(createComponentData({ stage: 'stage3' }));

    const response = await app.inject({ method: 'GET', url: `${API_PREFIX}/components/stats` });
    expect(response.json()).toEqual({
      stats: [
        { stage: 'stage1', count: 1 },
        { stage: 'stage3', count: 2 },
      ],
    });
  });

  it('should get, update and delete by id', async () => {
    await store.create(createComponentData());

    const fetched = await app.inject({ method: 'GET', url: `${API_PREFIX}/components/c1` });
    expect(fetched.json().name).toBe('Standard Scaler');

    const updated = await app.inject({
      method: 'PUT',
      url: `${API_PREFIX}/components/c1`,
      payload: createComponentData({ name: 'Robust Scaler' }),
    });
    expect(updated.json().message).toBe('Component updated successfully');
    expect(updated.json().component.name).toBe('Robust Scaler');

    const deleted = await app.inject({ method: 'DELETE', url: `${API_PREFIX}/components/c1` });
    expect(deleted.json()).toEqual({ message: 'Component deleted successfully', id: 'c1' });

    const gone = await app.inject({ method: 'GET', url: `${API_PREFIX}/components/c1` });
    expect(gone.statusCode).toBe(404);
    expect(gone.json()).toEqual({ error: 'Component not found' });
  });

  it('should 404 updates and deletes of unknown ids', async () => {
    const update = await app.inject({
      method: 'PUT',
      url: `${API_PREFIX}/components/nope`,
      payload: createComponentData(),
    });
    const remove = await app.inject({ method: 'DELETE', url: `${API_PREFIX}/components/nope` });

    expect(update.statusCode).toBe(404);
    expect(remove.statusCode).toBe(404);
  });
});

describe('stages', () => {
  it('should list the components of one stage', async () => {
    await store.create(createComponentData({ name: 'Forest', stage: 'stage3' }));
    await store.create(createComponentData({ name: 'Scaler' }));

    const response = await app.inject({ method: 'GET', url: `${API_PREFIX}/stages/stage3/components` });
    const body = response.json();
    expect(body.stage).toBe('stage3');
    expect(body.count).toBe(1);
    expect(body.components[0].name).toBe('Forest');
  });

  it('should reject an invalid stage name', async () => {
    const response = await app.inject({ method: 'GET', url: `${API_PREFIX}/stages/stage0/components` });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Invalid stage. Must be stage1, stage2, stage3, or stage4' });
  });
});

describe('workflow', () => {
  it('should execute concatenated code and report the items', async () => {
    await store.create(createComponentData({ code: SCALER_CODE }));

    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/workflow/run`,
      payload: {
        items: [
          { type: 'id', value: 'c1' },
          { type: 'code', value: 'print(1)' },
        ],
      },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.message).toBe('Code executed successfully');
    expect(body.totalItems).toBe(2);
    expect(body.concatenatedCode).toBe(`${SCALER_CODE}\n\nprint(1)`);
    expect(body.components.map((item: { type: string }) => item.type)).toEqual(['component', 'raw_code']);
    expect(body.execution).toEqual({ output: 'ran\n' });
    expect(execute.mock.calls[0][0]).toBe(`${SCALER_CODE}\n\nprint(1)`);
  });

  it('should answer 200 with the failure when the script fails', async () => {
    execute.mockResolvedValueOnce({ output: 'Traceback', error: 'execution error: exit status 1' });

    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/workflow/run`,
      payload: { items: [{ type: 'code', value: 'raise Exception()' }] },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().message).toBe('Code execution failed');
    expect(response.json().execution.error).toBe('execution error: exit status 1');
  });

  it('should 404 a run that references a missing component', async () => {
    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/workflow/run`,
      payload: { items: [{ type: 'id', value: 'ghost' }] },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Component not found at index 0: ghost' });
    expect(execute).not.toHaveBeenCalled();
  });

  it('should reject an empty item list', async () => {
    const response = await app.inject({ method: 'POST', url: `${API_PREFIX}/workflow/run`, payload: { items: [] } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'items: At least one workflow item is required' });
  });

  it('should generate a script from a manifest and component code', async () => {
    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/workflow/generate-script`,
      payload: {
        workflow: { version: '1.0', nodes: [{ id: 'n1', name: 'Standard Scaler', stage: 1 }] },
        code: SCALER_CODE,
        strict: true,
      },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.message).toBe('Script generated successfully');
    expect(body.nodeCount).toBe(1);
    expect(body.script.split('\n')[3]).toBe('Generated at: 2024-01-02T03:04:05.000Z');
    expect(body.script).toContain('        result = standard_scaler(current_data)\n');
  });

  it('should report undefined functions in strict mode as a bad request', async () => {
    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/workflow/generate-script`,
      payload: {
        workflow: { nodes: [{ name: 'Standard Scaler' }] },
        code: 'x = 1\n',
        strict: true,
      },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Component code does not define: standard_scaler' });
  });

  it('should reject a manifest with dict bindings', async () => {
    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/workflow/generate-script`,
      payload: { workflow: { nodes: [{ name: 'Scale', variables: { opts: { a: 1 } } }] }, code: '' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toContain('Invalid workflow manifest:');
  });

  it('should export stored components as a script download', async () => {
    await store.create(createComponentData({ code: SCALER_CODE }));

    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/workflow/export`,
      payload: { components: [{ componentId: 'c1', variables: { with_mean: false } }], filename: 'scale.py' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/x-python; charset=utf-8');
    expect(response.headers['content-disposition']).toBe('attachment; filename="scale.py"');
    expect(response.body).toContain('Exported at: 2024-01-02T03:04:05.000Z\n');
    expect(response.body).toContain('        result = standard_scaler(current_data, with_mean=False)\n');
  });

  it('should reject export file names with a path', async () => {
    await store.create(createComponentData());

    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/workflow/export`,
      payload: { components: [{ componentId: 'c1' }], filename: '../evil.py' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'filename: Filename must be a plain name ending in .py' });
  });
});

describe('routing', () => {
  it('should answer unknown routes with a JSON 404', async () => {
    const response = await app.inject({ method: 'GET', url: '/nowhere' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Route GET /nowhere not found' });
  });

  it('should reject malformed JSON bodies as a client error', async () => {
    const response = await app.inject({
      method: 'POST',
      url: `${API_PREFIX}/components`,
      headers: { 'content-type': 'application/json' },
      payload: '{"name":',
    });

    expect(response.statusCode).toBe(400);
  });
});
