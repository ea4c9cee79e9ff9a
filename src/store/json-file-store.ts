import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { formatIssues, wrapError } from '../utils/error-utils.js';
import { ComponentValidationError } from './errors.js';
import { InMemoryComponentStore, type TComponentStoreOptions } from './memory-store.js';
import { ComponentRecordSchema } from './schema.js';
import type { TComponentDataInput, TComponentRecord } from './types.js';

const StoreFileSchema = z.object({
  components: z.array(ComponentRecordSchema),
});

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readStoreFile(filePath: string): Promise<TComponentRecord[]> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) return [];
    throw wrapError(error, `Failed to read component store ${filePath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw wrapError(error, `Component store ${filePath} is not valid JSON`);
  }

  const parsed = StoreFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ComponentValidationError(
      formatIssues(parsed.error.issues).map((issue) => `${filePath}: ${issue}`)
    );
  }
  return parsed.data.components;
}

/**
 * Component store persisted to a single JSON file.
 *
 * The whole collection is rewritten after each mutation, via a temp file and
 * rename. Mutations are serialized so concurrent requests cannot interleave
 * writes. Suitable for single-process use only.
 */
export class JsonFileComponentStore extends InMemoryComponentStore {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    readonly filePath: string,
    options: TComponentStoreOptions,
    initial: readonly TComponentRecord[]
  ) {
    super(options, initial);
  }

  /**
   * Load the store from disk. A missing file yields an empty store; the file
   * is created on the first mutation.
   */
  static async open(filePath: string, options: TComponentStoreOptions = {}): Promise<JsonFileComponentStore> {
    const resolved = path.resolve(filePath);
    const records = await readStoreFile(resolved);
    return new JsonFileComponentStore(resolved, options, records);
  }

  override async create(input: TComponentDataInput): Promise<TComponentRecord> {
    const record = await super.create(input);
    await this.persistOrRestore(record.id, null);
    return record;
  }

  override async update(id: string, input: TComponentDataInput): Promise<TComponentRecord | null> {
    const previous = this.records.get(id) ?? null;
    const record = await super.update(id, input);
    if (record) await this.persistOrRestore(id, previous);
    return record;
  }

  override async delete(id: string): Promise<boolean> {
    const previous = this.records.get(id) ?? null;
    const deleted = await super.delete(id);
    if (deleted) await this.persistOrRestore(id, previous);
    return deleted;
  }

  /**
   * Persist, or put `previous` back under `id` when the write fails, so the
   * in-memory view never holds a change the file does not.
   */
  private async persistOrRestore(id: string, previous: TComponentRecord | null): Promise<void> {
    try {
      await this.persist();
    } catch (error) {
      if (previous) {
        this.records.set(id, previous);
      } else {
        this.records.delete(id);
      }
      throw error;
    }
  }

  private persist(): Promise<void> {
    const snapshot = JSON.stringify({ components: [...this.records.values()] }, null, 2);
    const write = async (): Promise<void> => {
      const tmpPath = `${this.filePath}.tmp`;
      try {
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.promises.writeFile(tmpPath, snapshot + '\n', 'utf-8');
        await fs.promises.rename(tmpPath, this.filePath);
      } catch (error) {
        throw wrapError(error, `Failed to write component store ${this.filePath}`);
      }
    };
    const next = this.writeQueue.then(write);
    // Keep the queue usable after a failed write; the caller still sees the error
    this.writeQueue = next.catch(() => undefined);
    return next;
  }
}
