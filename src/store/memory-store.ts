import * as crypto from 'crypto';
import { COMPONENT_STAGES, validateComponentData } from './schema.js';
import type {
  ComponentStore,
  TComponentDataInput,
  TComponentFilter,
  TComponentRecord,
  TComponentStage,
  TStageStat,
} from './types.js';

export type TComponentStoreOptions = {
  generateId?: () => string;
  now?: () => Date;
};

export function hasUsableOutput(record: TComponentRecord): boolean {
  return record.output !== undefined && record.output.type !== 'none';
}

/**
 * Check a record against every set field of a filter.
 */
export function matchesComponentFilter(record: TComponentRecord, filter: TComponentFilter): boolean {
  if (filter.stage !== undefined && record.stage !== filter.stage) return false;
  if (filter.language !== undefined && record.language !== filter.language) return false;
  if (filter.outputType !== undefined && record.output?.type !== filter.outputType) return false;
  if (filter.hasOutput !== undefined && hasUsableOutput(record) !== filter.hasOutput) return false;
  if (filter.inputType !== undefined && !record.inputs.some((input) => input.type === filter.inputType)) {
    return false;
  }
  if (
    filter.nameContains !== undefined &&
    !record.name.toLowerCase().includes(filter.nameContains.toLowerCase())
  ) {
    return false;
  }
  return true;
}

/**
 * Component store held in a Map. Also the base of the file-backed store.
 */
export class InMemoryComponentStore implements ComponentStore {
  protected readonly records = new Map<string, TComponentRecord>();
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: TComponentStoreOptions = {}, initial: readonly TComponentRecord[] = []) {
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
    this.now = options.now ?? (() => new Date());
    for (const record of initial) {
      this.records.set(record.id, record);
    }
  }

  async create(input: TComponentDataInput): Promise<TComponentRecord> {
    const data = validateComponentData(input);
    const timestamp = this.now().toISOString();
    const record: TComponentRecord = {
      ...data,
      id: this.generateId(),
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.records.set(record.id, record);
    return record;
  }

  async findById(id: string): Promise<TComponentRecord | null> {
    return this.records.get(id) ?? null;
  }

  async update(id: string, input: TComponentDataInput): Promise<TComponentRecord | null> {
    const data = validateComponentData(input);
    const existing = this.records.get(id);
    if (!existing) return null;

    const record: TComponentRecord = {
      ...data,
      createdBy: data.createdBy ?? existing.createdBy,
      id,
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString(),
    };
    this.records.set(id, record);
    return record;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async find(filter: TComponentFilter = {}): Promise<TComponentRecord[]> {
    // Reverse insertion order first so equal timestamps still list newest first
    return [...this.records.values()]
      .reverse()
      .filter((record) => matchesComponentFilter(record, filter))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async findByStage(stage: TComponentStage): Promise<TComponentRecord[]> {
    return this.find({ stage });
  }

  async stageStats(): Promise<TStageStat[]> {
    const counts = new Map<TComponentStage, number>();
    for (const record of this.records.values()) {
      counts.set(record.stage, (counts.get(record.stage) ?? 0) + 1);
    }
    return COMPONENT_STAGES.filter((stage) => counts.has(stage)).map((stage) => ({
      stage,
      count: counts.get(stage) ?? 0,
    }));
  }
}
