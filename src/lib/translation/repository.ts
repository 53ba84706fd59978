import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { fetchMutation, fetchQuery } from 'convex/nextjs';
import { makeFunctionReference } from 'convex/server';
import { buildConvexClientOptions, type ConvexConnection, type ConvexRequestOptions } from '@/lib/convex/client';
import { isMissingFileError, isRecord } from '@/lib/utils/guards';
import { wrapRepositoryError } from './errors';
import { isTranslationRecord, type CreateTranslationRecordInput, type TranslationRecord } from './types';

export const HISTORY_PAGE_SIZE = 50;

export interface TranslationRecordRepository {
  create(input: CreateTranslationRecordInput): Promise<TranslationRecord>;
  /** Newest first, at most `limit` records owned by `userId`. */
  listRecent(userId: string, limit?: number): Promise<TranslationRecord[]>;
}

const clampLimit = (limit: number | undefined): number => {
  if (typeof limit !== 'number' || !Number.isFinite(limit)) {
    return HISTORY_PAGE_SIZE;
  }
  return Math.max(0, Math.min(HISTORY_PAGE_SIZE, Math.floor(limit)));
};

const TRANSLATION_FUNCTIONS = {
  create: makeFunctionReference<'mutation', CreateTranslationRecordInput, TranslationRecord>(
    'translations:create',
  ),
  listRecent: makeFunctionReference<'query', { userId: string; limit: number }, TranslationRecord[]>(
    'translations:listRecent',
  ),
};

export class ConvexTranslationRecordRepository implements TranslationRecordRepository {
  private readonly clientOptions: ConvexRequestOptions;

  constructor(connection: ConvexConnection) {
    this.clientOptions = buildConvexClientOptions(connection);
  }

  async create(input: CreateTranslationRecordInput): Promise<TranslationRecord> {
    try {
      return await fetchMutation(TRANSLATION_FUNCTIONS.create, input, this.clientOptions);
    } catch (error) {
      throw wrapRepositoryError('Convex translations', error);
    }
  }

  async listRecent(userId: string, limit?: number): Promise<TranslationRecord[]> {
    try {
      const records = await fetchQuery(
        TRANSLATION_FUNCTIONS.listRecent,
        { userId, limit: clampLimit(limit) },
        this.clientOptions,
      );
      return records ?? [];
    } catch (error) {
      throw wrapRepositoryError('Convex translations', error);
    }
  }
}

export class InMemoryTranslationRecordRepository implements TranslationRecordRepository {
  private readonly records: TranslationRecord[] = [];
  private nextId = 1;

  async create(input: CreateTranslationRecordInput): Promise<TranslationRecord> {
    const record: TranslationRecord = {
      id: String(this.nextId),
      userId: input.userId,
      originalText: input.originalText,
      translatedText: input.translatedText,
      serviceUsed: input.serviceUsed,
      createdAt: new Date().toISOString(),
    };
    this.nextId += 1;
    this.records.push(record);
    return { ...record };
  }

  async listRecent(userId: string, limit?: number): Promise<TranslationRecord[]> {
    return this.records
      .filter((record) => record.userId === userId)
      .reverse()
      .slice(0, clampLimit(limit))
      .map((record) => ({ ...record }));
  }
}

interface TranslationCollection {
  nextId: number;
  records: TranslationRecord[];
}

/** Append-only JSON file store for single-instance deployments without Convex. */
export class JsonFileTranslationRecordRepository implements TranslationRecordRepository {
  private readonly filePath: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  private async readFile(): Promise<TranslationCollection> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return { nextId: 1, records: [] };
      }
      throw error;
    }

    const data: unknown = JSON.parse(content);
    if (!isRecord(data)) {
      return { nextId: 1, records: [] };
    }
    const records = Array.isArray(data.records) ? data.records.filter(isTranslationRecord) : [];
    const nextId =
      typeof data.nextId === 'number' && Number.isInteger(data.nextId) ? data.nextId : records.length + 1;
    return { nextId, records };
  }

  private async writeFile(collection: TranslationCollection): Promise<void> {
    await fs.mkdir(dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(collection), 'utf8');
  }

  // Serialises read-modify-write cycles on the file.
  private serialise<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  async create(input: CreateTranslationRecordInput): Promise<TranslationRecord> {
    return await this.serialise(async () => {
      const collection = await this.readFile();
      const record: TranslationRecord = {
        id: String(collection.nextId),
        userId: input.userId,
        originalText: input.originalText,
        translatedText: input.translatedText,
        serviceUsed: input.serviceUsed,
        createdAt: new Date().toISOString(),
      };
      collection.records.push(record);
      collection.nextId += 1;
      await this.writeFile(collection);
      return record;
    });
  }

  async listRecent(userId: string, limit?: number): Promise<TranslationRecord[]> {
    return await this.serialise(async () => {
      const { records } = await this.readFile();
      return records
        .filter((record) => record.userId === userId)
        .reverse()
        .slice(0, clampLimit(limit));
    });
  }
}
