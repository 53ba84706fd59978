import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { fetchMutation, fetchQuery } from 'convex/nextjs';
import { makeFunctionReference } from 'convex/server';
import { buildConvexClientOptions, type ConvexConnection, type ConvexRequestOptions } from '@/lib/convex/client';
import { wrapRepositoryError } from '@/lib/translation/errors';
import { isMissingFileError, isRecord } from '@/lib/utils/guards';
import { isUserRecord, type UserProfileInput, type UserRecord } from './types';

export interface UserRepository {
  upsert(profile: UserProfileInput): Promise<UserRecord>;
  find(id: string): Promise<UserRecord | null>;
}

const USER_FUNCTIONS = {
  upsert: makeFunctionReference<'mutation', UserProfileInput, UserRecord>('users:upsert'),
  find: makeFunctionReference<'query', { id: string }, UserRecord | null>('users:find'),
};

function mergeProfile(existing: UserRecord | undefined, profile: UserProfileInput, now: string): UserRecord {
  return {
    id: profile.id,
    email: profile.email,
    firstName: profile.firstName,
    lastName: profile.lastName,
    profileImageUrl: profile.profileImageUrl,
    createdAt: existing?.createdAt ?? now,
    updatedAt: now,
  };
}

export class ConvexUserRepository implements UserRepository {
  private readonly clientOptions: ConvexRequestOptions;

  constructor(connection: ConvexConnection) {
    this.clientOptions = buildConvexClientOptions(connection);
  }

  async upsert(profile: UserProfileInput): Promise<UserRecord> {
    try {
      return await fetchMutation(USER_FUNCTIONS.upsert, profile, this.clientOptions);
    } catch (error) {
      throw wrapRepositoryError('Convex users', error);
    }
  }

  async find(id: string): Promise<UserRecord | null> {
    try {
      return await fetchQuery(USER_FUNCTIONS.find, { id }, this.clientOptions);
    } catch (error) {
      throw wrapRepositoryError('Convex users', error);
    }
  }
}

export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, UserRecord>();

  async upsert(profile: UserProfileInput): Promise<UserRecord> {
    const record = mergeProfile(this.users.get(profile.id), profile, new Date().toISOString());
    this.users.set(record.id, record);
    return { ...record };
  }

  async find(id: string): Promise<UserRecord | null> {
    const record = this.users.get(id);
    return record ? { ...record } : null;
  }
}

interface UserCollection {
  users: Record<string, UserRecord>;
}

export class JsonFileUserRepository implements UserRepository {
  private readonly filePath: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  private async readFile(): Promise<UserCollection> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return { users: {} };
      }
      throw error;
    }

    const data: unknown = JSON.parse(content);
    const users: Record<string, UserRecord> = {};
    if (isRecord(data) && isRecord(data.users)) {
      for (const [id, candidate] of Object.entries(data.users)) {
        if (isUserRecord(candidate)) {
          users[id] = candidate;
        }
      }
    }
    return { users };
  }

  private async writeFile(collection: UserCollection): Promise<void> {
    await fs.mkdir(dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(collection), 'utf8');
  }

  private serialise<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  async upsert(profile: UserProfileInput): Promise<UserRecord> {
    return await this.serialise(async () => {
      const collection = await this.readFile();
      const record = mergeProfile(collection.users[profile.id], profile, new Date().toISOString());
      collection.users[record.id] = record;
      await this.writeFile(collection);
      return record;
    });
  }

  async find(id: string): Promise<UserRecord | null> {
    return await this.serialise(async () => {
      const { users } = await this.readFile();
      return users[id] ?? null;
    });
  }
}
