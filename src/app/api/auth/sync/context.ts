import {
  ConvexUserRepository,
  InMemoryUserRepository,
  JsonFileUserRepository,
  type UserRepository,
} from '@/lib/users/repository';
import { resolveConvexConnection } from '@/lib/convex/client';
import { describeError, logEvent } from '@/lib/logging/logger';

let repository: UserRepository | null = null;

function createRepository(): UserRepository {
  if (repository) {
    return repository;
  }

  const connection = resolveConvexConnection();
  if (connection) {
    try {
      repository = new ConvexUserRepository(connection);
      return repository;
    } catch (error) {
      logEvent('warn', 'repository_init_failed', { repository: 'users', kind: 'convex', error: describeError(error) });
    }
  }

  const usersPath = process.env.USERS_DATA_PATH?.trim();
  repository = usersPath ? new JsonFileUserRepository(usersPath) : new InMemoryUserRepository();
  return repository;
}

export function getUserRepository(): UserRepository {
  return createRepository();
}

export function resetUserRepositoryForTesting(): void {
  repository = null;
}
