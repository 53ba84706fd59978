import { isRecord } from '@/lib/utils/guards';

export interface UserRecord {
  id: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  profileImageUrl?: string;
  createdAt: string;
  updatedAt: string;
}

export type UserProfileInput = {
  id: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  profileImageUrl?: string;
};

const isOptionalString = (value: unknown): boolean => value === undefined || typeof value === 'string';

export function isUserRecord(value: unknown): value is UserRecord {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    isOptionalString(value.email) &&
    isOptionalString(value.firstName) &&
    isOptionalString(value.lastName) &&
    isOptionalString(value.profileImageUrl) &&
    typeof value.createdAt === 'string' &&
    typeof value.updatedAt === 'string'
  );
}
