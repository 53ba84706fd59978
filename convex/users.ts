import { v } from 'convex/values';
import type { DocumentByName } from 'convex/server';
import { mutation, query, type DataModel, type MutationCtx, type QueryCtx } from './builders';

type UserDoc = DocumentByName<DataModel, 'users'>;

const toIso = (value: number) => new Date(value).toISOString();

const mapUser = (doc: UserDoc) => ({
  id: doc.userId,
  email: doc.email,
  firstName: doc.firstName,
  lastName: doc.lastName,
  profileImageUrl: doc.profileImageUrl,
  createdAt: toIso(doc.createdAt),
  updatedAt: toIso(doc.updatedAt),
});

async function findByUserId(ctx: QueryCtx | MutationCtx, userId: string): Promise<UserDoc | null> {
  return await ctx.db
    .query('users')
    .withIndex('by_user_id', (q) => q.eq('userId', userId))
    .first();
}

export const upsert = mutation({
  args: {
    id: v.string(),
    email: v.optional(v.string()),
    firstName: v.optional(v.string()),
    lastName: v.optional(v.string()),
    profileImageUrl: v.optional(v.string()),
  },
  handler: async (ctx, args) => {
    const { id, ...profile } = args;
    const existing = await findByUserId(ctx, id);
    const timestamp = Date.now();

    if (existing) {
      await ctx.db.patch(existing._id, { ...profile, updatedAt: timestamp });
    } else {
      await ctx.db.insert('users', { userId: id, ...profile, createdAt: timestamp, updatedAt: timestamp });
    }

    const stored = await findByUserId(ctx, id);
    if (!stored) {
      throw new Error(`User ${id} could not be read back after upsert`);
    }
    return mapUser(stored);
  },
});

export const find = query({
  args: { id: v.string() },
  handler: async (ctx, args) => {
    const user = await findByUserId(ctx, args.id);
    return user ? mapUser(user) : null;
  },
});
