import { v } from 'convex/values';
import type { DocumentByName } from 'convex/server';
import { mutation, query, type DataModel } from './builders';
import { serviceUsedValidator } from './schema';

type TranslationDoc = DocumentByName<DataModel, 'translations'>;

const MAX_PAGE_SIZE = 50;

const sanitizeLimit = (value: number): number =>
  Number.isFinite(value) ? Math.max(0, Math.min(Math.floor(value), MAX_PAGE_SIZE)) : MAX_PAGE_SIZE;

const mapTranslation = (doc: TranslationDoc) => ({
  id: doc._id,
  userId: doc.userId,
  originalText: doc.originalText,
  translatedText: doc.translatedText,
  serviceUsed: doc.serviceUsed,
  createdAt: new Date(doc.createdAt).toISOString(),
});

export const create = mutation({
  args: {
    userId: v.string(),
    originalText: v.string(),
    translatedText: v.string(),
    serviceUsed: serviceUsedValidator,
  },
  handler: async (ctx, args) => {
    const insertedId = await ctx.db.insert('translations', { ...args, createdAt: Date.now() });
    const inserted = await ctx.db.get(insertedId);
    if (!inserted) {
      throw new Error('Inserted translation could not be read back');
    }
    return mapTranslation(inserted);
  },
});

export const listRecent = query({
  args: { userId: v.string(), limit: v.number() },
  handler: async (ctx, args) => {
    const limit = sanitizeLimit(args.limit);
    if (limit === 0) {
      return [];
    }
    const docs = await ctx.db
      .query('translations')
      .withIndex('by_user_created', (q) => q.eq('userId', args.userId))
      .order('desc')
      .take(limit);
    return docs.map(mapTranslation);
  },
});
