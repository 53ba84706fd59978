import { defineSchema, defineTable } from 'convex/server';
import { v } from 'convex/values';

export const serviceUsedValidator = v.union(v.literal('MyMemory'), v.literal('LibreTranslate'));

export default defineSchema({
  translations: defineTable({
    userId: v.string(),
    originalText: v.string(),
    translatedText: v.string(),
    serviceUsed: serviceUsedValidator,
    createdAt: v.number(),
  }).index('by_user_created', ['userId', 'createdAt']),

  users: defineTable({
    userId: v.string(),
    email: v.optional(v.string()),
    firstName: v.optional(v.string()),
    lastName: v.optional(v.string()),
    profileImageUrl: v.optional(v.string()),
    createdAt: v.number(),
    updatedAt: v.number(),
  }).index('by_user_id', ['userId']),
});
