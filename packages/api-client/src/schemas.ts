/**
 * Payload Schemas
 * zod schemas for the bodies the streaming API sends and receives
 */

import { z } from "zod";
import type {
  AnalyticsEvent,
  UpdateInfo,
  UserDataSnapshot,
  VideoContent,
} from "@kennelcast/types";

export const contentCategorySchema = z.enum([
  "relaxation",
  "stimulation",
  "exposure",
  "training",
]);

export const videoContentSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  category: contentCategorySchema,
  videoURL: z.string().url(),
  thumbnailURL: z.string().url().optional(),
  durationSeconds: z.number().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string(),
}) satisfies z.ZodType<VideoContent>;

export const videoContentListSchema = z.array(videoContentSchema);

export const analyticsEventSchema = z.object({
  userId: z.string().min(1),
  sessionId: z.string().min(1),
  eventType: z.string().min(1),
  eventData: z.record(z.string()),
  timestamp: z.string().datetime(),
}) satisfies z.ZodType<AnalyticsEvent>;

export const userDataSnapshotSchema = z.object({
  user: z.object({
    id: z.string(),
    email: z.string(),
    name: z.string(),
  }),
  dogs: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      breed: z.string().optional(),
      ageYears: z.number().optional(),
    }),
  ),
  preferences: z.object({
    preferredCategories: z.array(contentCategorySchema),
    autoplay: z.boolean(),
    volume: z.number().min(0).max(1),
  }),
  lastSync: z.string(),
}) satisfies z.ZodType<UserDataSnapshot>;

export const updateInfoSchema = z.object({
  hasUpdates: z.boolean(),
  lastUpdate: z.string(),
  version: z.string(),
  changelog: z.string(),
}) satisfies z.ZodType<UpdateInfo>;
