/**
 * @notekeep/core - Note record Zod schemas
 *
 * Used to validate records read back from storage, records received from the
 * remote source, and export snapshots.
 */

import { z } from 'zod';

// ============================================================================
// Sync State
// ============================================================================

export const SYNC_STATES = [
  'local_only',
  'synced',
  'pending_push',
  'conflict',
] as const;

export const SyncStateSchema = z.enum(SYNC_STATES);
export type SyncState = z.infer<typeof SyncStateSchema>;

// ============================================================================
// Tags
// ============================================================================

export const TagListSchema = z
  .array(z.string().min(1))
  .superRefine((tags, ctx) => {
    const seen = new Set<string>();
    for (const [index, tag] of tags.entries()) {
      if (tag.trim() !== tag) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Tag "${tag}" has surrounding whitespace`,
          path: [index],
        });
      }
      if (seen.has(tag)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate tag "${tag}"`,
          path: [index],
        });
      }
      seen.add(tag);
    }
  });

// ============================================================================
// Remote Snapshot (kept alongside a conflicted record)
// ============================================================================

export const RemoteSnapshotSchema = z.object({
  title: z.string(),
  body: z.string(),
  tags: TagListSchema,
  category: z.string().nullable(),
  updatedAt: z.number().int(),
  remoteVersion: z.string(),
  deleted: z.boolean(),
});

export type RemoteSnapshot = z.infer<typeof RemoteSnapshotSchema>;

// ============================================================================
// Note Record
// ============================================================================

export const NoteRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  body: z.string(),
  tags: TagListSchema,
  category: z.string().nullable(),
  createdAt: z.number().int(),
  updatedAt: z.number().int(),
  isFavorite: z.boolean(),
  isArchived: z.boolean(),
  syncState: SyncStateSchema,
  remoteVersion: z.string().nullable(),
  deletedAt: z.number().int().nullable(),
  lastSyncedAt: z.number().int().nullable(),
  remoteSnapshot: RemoteSnapshotSchema.nullable(),
});

export type NoteRecord = z.infer<typeof NoteRecordSchema>;

/**
 * Fields callers may set when creating a record.
 */
export const CreateNoteInputSchema = z.object({
  title: z.string(),
  body: z.string().default(''),
  tags: z.array(z.string()).default([]),
  category: z.string().nullable().default(null),
  isFavorite: z.boolean().default(false),
  isArchived: z.boolean().default(false),
});

export type CreateNoteInput = z.input<typeof CreateNoteInputSchema>;

/**
 * Fields callers may change on an existing record.
 */
export const NotePatchSchema = z
  .object({
    title: z.string(),
    body: z.string(),
    tags: z.array(z.string()),
    category: z.string().nullable(),
    isFavorite: z.boolean(),
    isArchived: z.boolean(),
  })
  .partial()
  .strict();

export type NotePatch = z.infer<typeof NotePatchSchema>;
