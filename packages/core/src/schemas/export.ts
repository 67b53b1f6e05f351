/**
 * @notekeep/core - Export snapshot schema
 */

import { z } from 'zod';
import { NoteRecordSchema } from './note';

export const NOTE_SNAPSHOT_VERSION = 1;

export const BackendKindSchema = z.enum(['key-value', 'relational']);

export const NoteSnapshotSchema = z.object({
  version: z.literal(NOTE_SNAPSHOT_VERSION),
  exportedAt: z.number().int(),
  storageType: BackendKindSchema,
  records: z.array(NoteRecordSchema),
});

export type NoteSnapshot = z.infer<typeof NoteSnapshotSchema>;
