/**
 * @notekeep/core - Remote source Zod schemas
 */

import { z } from 'zod';

// ============================================================================
// Remote Record
// ============================================================================

/**
 * Record shape delivered by the remote data source. Only the first five
 * fields are required; everything else is optional and left untouched
 * locally when absent.
 */
export const RemoteRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  body: z.string(),
  updatedAt: z.number().int(),
  remoteVersion: z.string().min(1),
  tags: z.array(z.string()).optional(),
  category: z.string().nullable().optional(),
  createdAt: z.number().int().optional(),
  isFavorite: z.boolean().optional(),
  isArchived: z.boolean().optional(),
  deleted: z.boolean().optional(),
});

export type RemoteRecord = z.infer<typeof RemoteRecordSchema>;

// ============================================================================
// Push Acknowledgement
// ============================================================================

export const RemotePushAckSchema = z.discriminatedUnion('status', [
  z.object({
    id: z.string().min(1),
    status: z.literal('applied'),
    remoteVersion: z.string().min(1),
  }),
  z.object({
    id: z.string().min(1),
    status: z.literal('rejected'),
    reason: z.string(),
  }),
]);

export type RemotePushAck = z.infer<typeof RemotePushAckSchema>;
