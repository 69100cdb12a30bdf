// ============================================================================
// RUTA: src/infrastructure/storage/schemas.ts
// ============================================================================

import { z } from 'zod';

import { CHAT_MEMBER_NOT_FOUND } from '@/domain/entities/ChatMember';

const nullableText = z.string().nullable();

export const MergedRecordSchema = z.object({
  chatUsername: nullableText,
  chatDisplayName: z.string(),
  chatId: z.string().min(1),
  chatJoinDate: nullableText,
  chatCreationDate: nullableText,
  gameUsername: nullableText,
  gameId: z.number().int().nonnegative().nullable(),
  gameCreationDate: nullableText,
  gameAvatarUrl: z.string(),
});

export const RosterSnapshotSchema = z.array(MergedRecordSchema);

export type RosterSnapshotFile = z.infer<typeof RosterSnapshotSchema>;

export const ChatMemberLookupSchema = z.union([
  z.object({
    username: z.string(),
    displayName: nullableText,
    createdAt: z.string(),
    joinedAt: nullableText,
  }),
  z.object({ error: z.literal(CHAT_MEMBER_NOT_FOUND) }),
]);

export const MemberSnapshotSchema = z.record(z.string(), ChatMemberLookupSchema);

export type MemberSnapshotFile = z.infer<typeof MemberSnapshotSchema>;
