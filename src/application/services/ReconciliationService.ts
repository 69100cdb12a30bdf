// ============================================================================
// RUTA: src/application/services/ReconciliationService.ts
// ============================================================================

import { type ChatMemberMap, resolvedChatMember } from '@/domain/entities/ChatMember';
import { GAME_AVATAR_PLACEHOLDER, type GameLookup } from '@/domain/entities/GameProfile';
import type { MergedRecord } from '@/domain/entities/MergedRecord';
import { normalizeUsernameKey, type RosterEntry } from '@/domain/entities/RosterEntry';
import { resolveDisplayName } from '@/domain/value-objects/DisplayName';

const textOrNull = (value: string): string | null => (value.trim().length > 0 ? value : null);

export const resolveGameId = (gameUsername: string | null, idsByUsername: GameLookup['idsByUsername']): number | null => {
  if (!gameUsername) {
    return null;
  }

  return idsByUsername.get(normalizeUsernameKey(gameUsername)) ?? null;
};

export const reconcileEntry = (entry: RosterEntry, chatMembers: ChatMemberMap, game: GameLookup): MergedRecord => {
  const member = resolvedChatMember(chatMembers.get(entry.chatId));
  const gameId = resolveGameId(entry.gameUsername, game.idsByUsername);
  const profile = gameId === null ? undefined : game.profiles.get(gameId);

  return {
    chatUsername: member?.username ?? textOrNull(entry.chatHandle),
    chatDisplayName: resolveDisplayName({
      displayName: member?.displayName,
      username: member?.username,
      rosterHandle: entry.chatHandle,
    }),
    chatId: entry.chatId,
    chatJoinDate: member?.joinedAt ?? null,
    chatCreationDate: member?.createdAt ?? null,
    gameUsername: entry.gameUsername,
    gameId,
    gameCreationDate: profile?.createdAt ?? null,
    gameAvatarUrl: profile?.avatarUrl ?? GAME_AVATAR_PLACEHOLDER,
  };
};

/** Un registro por entrada del roster, en el mismo orden. Sin red ni estado. */
export const reconcileRoster = (
  roster: readonly RosterEntry[],
  chatMembers: ChatMemberMap,
  game: GameLookup,
): MergedRecord[] => roster.map((entry) => reconcileEntry(entry, chatMembers, game));
