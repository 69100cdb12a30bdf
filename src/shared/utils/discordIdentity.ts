// ============================================================================
// RUTA: src/shared/utils/discordIdentity.ts
// ============================================================================

import type { GuildMember } from 'discord.js';

import type { ChatMemberProfile } from '@/domain/entities/ChatMember';

export const SNOWFLAKE_PATTERN = /^\d{17,20}$/u;

export const isSnowflake = (value: string): boolean => SNOWFLAKE_PATTERN.test(value);

export const profileFromMember = (member: GuildMember): ChatMemberProfile => ({
  username: member.user.username,
  displayName: member.displayName,
  createdAt: member.user.createdAt.toISOString(),
  joinedAt: member.joinedAt?.toISOString() ?? null,
});
