import type { ChatMemberProfile } from '@/domain/entities/ChatMember';
import type { MergedRecord } from '@/domain/entities/MergedRecord';
import type { RosterEntry } from '@/domain/entities/RosterEntry';

export const chatIdFor = (index: number): string => `1000000000000000${String(index).padStart(2, '0')}`;

export const rosterEntry = (overrides: Partial<RosterEntry> = {}): RosterEntry => ({
  chatId: chatIdFor(1),
  chatHandle: 'roster_handle',
  gameUsername: 'BuilderOne',
  ...overrides,
});

export const memberProfile = (overrides: Partial<ChatMemberProfile> = {}): ChatMemberProfile => ({
  username: 'member_name',
  displayName: '🔰・Shown Name',
  createdAt: '2020-02-03T04:05:06.000Z',
  joinedAt: '2023-06-07T08:09:10.000Z',
  ...overrides,
});

export const mergedRecord = (overrides: Partial<MergedRecord> = {}): MergedRecord => ({
  chatUsername: 'member_name',
  chatDisplayName: 'Shown Name',
  chatId: chatIdFor(1),
  chatJoinDate: '2023-06-07T08:09:10.000Z',
  chatCreationDate: '2020-02-03T04:05:06.000Z',
  gameUsername: 'BuilderOne',
  gameId: 4242,
  gameCreationDate: '2015-01-05T12:00:00.000Z',
  gameAvatarUrl: 'https://tr.rbxcdn.com/avatar-4242.png',
  ...overrides,
});
