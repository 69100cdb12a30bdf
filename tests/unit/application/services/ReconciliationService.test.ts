import { describe, expect, it } from 'vitest';

import { reconcileRoster } from '@/application/services/ReconciliationService';
import { CHAT_MEMBER_NOT_FOUND, type ChatMemberLookup } from '@/domain/entities/ChatMember';
import { GAME_AVATAR_PLACEHOLDER, type GameLookup, type GameProfile } from '@/domain/entities/GameProfile';
import type { RosterEntry } from '@/domain/entities/RosterEntry';

import { chatIdFor, memberProfile, rosterEntry } from '../../../helpers/fixtures';

const emptyGame: GameLookup = { idsByUsername: new Map(), profiles: new Map() };

describe('reconcileRoster', () => {
  it('merges chat member and game profile data for a resolved entry', () => {
    const roster = [rosterEntry({ gameUsername: 'BuilderOne' })];
    const members = new Map<string, ChatMemberLookup>([[chatIdFor(1), memberProfile()]]);
    const game: GameLookup = {
      idsByUsername: new Map([['builderone', 4242]]),
      profiles: new Map<number, GameProfile>([
        [4242, { numericId: 4242, createdAt: '2015-01-05T12:00:00.000Z', avatarUrl: 'https://tr.rbxcdn.com/a.png' }],
      ]),
    };

    expect(reconcileRoster(roster, members, game)).toEqual([
      {
        chatUsername: 'member_name',
        chatDisplayName: 'Shown Name',
        chatId: chatIdFor(1),
        chatJoinDate: '2023-06-07T08:09:10.000Z',
        chatCreationDate: '2020-02-03T04:05:06.000Z',
        gameUsername: 'BuilderOne',
        gameId: 4242,
        gameCreationDate: '2015-01-05T12:00:00.000Z',
        gameAvatarUrl: 'https://tr.rbxcdn.com/a.png',
      },
    ]);
  });

  it('falls back to roster data when the member was not found', () => {
    const roster = [rosterEntry({ chatHandle: 'left_the_server', gameUsername: null })];
    const members = new Map<string, ChatMemberLookup>([[chatIdFor(1), { error: CHAT_MEMBER_NOT_FOUND }]]);

    const [record] = reconcileRoster(roster, members, emptyGame);

    expect(record).toEqual({
      chatUsername: 'left_the_server',
      chatDisplayName: 'left_the_server',
      chatId: chatIdFor(1),
      chatJoinDate: null,
      chatCreationDate: null,
      gameUsername: null,
      gameId: null,
      gameCreationDate: null,
      gameAvatarUrl: GAME_AVATAR_PLACEHOLDER,
    });
  });

  it('uses N/A and a null username when neither member nor roster handle exist', () => {
    const [record] = reconcileRoster([rosterEntry({ chatHandle: '' })], new Map(), emptyGame);

    expect(record?.chatUsername).toBeNull();
    expect(record?.chatDisplayName).toBe('N/A');
  });

  it('matches game usernames case-insensitively', () => {
    const game: GameLookup = { idsByUsername: new Map([['builderone', 7]]), profiles: new Map() };

    const [record] = reconcileRoster([rosterEntry({ gameUsername: 'BUILDERONE' })], new Map(), game);

    expect(record?.gameId).toBe(7);
    expect(record?.gameCreationDate).toBeNull();
    expect(record?.gameAvatarUrl).toBe(GAME_AVATAR_PLACEHOLDER);
  });

  it('keeps the placeholder avatar when the profile has no avatar url', () => {
    const game: GameLookup = {
      idsByUsername: new Map([['builderone', 7]]),
      profiles: new Map([[7, { numericId: 7, createdAt: '2019-09-09T00:00:00.000Z', avatarUrl: null }]]),
    };

    const [record] = reconcileRoster([rosterEntry()], new Map(), game);

    expect(record?.gameCreationDate).toBe('2019-09-09T00:00:00.000Z');
    expect(record?.gameAvatarUrl).toBe(GAME_AVATAR_PLACEHOLDER);
  });

  it('keeps every roster entry when one member lookup is not found', () => {
    const roster: RosterEntry[] = Array.from({ length: 11 }, (_, index) =>
      rosterEntry({ chatId: chatIdFor(index), chatHandle: `handle_${index}`, gameUsername: null }),
    );
    const members = new Map<string, ChatMemberLookup>(
      roster.map((entry, index) => [
        entry.chatId,
        index === 5 ? { error: CHAT_MEMBER_NOT_FOUND } : memberProfile({ username: `member_${index}`, displayName: null }),
      ]),
    );

    const records = reconcileRoster(roster, members, emptyGame);

    expect(records).toHaveLength(11);
    expect(records.map((record) => record.chatId)).toEqual(roster.map((entry) => entry.chatId));
    expect(records[5]).toMatchObject({
      chatUsername: 'handle_5',
      chatDisplayName: 'handle_5',
      chatJoinDate: null,
      chatCreationDate: null,
    });
    expect(records[4]?.chatDisplayName).toBe('member_4');
  });

  it('produces identical output for identical inputs', () => {
    const roster = [rosterEntry(), rosterEntry({ chatId: chatIdFor(2), gameUsername: 'Other' })];
    const members = new Map<string, ChatMemberLookup>([[chatIdFor(1), memberProfile()]]);
    const game: GameLookup = {
      idsByUsername: new Map([
        ['builderone', 1],
        ['other', 2],
      ]),
      profiles: new Map([[1, { numericId: 1, createdAt: null, avatarUrl: 'https://tr.rbxcdn.com/1.png' }]]),
    };

    const first = JSON.stringify(reconcileRoster(roster, members, game));
    const second = JSON.stringify(reconcileRoster(roster, members, game));

    expect(second).toBe(first);
  });
});
