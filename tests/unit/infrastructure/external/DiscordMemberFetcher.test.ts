import { DiscordAPIError, type Client } from 'discord.js';
import { describe, expect, it, vi } from 'vitest';

import type { ChatMemberMap } from '@/domain/entities/ChatMember';
import type { RefreshIssue } from '@/domain/entities/RefreshIssue';
import type { IMemberSnapshotRepository } from '@/domain/repositories/ISnapshotRepository';
import { DiscordMemberFetcher } from '@/infrastructure/external/DiscordMemberFetcher';
import {
  AuthenticationFailedError,
  CommunityNotFoundError,
  MissingConfigurationError,
} from '@/shared/errors/domain.errors';

import { chatIdFor } from '../../../helpers/fixtures';
import { createMockLogger } from '../../../helpers/logger';

const GUILD_ID = '876543210987654321';

const apiError = (code: number, status: number): DiscordAPIError =>
  new DiscordAPIError({ code, message: 'Unknown Member' }, code, status, 'GET', `/guilds/${GUILD_ID}/members/x`, {});

const fakeMember = (username: string) => ({
  user: { username, createdAt: new Date('2020-02-03T04:05:06.000Z') },
  displayName: `🔰・${username}`,
  joinedAt: new Date('2023-06-07T08:09:10.000Z'),
});

interface FakeClientOptions {
  readonly members?: Record<string, unknown>;
  readonly loginError?: Error;
  readonly guildCached?: boolean;
}

const createFakeClient = (options: FakeClientOptions = {}) => {
  let readyListener: (() => void) | null = null;

  const fetchMember = vi.fn(async ({ user }: { user: string; force: boolean }) => {
    const outcome = options.members?.[user];
    if (outcome instanceof Error) {
      throw outcome;
    }

    return outcome ?? fakeMember(`member_${user.slice(-2)}`);
  });

  const guild = { name: 'Test Guild', members: { fetch: fetchMember } };

  const client = {
    user: { tag: 'RosterBot#0001' },
    once: vi.fn((_event: string, listener: () => void) => {
      readyListener = listener;
    }),
    login: vi.fn(async (token: string) => {
      if (options.loginError) {
        throw options.loginError;
      }

      readyListener?.();
      return token;
    }),
    guilds: {
      cache: new Map<string, typeof guild>(options.guildCached === false ? [] : [[GUILD_ID, guild]]),
      fetch: vi.fn(async () => {
        throw apiError(10004, 404);
      }),
    },
    destroy: vi.fn(async () => undefined),
  };

  return { client, fetchMember };
};

const createSnapshots = () => {
  const write = vi.fn(async (_members: ChatMemberMap) => undefined);
  const snapshots: IMemberSnapshotRepository = { write, read: vi.fn(async () => null) };
  return { snapshots, write };
};

const createFetcher = (client: unknown, snapshots: IMemberSnapshotRepository, token: string | undefined = 'test-token') =>
  new DiscordMemberFetcher({
    token,
    guildId: GUILD_ID,
    snapshots,
    logger: createMockLogger(),
    createClient: () => client as Client,
  });

describe('DiscordMemberFetcher', () => {
  it('maps members, marks missing ones and leaves transport failures unresolved', async () => {
    const present = chatIdFor(1);
    const gone = chatIdFor(2);
    const flaky = chatIdFor(3);
    const { client, fetchMember } = createFakeClient({
      members: {
        [present]: fakeMember('alice'),
        [gone]: apiError(10007, 404),
        [flaky]: new Error('socket hang up'),
      },
    });
    const { snapshots, write } = createSnapshots();
    const issues: RefreshIssue[] = [];

    const members = await createFetcher(client, snapshots).fetchMembers([present, gone, flaky], (issue) =>
      issues.push(issue),
    );

    expect(fetchMember).toHaveBeenCalledWith({ user: present, force: true });
    expect(members.get(present)).toEqual({
      username: 'alice',
      displayName: '🔰・alice',
      createdAt: '2020-02-03T04:05:06.000Z',
      joinedAt: '2023-06-07T08:09:10.000Z',
    });
    expect(members.get(gone)).toEqual({ error: 'not_found' });
    expect(members.has(flaky)).toBe(false);
    expect(issues.map((issue) => [issue.code, issue.subject])).toEqual([
      ['MEMBER_NOT_FOUND', gone],
      ['MEMBER_FETCH_FAILED', flaky],
    ]);
    expect(write).toHaveBeenCalledWith(members);
    expect(client.destroy).toHaveBeenCalledTimes(1);
  });

  it('skips ids that are not snowflakes', async () => {
    const { client, fetchMember } = createFakeClient();
    const { snapshots } = createSnapshots();
    const issues: RefreshIssue[] = [];

    const members = await createFetcher(client, snapshots).fetchMembers(['12345', chatIdFor(4)], (issue) =>
      issues.push(issue),
    );

    expect(fetchMember).toHaveBeenCalledTimes(1);
    expect([...members.keys()]).toEqual([chatIdFor(4)]);
    expect(issues).toEqual([
      { source: 'discord', code: 'INVALID_CHAT_ID', subject: '12345', message: 'No es un ID de Discord válido.' },
    ]);
  });

  it('requires a token before opening a session', async () => {
    const createClient = vi.fn();
    const { snapshots } = createSnapshots();
    const fetcher = new DiscordMemberFetcher({
      token: undefined,
      guildId: GUILD_ID,
      snapshots,
      logger: createMockLogger(),
      createClient,
    });

    await expect(fetcher.fetchMembers([chatIdFor(1)])).rejects.toBeInstanceOf(MissingConfigurationError);
    expect(createClient).not.toHaveBeenCalled();
  });

  it('fails with AuthenticationFailedError when login is rejected and still closes the client', async () => {
    const { client } = createFakeClient({ loginError: new Error('An invalid token was provided.') });
    const { snapshots, write } = createSnapshots();

    await expect(createFetcher(client, snapshots).fetchMembers([chatIdFor(1)])).rejects.toBeInstanceOf(
      AuthenticationFailedError,
    );
    expect(client.destroy).toHaveBeenCalledTimes(1);
    expect(write).not.toHaveBeenCalled();
  });

  it('fails with CommunityNotFoundError when the guild is not reachable', async () => {
    const { client } = createFakeClient({ guildCached: false });
    const { snapshots, write } = createSnapshots();

    await expect(createFetcher(client, snapshots).fetchMembers([chatIdFor(1)])).rejects.toBeInstanceOf(
      CommunityNotFoundError,
    );
    expect(client.guilds.fetch).toHaveBeenCalledWith(GUILD_ID);
    expect(client.destroy).toHaveBeenCalledTimes(1);
    expect(write).not.toHaveBeenCalled();
  });
});
