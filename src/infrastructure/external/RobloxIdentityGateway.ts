// ============================================================================
// RUTA: src/infrastructure/external/RobloxIdentityGateway.ts
// ============================================================================

import { setTimeout as delay } from 'node:timers/promises';

import type { Logger } from 'pino';
import { z } from 'zod';

import type { GameProfile } from '@/domain/entities/GameProfile';
import { ignoreIssue, type IssueReporter } from '@/domain/entities/RefreshIssue';
import { normalizeUsernameKey } from '@/domain/entities/RosterEntry';
import type { IGameIdentityGateway } from '@/domain/gateways/IGameIdentityGateway';
import { describeError } from '@/shared/errors/base.error';
import { ExternalRequestError } from '@/shared/errors/domain.errors';

type FetchFn = typeof fetch;
type FetchInit = NonNullable<Parameters<FetchFn>[1]>;

export interface RobloxIdentityGatewayConfig {
  usersApiUrl: string;
  thumbnailsApiUrl: string;
  avatarBatchSize: number;
  avatarSize: string;
  batchDelayMs: number;
  requestDelayMs: number;
  maxRetries: number;
  backoffMs: number;
  userAgent: string;
  logger: Logger;
  fetch: FetchFn;
  sleep: (ms: number) => Promise<unknown>;
}

const MAX_AVATAR_BATCH_SIZE = 100;

const DEFAULT_CONFIG = {
  usersApiUrl: 'https://users.roblox.com',
  thumbnailsApiUrl: 'https://thumbnails.roblox.com',
  avatarBatchSize: MAX_AVATAR_BATCH_SIZE,
  avatarSize: '150x150',
  batchDelayMs: 500,
  requestDelayMs: 150,
  maxRetries: 2,
  backoffMs: 1_000,
  userAgent: 'VerifiedRoster/1.0',
} satisfies Omit<RobloxIdentityGatewayConfig, 'logger' | 'fetch' | 'sleep'>;

const UsernameLookupResponseSchema = z.object({
  data: z.array(
    z.object({
      requestedUsername: z.string(),
      id: z.number().int().positive(),
    }),
  ),
});

const AvatarHeadshotResponseSchema = z.object({
  data: z.array(
    z.object({
      targetId: z.number().int(),
      state: z.string().optional(),
      imageUrl: z.string().nullable().optional(),
    }),
  ),
});

const UserDetailsResponseSchema = z.object({
  created: z.string(),
});

const uniqueIds = (ids: readonly number[]): number[] => [...new Set(ids)];

const chunk = <T>(values: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let index = 0; index < values.length; index += size) {
    batches.push(values.slice(index, index + size));
  }

  return batches;
};

export class RobloxIdentityGateway implements IGameIdentityGateway {
  private readonly config: RobloxIdentityGatewayConfig;

  public constructor(config: Partial<RobloxIdentityGatewayConfig> & Pick<RobloxIdentityGatewayConfig, 'logger'>) {
    this.config = {
      ...DEFAULT_CONFIG,
      fetch: (input, init) => fetch(input, init),
      sleep: (ms) => delay(ms),
      ...config,
    };

    this.config.avatarBatchSize = Math.min(Math.max(1, this.config.avatarBatchSize), MAX_AVATAR_BATCH_SIZE);
  }

  public async resolveUsernamesToIds(
    usernames: readonly string[],
    report: IssueReporter = ignoreIssue,
  ): Promise<Map<string, number>> {
    const requested = new Map<string, string>();
    for (const username of usernames) {
      const key = normalizeUsernameKey(username);
      if (key.length > 0 && !requested.has(key)) {
        requested.set(key, username.trim());
      }
    }

    const ids = new Map<string, number>();
    if (requested.size === 0) {
      return ids;
    }

    const url = `${this.config.usersApiUrl}/v1/usernames/users`;

    try {
      const payload = await this.requestJson(
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ usernames: [...requested.values()], excludeBannedUsers: true }),
        },
        UsernameLookupResponseSchema,
      );

      for (const user of payload.data) {
        const key = normalizeUsernameKey(user.requestedUsername);
        if (!ids.has(key)) {
          ids.set(key, user.id);
        }
      }
    } catch (error) {
      this.config.logger.error({ err: error, requested: requested.size }, 'Error obteniendo IDs de Roblox.');
      report({
        source: 'roblox',
        code: 'USERNAME_LOOKUP_FAILED',
        subject: `${requested.size} usuarios`,
        message: describeError(error),
      });
      return new Map();
    }

    this.config.logger.info({ requested: requested.size, resolved: ids.size }, 'Usuarios de Roblox resueltos.');
    return ids;
  }

  public async fetchProfiles(ids: readonly number[], report: IssueReporter = ignoreIssue): Promise<Map<number, GameProfile>> {
    const unique = uniqueIds(ids);
    const profiles = new Map<number, GameProfile>();
    if (unique.length === 0) {
      return profiles;
    }

    const avatars = await this.fetchAvatarUrls(unique, report);
    const creationDates = await this.fetchCreationDates(unique, report);

    for (const numericId of unique) {
      profiles.set(numericId, {
        numericId,
        createdAt: creationDates.get(numericId) ?? null,
        avatarUrl: avatars.get(numericId) ?? null,
      });
    }

    return profiles;
  }

  public async fetchAvatarUrls(ids: readonly number[], report: IssueReporter = ignoreIssue): Promise<Map<number, string>> {
    const unique = uniqueIds(ids);
    const wanted = new Set(unique);
    const avatars = new Map<number, string>();

    const batches = chunk(unique, this.config.avatarBatchSize);

    for (const [index, batch] of batches.entries()) {
      if (index > 0) {
        await this.config.sleep(this.config.batchDelayMs);
      }

      const url = new URL(`${this.config.thumbnailsApiUrl}/v1/users/avatar-headshot`);
      url.searchParams.set('userIds', batch.join(','));
      url.searchParams.set('size', this.config.avatarSize);
      url.searchParams.set('format', 'Png');
      url.searchParams.set('isCircular', 'false');

      try {
        const payload = await this.requestJson(url.href, { method: 'GET' }, AvatarHeadshotResponseSchema);

        for (const avatar of payload.data) {
          if (wanted.has(avatar.targetId) && avatar.imageUrl) {
            avatars.set(avatar.targetId, avatar.imageUrl);
          }
        }
      } catch (error) {
        this.config.logger.warn({ err: error, batch: index, size: batch.length }, 'Error obteniendo avatares de Roblox.');
        report({
          source: 'roblox',
          code: 'AVATAR_BATCH_FAILED',
          subject: batch.join(','),
          message: describeError(error),
        });
      }
    }

    this.config.logger.debug({ requested: unique.length, resolved: avatars.size, batches: batches.length }, 'Avatares obtenidos.');
    return avatars;
  }

  public async fetchCreationDates(
    ids: readonly number[],
    report: IssueReporter = ignoreIssue,
  ): Promise<Map<number, string | null>> {
    const unique = uniqueIds(ids);
    const dates = new Map<number, string | null>();

    for (const [index, numericId] of unique.entries()) {
      if (index > 0) {
        await this.config.sleep(this.config.requestDelayMs);
      }

      try {
        const payload = await this.requestJson(
          `${this.config.usersApiUrl}/v1/users/${numericId}`,
          { method: 'GET' },
          UserDetailsResponseSchema,
        );
        dates.set(numericId, payload.created);
      } catch (error) {
        dates.set(numericId, null);
        this.config.logger.warn({ err: error, numericId }, 'Error obteniendo la fecha de creación en Roblox.');
        report({
          source: 'roblox',
          code: 'PROFILE_FETCH_FAILED',
          subject: String(numericId),
          message: describeError(error),
        });
      }
    }

    return dates;
  }

  private async requestJson<T>(url: string, init: FetchInit, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let attempt = 0;

    for (;;) {
      attempt += 1;

      try {
        return await this.requestOnce(url, init, schema);
      } catch (error) {
        const retryable = !(error instanceof ExternalRequestError) || error.retryable;
        if (!retryable || attempt > this.config.maxRetries) {
          throw error;
        }

        this.config.logger.debug({ url, attempt, err: error }, 'Reintentando petición a Roblox.');
        await this.config.sleep(this.config.backoffMs * attempt);
      }
    }
  }

  private async requestOnce<T>(url: string, init: FetchInit, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const headers = new Headers(init.headers);
    headers.set('Accept', 'application/json');
    headers.set('User-Agent', this.config.userAgent);

    const response = await this.config.fetch(url, { ...init, headers });

    if (!response.ok) {
      throw new ExternalRequestError('Roblox', url, response.status);
    }

    const result = schema.safeParse(await response.json());
    if (!result.success) {
      throw new ExternalRequestError('Roblox', url, null, result.error);
    }

    return result.data;
  }
}
