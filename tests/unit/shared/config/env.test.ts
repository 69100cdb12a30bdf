import { describe, expect, it } from 'vitest';

import { EnvSchema } from '@/shared/config/env';

describe('EnvSchema', () => {
  it('applies defaults when only the environment name is set', () => {
    const config = EnvSchema.parse({ NODE_ENV: 'test' });

    expect(config).toEqual({
      DISCORD_TOKEN: undefined,
      DISCORD_GUILD_ID: undefined,
      ADMIN_PASSWORD: undefined,
      ROSTER_CSV_PATH: 'users.csv',
      DISCORD_DATA_PATH: 'discord_data.json',
      SNAPSHOT_PATH: 'combined_data.json',
      REFRESH_LOCK_PATH: '.roster-refresh.lock',
      REFRESH_LOCK_STALE_MS: 1_800_000,
      ROBLOX_USERS_API_URL: 'https://users.roblox.com',
      ROBLOX_THUMBNAILS_API_URL: 'https://thumbnails.roblox.com',
      ROBLOX_AVATAR_BATCH_SIZE: 100,
      ROBLOX_AVATAR_SIZE: '150x150',
      ROBLOX_BATCH_DELAY_MS: 500,
      ROBLOX_REQUEST_DELAY_MS: 150,
      NODE_ENV: 'test',
      LOG_LEVEL: 'info',
    });
  });

  it('treats blank secrets as missing and trims paths and urls', () => {
    const config = EnvSchema.parse({
      DISCORD_TOKEN: '   ',
      ADMIN_PASSWORD: '',
      SNAPSHOT_PATH: ' data/combined.json ',
      ROBLOX_USERS_API_URL: 'https://users.example.test//',
      ROBLOX_AVATAR_BATCH_SIZE: '50',
    });

    expect(config.DISCORD_TOKEN).toBeUndefined();
    expect(config.ADMIN_PASSWORD).toBeUndefined();
    expect(config.SNAPSHOT_PATH).toBe('data/combined.json');
    expect(config.ROBLOX_USERS_API_URL).toBe('https://users.example.test');
    expect(config.ROBLOX_AVATAR_BATCH_SIZE).toBe(50);
  });

  it('rejects out of range batch sizes and malformed avatar sizes', () => {
    expect(EnvSchema.safeParse({ ROBLOX_AVATAR_BATCH_SIZE: '101' }).success).toBe(false);
    expect(EnvSchema.safeParse({ ROBLOX_AVATAR_SIZE: 'large' }).success).toBe(false);
  });
});
