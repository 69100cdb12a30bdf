// ============================================================================
// RUTA: src/shared/config/env.ts
// ============================================================================

import { z } from 'zod';

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value === 'string' && value.trim().length === 0) {
      return undefined;
    }

    return value;
  }, schema.optional());

const filePath = (fallback: string) => emptyToUndefined(z.string().trim()).transform((value) => value ?? fallback);

const baseUrl = (fallback: string) =>
  emptyToUndefined(z.string().url())
    .transform((value) => value ?? fallback)
    .transform((value) => value.replace(/\/+$/u, ''));

export const EnvSchema = z.object({
  // Secretos: se validan cuando una operación los necesita, no al arrancar.
  DISCORD_TOKEN: emptyToUndefined(z.string().trim()),
  DISCORD_GUILD_ID: emptyToUndefined(z.string().trim()),
  ADMIN_PASSWORD: emptyToUndefined(z.string()),

  ROSTER_CSV_PATH: filePath('users.csv'),
  DISCORD_DATA_PATH: filePath('discord_data.json'),
  SNAPSHOT_PATH: filePath('combined_data.json'),
  REFRESH_LOCK_PATH: filePath('.roster-refresh.lock'),
  REFRESH_LOCK_STALE_MS: z.coerce.number().int().min(60_000).default(30 * 60_000),

  ROBLOX_USERS_API_URL: baseUrl('https://users.roblox.com'),
  ROBLOX_THUMBNAILS_API_URL: baseUrl('https://thumbnails.roblox.com'),
  ROBLOX_AVATAR_BATCH_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  ROBLOX_AVATAR_SIZE: emptyToUndefined(
    z.string().regex(/^\d+x\d+$/u, 'ROBLOX_AVATAR_SIZE debe tener el formato <ancho>x<alto>'),
  ).transform((value) => value ?? '150x150'),
  ROBLOX_BATCH_DELAY_MS: z.coerce.number().int().min(0).default(500),
  ROBLOX_REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(150),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
