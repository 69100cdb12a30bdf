// ============================================================================
// RUTA: src/bootstrap/container.ts
// ============================================================================

import { AdminGate } from '@/application/services/AdminGate';
import { LoadRosterViewUseCase } from '@/application/usecases/roster/LoadRosterViewUseCase';
import { RefreshRosterUseCase } from '@/application/usecases/roster/RefreshRosterUseCase';
import { DiscordMemberFetcher } from '@/infrastructure/external/DiscordMemberFetcher';
import { RobloxIdentityGateway } from '@/infrastructure/external/RobloxIdentityGateway';
import { CsvRosterRepository } from '@/infrastructure/roster/CsvRosterRepository';
import { FileRefreshLock } from '@/infrastructure/storage/FileRefreshLock';
import { JsonMemberSnapshotRepository } from '@/infrastructure/storage/JsonMemberSnapshotRepository';
import { JsonRosterSnapshotRepository } from '@/infrastructure/storage/JsonRosterSnapshotRepository';
import { CommandRegistry } from '@/presentation/cli/command-registry';
import { createHelpCommand } from '@/presentation/cli/commands/help';
import { createRefreshCommand } from '@/presentation/cli/commands/refresh';
import { createShowCommand } from '@/presentation/cli/commands/show';
import type { Env } from '@/shared/config/env';
import { createChildLogger } from '@/shared/logger/pino';

export const createRosterSnapshotRepository = (config: Env): JsonRosterSnapshotRepository =>
  new JsonRosterSnapshotRepository(config.SNAPSHOT_PATH, createChildLogger({ module: 'roster-snapshot' }));

export const createRefreshRosterUseCase = (config: Env): RefreshRosterUseCase =>
  new RefreshRosterUseCase({
    gate: new AdminGate(config.ADMIN_PASSWORD),
    lock: new FileRefreshLock({
      path: config.REFRESH_LOCK_PATH,
      staleAfterMs: config.REFRESH_LOCK_STALE_MS,
      logger: createChildLogger({ module: 'refresh-lock' }),
    }),
    roster: new CsvRosterRepository(config.ROSTER_CSV_PATH, createChildLogger({ module: 'roster-loader' })),
    chatMembers: new DiscordMemberFetcher({
      token: config.DISCORD_TOKEN,
      guildId: config.DISCORD_GUILD_ID,
      snapshots: new JsonMemberSnapshotRepository(
        config.DISCORD_DATA_PATH,
        createChildLogger({ module: 'member-snapshot' }),
      ),
      logger: createChildLogger({ module: 'discord-members' }),
    }),
    gameIdentities: new RobloxIdentityGateway({
      usersApiUrl: config.ROBLOX_USERS_API_URL,
      thumbnailsApiUrl: config.ROBLOX_THUMBNAILS_API_URL,
      avatarBatchSize: config.ROBLOX_AVATAR_BATCH_SIZE,
      avatarSize: config.ROBLOX_AVATAR_SIZE,
      batchDelayMs: config.ROBLOX_BATCH_DELAY_MS,
      requestDelayMs: config.ROBLOX_REQUEST_DELAY_MS,
      logger: createChildLogger({ module: 'roblox-identities' }),
    }),
    snapshots: createRosterSnapshotRepository(config),
    logger: createChildLogger({ module: 'refresh-roster' }),
  });

export const createCommandRegistry = (config: Env): CommandRegistry => {
  const logger = createChildLogger({ module: 'cli' });
  const registry = new CommandRegistry();

  return registry.register([
    createShowCommand(
      new LoadRosterViewUseCase(createRosterSnapshotRepository(config), createChildLogger({ module: 'roster-view' })),
      logger,
    ),
    createRefreshCommand(createRefreshRosterUseCase(config), logger),
    createHelpCommand(registry),
  ]);
};
