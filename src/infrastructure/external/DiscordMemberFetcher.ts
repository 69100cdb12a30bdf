// ============================================================================
// RUTA: src/infrastructure/external/DiscordMemberFetcher.ts
// ============================================================================

import { Client, DiscordAPIError, Events, GatewayIntentBits, type Guild } from 'discord.js';
import { RESTJSONErrorCodes } from 'discord-api-types/v10';
import type { Logger } from 'pino';

import { CHAT_MEMBER_NOT_FOUND, type ChatMemberLookup, type ChatMemberMap } from '@/domain/entities/ChatMember';
import { ignoreIssue, type IssueReporter } from '@/domain/entities/RefreshIssue';
import type { IChatMemberGateway } from '@/domain/gateways/IChatMemberGateway';
import type { IMemberSnapshotRepository } from '@/domain/repositories/ISnapshotRepository';
import { describeError } from '@/shared/errors/base.error';
import {
  AuthenticationFailedError,
  CommunityNotFoundError,
  MissingConfigurationError,
} from '@/shared/errors/domain.errors';
import { isSnowflake, profileFromMember } from '@/shared/utils/discordIdentity';

export interface DiscordMemberFetcherOptions {
  readonly token: string | undefined;
  readonly guildId: string | undefined;
  readonly snapshots: IMemberSnapshotRepository;
  readonly logger: Logger;
  readonly createClient?: () => Client;
}

const MEMBER_NOT_FOUND_CODES: ReadonlySet<number | string> = new Set([
  RESTJSONErrorCodes.UnknownMember,
  RESTJSONErrorCodes.UnknownUser,
]);

const isMemberNotFound = (error: unknown): boolean =>
  error instanceof DiscordAPIError && (MEMBER_NOT_FOUND_CODES.has(error.code) || error.status === 404);

// `joinedAt` solo llega con el intent de miembros.
const createDefaultClient = (): Client =>
  new Client({ intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers] });

/**
 * Abre una sesión del bot, consulta los miembros uno por uno y cierra la sesión en cualquier
 * caso. Los errores por ID quedan en el resultado; los de sesión abortan la consulta completa.
 */
export class DiscordMemberFetcher implements IChatMemberGateway {
  private readonly createClient: () => Client;

  public constructor(private readonly options: DiscordMemberFetcherOptions) {
    this.createClient = options.createClient ?? createDefaultClient;
  }

  public async fetchMembers(chatIds: readonly string[], report: IssueReporter = ignoreIssue): Promise<ChatMemberMap> {
    const { token, guildId } = this.requireCredentials();
    const { logger } = this.options;
    const client = this.createClient();

    try {
      await this.connect(client, token);
      logger.info({ bot: client.user?.tag ?? null }, 'Bot conectado a Discord.');

      const guild = await this.resolveGuild(client, guildId);
      logger.info({ guild: guild.name, targets: chatIds.length }, 'Servidor encontrado. Consultando miembros.');

      const members = new Map<string, ChatMemberLookup>();
      let resolved = 0;

      for (const chatId of chatIds) {
        if (!isSnowflake(chatId)) {
          logger.warn({ chatId }, 'ID de Discord inválido; se omite.');
          report({ source: 'discord', code: 'INVALID_CHAT_ID', subject: chatId, message: 'No es un ID de Discord válido.' });
          continue;
        }

        try {
          const member = await guild.members.fetch({ user: chatId, force: true });
          members.set(chatId, profileFromMember(member));
          resolved += 1;
        } catch (error) {
          if (isMemberNotFound(error)) {
            members.set(chatId, { error: CHAT_MEMBER_NOT_FOUND });
            logger.warn({ chatId }, 'No se encontró al miembro. Puede que haya salido del servidor.');
            report({ source: 'discord', code: 'MEMBER_NOT_FOUND', subject: chatId, message: describeError(error) });
            continue;
          }

          logger.error({ err: error, chatId }, 'Error HTTP consultando al miembro.');
          report({ source: 'discord', code: 'MEMBER_FETCH_FAILED', subject: chatId, message: describeError(error) });
        }
      }

      logger.info({ resolved, targets: chatIds.length }, 'Consulta de miembros finalizada.');

      await this.options.snapshots.write(members);
      return members;
    } finally {
      await client.destroy();
      logger.info('Bot desconectado de Discord.');
    }
  }

  private requireCredentials(): { token: string; guildId: string } {
    const { token, guildId } = this.options;

    if (!token) {
      throw new MissingConfigurationError('DISCORD_TOKEN');
    }

    if (!guildId) {
      throw new MissingConfigurationError('DISCORD_GUILD_ID');
    }

    if (!isSnowflake(guildId)) {
      throw new MissingConfigurationError('DISCORD_GUILD_ID', 'debe ser un snowflake de Discord');
    }

    return { token, guildId };
  }

  private async connect(client: Client, token: string): Promise<void> {
    const ready = new Promise<void>((resolve) => {
      client.once(Events.ClientReady, () => resolve());
    });

    try {
      await client.login(token);
    } catch (error) {
      this.options.logger.error({ err: error }, 'No fue posible iniciar sesión en Discord.');
      throw new AuthenticationFailedError(error);
    }

    await ready;
  }

  private async resolveGuild(client: Client, guildId: string): Promise<Guild> {
    const cached = client.guilds.cache.get(guildId);
    if (cached) {
      return cached;
    }

    try {
      return await client.guilds.fetch(guildId);
    } catch (error) {
      if (error instanceof DiscordAPIError) {
        this.options.logger.error({ err: error, guildId }, 'No se encontró el servidor configurado.');
        throw new CommunityNotFoundError(guildId);
      }

      throw error;
    }
  }
}
