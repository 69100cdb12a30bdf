// ============================================================================
// RUTA: src/application/usecases/roster/RefreshRosterUseCase.ts
// ============================================================================

import type { Logger } from 'pino';
import { ZodError } from 'zod';

import { type RefreshRosterDTO, type RefreshRosterPayload, RefreshRosterSchema } from '@/application/dto/roster.dto';
import type { AdminGate } from '@/application/services/AdminGate';
import { reconcileRoster, resolveGameId } from '@/application/services/ReconciliationService';
import { isChatMemberMissing } from '@/domain/entities/ChatMember';
import type { RefreshIssue } from '@/domain/entities/RefreshIssue';
import type { IChatMemberGateway } from '@/domain/gateways/IChatMemberGateway';
import type { IGameIdentityGateway } from '@/domain/gateways/IGameIdentityGateway';
import type { IRefreshLock } from '@/domain/repositories/IRefreshLock';
import type { IRosterRepository } from '@/domain/repositories/IRosterRepository';
import type { IRosterSnapshotRepository } from '@/domain/repositories/ISnapshotRepository';
import { ValidationFailedError } from '@/shared/errors/domain.errors';

export interface RefreshRosterDependencies {
  readonly gate: AdminGate;
  readonly lock: IRefreshLock;
  readonly roster: IRosterRepository;
  readonly chatMembers: IChatMemberGateway;
  readonly gameIdentities: IGameIdentityGateway;
  readonly snapshots: IRosterSnapshotRepository;
  readonly logger: Logger;
  readonly now?: () => Date;
}

export interface RefreshReport {
  readonly totalEntries: number;
  readonly chatResolved: number;
  readonly chatNotFound: number;
  readonly gameResolved: number;
  readonly droppedRows: number;
  readonly duplicateRows: number;
  readonly issues: readonly RefreshIssue[];
  readonly completedAt: string;
}

/**
 * Reconstruye el snapshot completo. Cualquier error fatal se propaga antes de escribir, de modo
 * que el snapshot anterior queda intacto.
 */
export class RefreshRosterUseCase {
  public constructor(private readonly deps: RefreshRosterDependencies) {}

  public async execute(dto: RefreshRosterDTO): Promise<RefreshReport> {
    let payload: RefreshRosterPayload;
    try {
      payload = RefreshRosterSchema.parse(dto);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ValidationFailedError(error.flatten().fieldErrors);
      }

      throw error;
    }

    this.deps.gate.assertAuthorized(payload.password, 'roster.refresh');

    const lock = await this.deps.lock.acquire();
    try {
      this.deps.logger.info({ requestedBy: payload.requestedBy }, 'Iniciando actualización del roster.');
      return await this.rebuild();
    } finally {
      await lock.release();
    }
  }

  private async rebuild(): Promise<RefreshReport> {
    const { logger } = this.deps;
    const issues: RefreshIssue[] = [];
    const report = (issue: RefreshIssue): void => {
      issues.push(issue);
    };

    const source = await this.deps.roster.load();
    const chatIds = source.entries.map((entry) => entry.chatId);

    logger.info({ targets: chatIds.length }, 'Consultando datos de Discord.');
    const chatMembers = await this.deps.chatMembers.fetchMembers(chatIds, report);

    logger.info({ usernames: source.gameUsernames.length }, 'Consultando datos de Roblox.');
    const idsByUsername = await this.deps.gameIdentities.resolveUsernamesToIds(source.gameUsernames, report);

    const gameIds = new Set<number>();
    for (const entry of source.entries) {
      const gameId = resolveGameId(entry.gameUsername, idsByUsername);
      if (gameId !== null) {
        gameIds.add(gameId);
      }
    }

    const profiles = await this.deps.gameIdentities.fetchProfiles([...gameIds], report);

    const records = reconcileRoster(source.entries, chatMembers, { idsByUsername, profiles });
    await this.deps.snapshots.write(records);

    let chatResolved = 0;
    let chatNotFound = 0;
    for (const chatId of chatIds) {
      const lookup = chatMembers.get(chatId);
      if (!lookup) {
        continue;
      }

      if (isChatMemberMissing(lookup)) {
        chatNotFound += 1;
      } else {
        chatResolved += 1;
      }
    }

    const result: RefreshReport = {
      totalEntries: records.length,
      chatResolved,
      chatNotFound,
      gameResolved: records.filter((record) => record.gameId !== null).length,
      droppedRows: source.droppedRows,
      duplicateRows: source.duplicateRows,
      issues,
      completedAt: (this.deps.now ?? (() => new Date()))().toISOString(),
    };

    logger.info(
      {
        totalEntries: result.totalEntries,
        chatResolved,
        chatNotFound,
        gameResolved: result.gameResolved,
        issues: issues.length,
      },
      'Actualización del roster completada.',
    );

    return result;
  }
}
