// ============================================================================
// RUTA: src/application/usecases/roster/LoadRosterViewUseCase.ts
// ============================================================================

import type { Logger } from 'pino';
import { ZodError } from 'zod';

import { type RosterSearchDTO, type RosterSearchPayload, RosterSearchSchema } from '@/application/dto/roster.dto';
import type { MergedRecord } from '@/domain/entities/MergedRecord';
import type { IRosterSnapshotRepository } from '@/domain/repositories/ISnapshotRepository';
import { CorruptSnapshotError, ValidationFailedError } from '@/shared/errors/domain.errors';

export type RosterView =
  | { readonly status: 'empty' }
  | { readonly status: 'corrupt'; readonly message: string }
  | {
      readonly status: 'ready';
      readonly records: readonly MergedRecord[];
      readonly total: number;
      readonly query: string | null;
    };

export const matchesQuery = (record: MergedRecord, query: string): boolean => {
  const needle = query.toLowerCase();

  return [record.chatUsername, record.gameUsername, record.chatDisplayName].some(
    (value) => value !== null && value.toLowerCase().includes(needle),
  );
};

/** Solo lee el snapshot; nunca dispara peticiones de red. */
export class LoadRosterViewUseCase {
  public constructor(private readonly snapshots: IRosterSnapshotRepository, private readonly logger: Logger) {}

  public async execute(dto: RosterSearchDTO = {}): Promise<RosterView> {
    let payload: RosterSearchPayload;
    try {
      payload = RosterSearchSchema.parse(dto);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ValidationFailedError(error.flatten().fieldErrors);
      }

      throw error;
    }

    let records: readonly MergedRecord[] | null;
    try {
      records = await this.snapshots.read();
    } catch (error) {
      if (error instanceof CorruptSnapshotError) {
        this.logger.error({ err: error }, 'No se pudo leer el snapshot del roster.');
        return { status: 'corrupt', message: error.message };
      }

      throw error;
    }

    if (!records || records.length === 0) {
      return { status: 'empty' };
    }

    const { query } = payload;
    const filtered = query ? records.filter((record) => matchesQuery(record, query)) : records;

    this.logger.debug({ total: records.length, matches: filtered.length, query }, 'Roster cargado desde el snapshot.');

    return { status: 'ready', records: filtered, total: records.length, query };
  }
}
