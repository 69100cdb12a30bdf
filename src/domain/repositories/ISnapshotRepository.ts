// ============================================================================
// RUTA: src/domain/repositories/ISnapshotRepository.ts
// ============================================================================

import type { ChatMemberMap } from '@/domain/entities/ChatMember';
import type { MergedRecord } from '@/domain/entities/MergedRecord';

/**
 * `read` devuelve `null` cuando aún no existe snapshot y lanza `CorruptSnapshotError`
 * cuando el contenido no se puede interpretar.
 */
export interface ISnapshotRepository<T> {
  write(value: T): Promise<void>;
  read(): Promise<T | null>;
}

export type IRosterSnapshotRepository = ISnapshotRepository<readonly MergedRecord[]>;

export type IMemberSnapshotRepository = ISnapshotRepository<ChatMemberMap>;
