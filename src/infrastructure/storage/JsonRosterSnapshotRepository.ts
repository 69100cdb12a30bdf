// ============================================================================
// RUTA: src/infrastructure/storage/JsonRosterSnapshotRepository.ts
// ============================================================================

import type { Logger } from 'pino';

import type { MergedRecord } from '@/domain/entities/MergedRecord';
import type { IRosterSnapshotRepository } from '@/domain/repositories/ISnapshotRepository';
import { JsonFileStore } from '@/infrastructure/storage/JsonFileStore';
import { RosterSnapshotSchema, type RosterSnapshotFile } from '@/infrastructure/storage/schemas';

export class JsonRosterSnapshotRepository implements IRosterSnapshotRepository {
  private readonly store: JsonFileStore<RosterSnapshotFile>;

  public constructor(path: string, private readonly logger: Logger) {
    this.store = new JsonFileStore(path, RosterSnapshotSchema, logger);
  }

  public async write(records: readonly MergedRecord[]): Promise<void> {
    await this.store.write(records.map((record) => ({ ...record })));
    this.logger.info({ path: this.store.path, records: records.length }, 'Snapshot del roster guardado.');
  }

  public async read(): Promise<readonly MergedRecord[] | null> {
    return this.store.read();
  }
}
