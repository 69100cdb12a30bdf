// ============================================================================
// RUTA: src/infrastructure/storage/JsonMemberSnapshotRepository.ts
// ============================================================================

import type { Logger } from 'pino';

import type { ChatMemberLookup, ChatMemberMap } from '@/domain/entities/ChatMember';
import type { IMemberSnapshotRepository } from '@/domain/repositories/ISnapshotRepository';
import { JsonFileStore } from '@/infrastructure/storage/JsonFileStore';
import { MemberSnapshotSchema, type MemberSnapshotFile } from '@/infrastructure/storage/schemas';

export class JsonMemberSnapshotRepository implements IMemberSnapshotRepository {
  private readonly store: JsonFileStore<MemberSnapshotFile>;

  public constructor(path: string, private readonly logger: Logger) {
    this.store = new JsonFileStore(path, MemberSnapshotSchema, logger);
  }

  public async write(members: ChatMemberMap): Promise<void> {
    await this.store.write(Object.fromEntries(members));
    this.logger.info({ path: this.store.path, members: members.size }, 'Datos de Discord guardados.');
  }

  public async read(): Promise<ChatMemberMap | null> {
    const file = await this.store.read();
    if (!file) {
      return null;
    }

    return new Map<string, ChatMemberLookup>(Object.entries(file));
  }
}
