// ============================================================================
// RUTA: src/domain/entities/MergedRecord.ts
// ============================================================================

export interface MergedRecord {
  readonly chatUsername: string | null;
  readonly chatDisplayName: string;
  readonly chatId: string;
  readonly chatJoinDate: string | null;
  readonly chatCreationDate: string | null;
  readonly gameUsername: string | null;
  readonly gameId: number | null;
  readonly gameCreationDate: string | null;
  readonly gameAvatarUrl: string;
}
