// ============================================================================
// RUTA: src/domain/entities/GameProfile.ts
// ============================================================================

export const GAME_AVATAR_PLACEHOLDER = 'https://placehold.co/150x150/5865F2/FFFFFF?text=N/A';

export interface GameProfile {
  readonly numericId: number;
  readonly createdAt: string | null;
  readonly avatarUrl: string | null;
}

export interface GameLookup {
  /** Claves en minúsculas. */
  readonly idsByUsername: ReadonlyMap<string, number>;
  readonly profiles: ReadonlyMap<number, GameProfile>;
}
