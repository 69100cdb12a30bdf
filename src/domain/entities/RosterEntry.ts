// ============================================================================
// RUTA: src/domain/entities/RosterEntry.ts
// ============================================================================

export interface RosterEntry {
  /** Snowflake de Discord tal como aparece en el roster, siempre en texto. */
  readonly chatId: string;
  readonly chatHandle: string;
  readonly gameUsername: string | null;
}

export interface RosterSource {
  readonly entries: readonly RosterEntry[];
  /** Usuarios de Roblox no vacíos, sin duplicados (sin distinguir mayúsculas). */
  readonly gameUsernames: readonly string[];
  readonly droppedRows: number;
  readonly duplicateRows: number;
}

export const normalizeUsernameKey = (username: string): string => username.trim().toLowerCase();
