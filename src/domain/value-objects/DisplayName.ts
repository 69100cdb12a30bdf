// ============================================================================
// RUTA: src/domain/value-objects/DisplayName.ts
// ============================================================================

/** Separador que los miembros usan para anteponer un emblema al apodo (p. ej. `🔰・Nombre`). */
export const DISPLAY_NAME_DELIMITER = '・';

export const DISPLAY_NAME_FALLBACK = 'N/A';

const nonEmpty = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

/** Corta en la primera aparición del separador y devuelve el resto recortado. */
export const stripDisplayNamePrefix = (displayName: string): string => {
  const index = displayName.indexOf(DISPLAY_NAME_DELIMITER);
  if (index === -1) {
    return displayName;
  }

  return displayName.slice(index + DISPLAY_NAME_DELIMITER.length).trim();
};

const normalizeOwnDisplayName = (displayName: string | null | undefined): string | null => {
  if (!displayName || displayName.trim().length === 0) {
    return null;
  }

  if (!displayName.includes(DISPLAY_NAME_DELIMITER)) {
    return displayName;
  }

  // `🔰・` sin nada detrás cuenta como apodo ausente.
  return nonEmpty(stripDisplayNamePrefix(displayName));
};

export interface DisplayNameCandidates {
  readonly displayName?: string | null;
  readonly username?: string | null;
  readonly rosterHandle?: string | null;
}

export const resolveDisplayName = ({ displayName, username, rosterHandle }: DisplayNameCandidates): string =>
  normalizeOwnDisplayName(displayName) ?? nonEmpty(username) ?? nonEmpty(rosterHandle) ?? DISPLAY_NAME_FALLBACK;
