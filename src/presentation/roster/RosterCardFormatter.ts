// ============================================================================
// RUTA: src/presentation/roster/RosterCardFormatter.ts
// ============================================================================

import type { RosterView } from '@/application/usecases/roster/LoadRosterViewUseCase';
import type { MergedRecord } from '@/domain/entities/MergedRecord';

export const NOT_AVAILABLE = 'N/A';
export const INVALID_DATE = 'Invalid Date';

const DATE_FORMATTER = new Intl.DateTimeFormat('en-US', {
  month: 'short',
  day: '2-digit',
  year: 'numeric',
  timeZone: 'UTC',
});

export const formatDate = (value: string | null): string => {
  if (!value) {
    return NOT_AVAILABLE;
  }

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return INVALID_DATE;
  }

  return DATE_FORMATTER.format(date);
};

export const formatGameId = (gameId: number | null): string => (gameId === null ? NOT_AVAILABLE : String(gameId));

export const renderCard = (record: MergedRecord): string[] => [
  record.gameUsername ?? NOT_AVAILABLE,
  `  ${record.chatDisplayName}`,
  `  Avatar: ${record.gameAvatarUrl}`,
  `  Usuario de Discord: ${record.chatUsername ?? NOT_AVAILABLE}`,
  `  ID de Discord: ${record.chatId}`,
  `  ID de Roblox: ${formatGameId(record.gameId)}`,
  `  Ingreso al servidor: ${formatDate(record.chatJoinDate)}`,
  `  Cuenta de Discord creada: ${formatDate(record.chatCreationDate)}`,
  `  Cuenta de Roblox creada: ${formatDate(record.gameCreationDate)}`,
];

export const renderRosterView = (view: RosterView): string[] => {
  switch (view.status) {
    case 'empty':
      return ['No hay datos en caché. Pide a un administrador que actualice el roster.'];
    case 'corrupt':
      return [`No se pudo leer el snapshot del roster: ${view.message}`];
    case 'ready': {
      if (view.records.length === 0) {
        return [`No se encontraron usuarios que coincidan con '${view.query ?? ''}'.`];
      }

      const lines = [`Mostrando ${view.records.length} de ${view.total} usuarios.`];
      for (const record of view.records) {
        lines.push('', ...renderCard(record));
      }

      return lines;
    }
  }
};
