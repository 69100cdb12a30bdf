// ============================================================================
// RUTA: src/infrastructure/roster/CsvRosterRepository.ts
// ============================================================================

import { readFile } from 'node:fs/promises';

import type { Logger } from 'pino';

import { normalizeUsernameKey, type RosterEntry, type RosterSource } from '@/domain/entities/RosterEntry';
import type { IRosterRepository } from '@/domain/repositories/IRosterRepository';
import { MalformedSourceError, SourceNotFoundError } from '@/shared/errors/domain.errors';
import { parseCsv } from '@/shared/utils/csv';
import { isFileMissingError } from '@/shared/utils/fs';

export const ROSTER_COLUMNS = Object.freeze({
  chatId: 'DiscordID',
  chatHandle: 'DiscordUsername',
  gameUsername: 'RobloxUsername',
});

const DIGITS_PATTERN = /^\d+$/u;
// Las hojas de cálculo exportan a veces los IDs como `123456789012345678.0`.
const FLOAT_SUFFIX_PATTERN = /^(\d+)\.0+$/u;

export const normalizeChatId = (raw: string): string | null => {
  const trimmed = raw.trim();
  const withoutSuffix = FLOAT_SUFFIX_PATTERN.exec(trimmed)?.[1] ?? trimmed;

  return DIGITS_PATTERN.test(withoutSuffix) ? withoutSuffix : null;
};

export const parseRoster = (text: string, sourcePath: string, logger: Logger): RosterSource => {
  const [header, ...rows] = parseCsv(text);
  const columns = (header ?? []).map((name) => name.trim());

  const required = Object.values(ROSTER_COLUMNS);
  const missing = required.filter((name) => !columns.includes(name));
  if (missing.length > 0) {
    throw new MalformedSourceError(sourcePath, missing);
  }

  const chatIdIndex = columns.indexOf(ROSTER_COLUMNS.chatId);
  const chatHandleIndex = columns.indexOf(ROSTER_COLUMNS.chatHandle);
  const gameUsernameIndex = columns.indexOf(ROSTER_COLUMNS.gameUsername);

  const entries: RosterEntry[] = [];
  const seenChatIds = new Set<string>();
  const gameUsernames = new Map<string, string>();
  let droppedRows = 0;
  let duplicateRows = 0;

  rows.forEach((cells, rowIndex) => {
    const chatId = normalizeChatId(cells[chatIdIndex] ?? '');
    if (!chatId) {
      droppedRows += 1;
      logger.debug({ row: rowIndex + 2, value: cells[chatIdIndex] ?? null }, 'Fila del roster sin DiscordID válido.');
      return;
    }

    if (seenChatIds.has(chatId)) {
      duplicateRows += 1;
      return;
    }
    seenChatIds.add(chatId);

    const gameUsername = (cells[gameUsernameIndex] ?? '').trim();
    entries.push({
      chatId,
      chatHandle: (cells[chatHandleIndex] ?? '').trim(),
      gameUsername: gameUsername.length > 0 ? gameUsername : null,
    });

    if (gameUsername.length > 0) {
      const key = normalizeUsernameKey(gameUsername);
      if (!gameUsernames.has(key)) {
        gameUsernames.set(key, gameUsername);
      }
    }
  });

  return {
    entries,
    gameUsernames: [...gameUsernames.values()],
    droppedRows,
    duplicateRows,
  };
};

export class CsvRosterRepository implements IRosterRepository {
  public constructor(private readonly path: string, private readonly logger: Logger) {}

  public async load(): Promise<RosterSource> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isFileMissingError(error)) {
        throw new SourceNotFoundError(this.path);
      }

      throw error;
    }

    const roster = parseRoster(text, this.path, this.logger);

    this.logger.info(
      {
        path: this.path,
        entries: roster.entries.length,
        gameUsernames: roster.gameUsernames.length,
        droppedRows: roster.droppedRows,
        duplicateRows: roster.duplicateRows,
      },
      'Roster cargado.',
    );

    return roster;
  }
}
