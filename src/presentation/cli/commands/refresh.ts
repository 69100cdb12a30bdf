// ============================================================================
// RUTA: src/presentation/cli/commands/refresh.ts
// ============================================================================

import { parseArgs } from 'node:util';

import type { Logger } from 'pino';

import type { RefreshReport, RefreshRosterUseCase } from '@/application/usecases/roster/RefreshRosterUseCase';
import { reportCommandError } from '@/presentation/cli/errors';
import type { CliCommand } from '@/presentation/cli/types';

const MAX_LISTED_ISSUES = 20;
const USAGE = 'refresh --password <secreto>';

export const renderRefreshReport = (report: RefreshReport): string[] => {
  const lines = [
    `Roster actualizado (${report.completedAt}).`,
    `  Entradas: ${report.totalEntries}`,
    `  Discord: ${report.chatResolved} encontrados, ${report.chatNotFound} fuera del servidor`,
    `  Roblox: ${report.gameResolved} cuentas resueltas`,
  ];

  if (report.droppedRows > 0 || report.duplicateRows > 0) {
    lines.push(`  Filas omitidas: ${report.droppedRows} sin ID válido, ${report.duplicateRows} duplicadas`);
  }

  if (report.issues.length > 0) {
    lines.push(`  Incidencias: ${report.issues.length}`);
    for (const issue of report.issues.slice(0, MAX_LISTED_ISSUES)) {
      lines.push(`    - [${issue.source}] ${issue.code} ${issue.subject}: ${issue.message}`);
    }

    if (report.issues.length > MAX_LISTED_ISSUES) {
      lines.push(`    ... y ${report.issues.length - MAX_LISTED_ISSUES} más`);
    }
  }

  return lines;
};

export const createRefreshCommand = (useCase: RefreshRosterUseCase, logger: Logger): CliCommand => ({
  name: 'refresh',
  description: 'Consulta Discord y Roblox y reconstruye el snapshot del roster.',
  usage: USAGE,
  async execute(args, output) {
    let password: string | undefined;
    try {
      const { values } = parseArgs({
        args: [...args],
        options: {
          password: { type: 'string', short: 'p' },
        },
        allowPositionals: false,
      });
      password = values.password;
    } catch (error) {
      logger.debug({ err: error }, 'Argumentos inválidos para refresh.');
      output.error(`Uso: ${USAGE}`);
      return 2;
    }

    try {
      output.print('Actualizando el roster. Esto puede tardar un minuto...');
      const report = await useCase.execute({ password, requestedBy: 'cli' });
      renderRefreshReport(report).forEach((line) => output.print(line));
      return 0;
    } catch (error) {
      return reportCommandError(error, output, logger);
    }
  },
});
