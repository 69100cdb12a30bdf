// ============================================================================
// RUTA: src/presentation/cli/errors.ts
// ============================================================================

import type { Logger } from 'pino';

import type { CliOutput } from '@/presentation/cli/types';
import { isRosterError } from '@/shared/errors/base.error';

/** Traduce un error a un mensaje para el operador y devuelve el código de salida. */
export const reportCommandError = (error: unknown, output: CliOutput, logger: Logger): number => {
  if (isRosterError(error)) {
    logger.error({ err: error, code: error.code }, 'La operación falló.');
    output.error(error.exposeMessage ? `[${error.code}] ${error.message}` : `[${error.code}] Error interno.`);
    return 1;
  }

  logger.error({ err: error }, 'Error inesperado.');
  output.error('Ocurrió un error inesperado. Revisa los logs.');
  return 1;
};
