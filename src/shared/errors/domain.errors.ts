// ============================================================================
// RUTA: src/shared/errors/domain.errors.ts
// ============================================================================

import { RosterError } from '@/shared/errors/base.error';

export class SourceNotFoundError extends RosterError {
  public constructor(path: string) {
    super({
      code: 'SOURCE_NOT_FOUND',
      message: `No se encontró el archivo de roster en ${path}.`,
      metadata: { path },
      exposeMessage: true,
    });
  }
}

export class MalformedSourceError extends RosterError {
  public constructor(path: string, missingColumns: readonly string[]) {
    super({
      code: 'MALFORMED_SOURCE',
      message: `El roster ${path} no contiene las columnas obligatorias: ${missingColumns.join(', ')}.`,
      metadata: { path, missingColumns },
      exposeMessage: true,
    });
  }
}

export class MissingConfigurationError extends RosterError {
  public constructor(variable: string, reason = 'no está definido') {
    super({
      code: 'MISSING_CONFIGURATION',
      message: `${variable} ${reason}.`,
      metadata: { variable },
      exposeMessage: true,
    });
  }
}

export class AuthenticationFailedError extends RosterError {
  public constructor(cause?: unknown) {
    super({
      code: 'AUTHENTICATION_FAILED',
      message: 'No fue posible iniciar sesión en Discord. Revisa DISCORD_TOKEN.',
      exposeMessage: true,
      cause,
    });
  }
}

export class CommunityNotFoundError extends RosterError {
  public constructor(guildId: string) {
    super({
      code: 'COMMUNITY_NOT_FOUND',
      message: `El bot no tiene acceso al servidor con ID ${guildId}.`,
      metadata: { guildId },
      exposeMessage: true,
    });
  }
}

export class CorruptSnapshotError extends RosterError {
  public constructor(path: string, cause?: unknown) {
    super({
      code: 'CORRUPT_SNAPSHOT',
      message: `No se pudo leer el snapshot ${path}. Es posible que esté corrupto.`,
      metadata: { path },
      exposeMessage: true,
      cause,
    });
  }
}

export class RefreshInProgressError extends RosterError {
  public constructor(lockPath: string, heldSince?: string) {
    super({
      code: 'REFRESH_IN_PROGRESS',
      message: 'Ya hay una actualización del roster en curso. Espera a que termine.',
      metadata: { lockPath, heldSince },
      exposeMessage: true,
    });
  }
}

export class UnauthorizedActionError extends RosterError {
  public constructor(action: string) {
    super({
      code: 'UNAUTHORIZED_ACTION',
      message: 'Contraseña de administrador incorrecta.',
      metadata: { action },
      exposeMessage: true,
    });
  }
}

export class ExternalRequestError extends RosterError {
  public readonly status: number | null;

  public constructor(service: string, url: string, status: number | null, cause?: unknown) {
    super({
      code: 'EXTERNAL_REQUEST_FAILED',
      message:
        status === null
          ? `La petición a ${service} no devolvió una respuesta válida.`
          : `La petición a ${service} respondió con estado ${status}.`,
      metadata: { service, url, status },
      exposeMessage: false,
      cause,
    });
    this.status = status;
  }

  public get retryable(): boolean {
    return this.status === null || this.status === 429 || this.status >= 500;
  }
}

export class ValidationFailedError extends RosterError {
  public constructor(details: Record<string, unknown>) {
    super({
      code: 'VALIDATION_FAILED',
      message: 'Los datos proporcionados no son válidos.',
      metadata: details,
      exposeMessage: true,
    });
  }
}
