// ============================================================================
// RUTA: src/shared/errors/base.error.ts
// ============================================================================

export interface RosterErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly cause?: unknown;
  readonly metadata?: Record<string, unknown>;
  readonly exposeMessage?: boolean;
}

export class RosterError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  public readonly exposeMessage: boolean;

  public constructor(options: RosterErrorOptions) {
    super(options.message);
    this.name = 'RosterError';
    this.code = options.code;
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage ?? false;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, RosterError);
  }
}

export const isRosterError = (value: unknown): value is RosterError => value instanceof RosterError;

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
};
