// ============================================================================
// RUTA: src/shared/utils/fs.ts
// ============================================================================

export const isNodeError = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

export const isFileMissingError = (error: unknown): boolean => isNodeError(error) && error.code === 'ENOENT';

export const isFileExistsError = (error: unknown): boolean => isNodeError(error) && error.code === 'EEXIST';
