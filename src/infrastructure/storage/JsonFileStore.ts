// ============================================================================
// RUTA: src/infrastructure/storage/JsonFileStore.ts
// ============================================================================

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { Logger } from 'pino';
import type { z } from 'zod';

import { CorruptSnapshotError } from '@/shared/errors/domain.errors';
import { isFileMissingError } from '@/shared/utils/fs';

let temporarySequence = 0;

/**
 * Archivo JSON validado con zod. Las escrituras van a un archivo temporal hermano y se
 * publican con `rename`, así un lector ve el contenido anterior o el nuevo, nunca uno a medias.
 */
export class JsonFileStore<T> {
  public constructor(
    public readonly path: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly logger: Logger,
  ) {}

  public async write(value: T): Promise<void> {
    const serialized = `${JSON.stringify(value, null, 2)}\n`;
    temporarySequence += 1;
    const temporaryPath = `${this.path}.${process.pid}.${temporarySequence}.tmp`;

    await mkdir(dirname(this.path), { recursive: true });

    try {
      await writeFile(temporaryPath, serialized, 'utf8');
      await rename(temporaryPath, this.path);
    } catch (error) {
      await rm(temporaryPath, { force: true });
      throw error;
    }

    this.logger.debug({ path: this.path, bytes: Buffer.byteLength(serialized) }, 'Archivo JSON escrito.');
  }

  public async read(): Promise<T | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isFileMissingError(error)) {
        return null;
      }

      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn({ path: this.path, err: error }, 'El archivo JSON no es válido.');
      throw new CorruptSnapshotError(this.path, error);
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn({ path: this.path, issues: result.error.issues.slice(0, 5) }, 'El archivo JSON no cumple el esquema.');
      throw new CorruptSnapshotError(this.path, result.error);
    }

    return result.data;
  }
}
