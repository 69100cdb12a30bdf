// ============================================================================
// RUTA: src/infrastructure/storage/FileRefreshLock.ts
// ============================================================================

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { Logger } from 'pino';
import { z } from 'zod';

import type { IRefreshLock, RefreshLockHandle } from '@/domain/repositories/IRefreshLock';
import { RefreshInProgressError } from '@/shared/errors/domain.errors';
import { isFileExistsError, isFileMissingError, isNodeError } from '@/shared/utils/fs';

const LockHolderSchema = z.object({
  pid: z.number().int().positive(),
  token: z.string().min(1),
  acquiredAt: z.string().datetime(),
});

type LockHolder = z.infer<typeof LockHolderSchema>;

interface LockFileState {
  /** `null` cuando el archivo está vacío o a medio escribir. */
  readonly holder: LockHolder | null;
  readonly modifiedAt: Date;
}

export interface FileRefreshLockOptions {
  readonly path: string;
  readonly staleAfterMs: number;
  readonly logger: Logger;
  readonly now?: () => Date;
  readonly isProcessAlive?: (pid: number) => boolean;
}

export const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: el proceso existe pero pertenece a otro usuario.
    return isNodeError(error) && error.code === 'EPERM';
  }
};

/**
 * Bloqueo entre procesos basado en la creación exclusiva de un archivo. Solo se reclama un
 * bloqueo cuyo proceso dueño ya no existe, o uno ilegible más antiguo que `staleAfterMs`.
 */
export class FileRefreshLock implements IRefreshLock {
  private readonly now: () => Date;

  private readonly isProcessAlive: (pid: number) => boolean;

  public constructor(private readonly options: FileRefreshLockOptions) {
    this.now = options.now ?? (() => new Date());
    this.isProcessAlive = options.isProcessAlive ?? isProcessAlive;
  }

  public async acquire(): Promise<RefreshLockHandle> {
    const claimed = await this.tryClaim();
    if (claimed) {
      return this.createHandle(claimed);
    }

    const state = await this.inspect();
    if (state) {
      if (!this.isAbandoned(state)) {
        throw new RefreshInProgressError(this.options.path, state.holder?.acquiredAt);
      }

      this.options.logger.warn(
        { path: this.options.path, holder: state.holder, modifiedAt: state.modifiedAt.toISOString() },
        'Reclamando bloqueo de actualización abandonado.',
      );
      await rm(this.options.path, { force: true });
    }

    const reclaimed = await this.tryClaim();
    if (!reclaimed) {
      throw new RefreshInProgressError(this.options.path);
    }

    return this.createHandle(reclaimed);
  }

  private createHandle(holder: LockHolder): RefreshLockHandle {
    const { logger, path } = this.options;
    logger.debug({ path }, 'Bloqueo de actualización adquirido.');

    let released = false;
    return {
      release: async () => {
        if (released) {
          return;
        }

        released = true;

        const state = await this.inspect();
        if (state?.holder?.token !== holder.token) {
          logger.warn(
            { path, holder: state?.holder ?? null },
            'El bloqueo ya pertenece a otra actualización; no se elimina.',
          );
          return;
        }

        await rm(path, { force: true });
        logger.debug({ path }, 'Bloqueo de actualización liberado.');
      },
    };
  }

  private async tryClaim(): Promise<LockHolder | null> {
    const holder: LockHolder = { pid: process.pid, token: randomUUID(), acquiredAt: this.now().toISOString() };

    await mkdir(dirname(this.options.path), { recursive: true });

    try {
      await writeFile(this.options.path, JSON.stringify(holder), { encoding: 'utf8', flag: 'wx' });
      return holder;
    } catch (error) {
      if (isFileExistsError(error)) {
        return null;
      }

      throw error;
    }
  }

  private async inspect(): Promise<LockFileState | null> {
    let content: string;
    let modifiedAt: Date;
    try {
      modifiedAt = (await stat(this.options.path)).mtime;
      content = await readFile(this.options.path, 'utf8');
    } catch (error) {
      if (isFileMissingError(error)) {
        return null;
      }

      throw error;
    }

    try {
      const result = LockHolderSchema.safeParse(JSON.parse(content));
      return { holder: result.success ? result.data : null, modifiedAt };
    } catch (error) {
      this.options.logger.debug({ err: error, path: this.options.path }, 'Contenido del bloqueo ilegible.');
      return { holder: null, modifiedAt };
    }
  }

  private isAbandoned(state: LockFileState): boolean {
    if (state.holder) {
      return !this.isProcessAlive(state.holder.pid);
    }

    return this.now().getTime() - state.modifiedAt.getTime() > this.options.staleAfterMs;
  }
}
