import { describe, expect, it, vi } from 'vitest';

import { LoadRosterViewUseCase } from '@/application/usecases/roster/LoadRosterViewUseCase';
import type { MergedRecord } from '@/domain/entities/MergedRecord';
import type { IRosterSnapshotRepository } from '@/domain/repositories/ISnapshotRepository';
import { CorruptSnapshotError, ValidationFailedError } from '@/shared/errors/domain.errors';

import { chatIdFor, mergedRecord } from '../../../helpers/fixtures';
import { createMockLogger } from '../../../helpers/logger';

const records: MergedRecord[] = [
  mergedRecord({ chatId: chatIdFor(1), chatUsername: 'alice', chatDisplayName: 'Alice', gameUsername: 'SkyBuilder' }),
  mergedRecord({ chatId: chatIdFor(2), chatUsername: 'bob', chatDisplayName: 'Bobby', gameUsername: null }),
  mergedRecord({ chatId: chatIdFor(3), chatUsername: null, chatDisplayName: 'N/A', gameUsername: 'StoneMason' }),
];

const createUseCase = (read: IRosterSnapshotRepository['read']) => {
  const snapshots: IRosterSnapshotRepository = { read: vi.fn(read), write: vi.fn(async () => undefined) };
  return { useCase: new LoadRosterViewUseCase(snapshots, createMockLogger()), snapshots };
};

describe('LoadRosterViewUseCase', () => {
  it('reports an empty view when no snapshot exists', async () => {
    const { useCase } = createUseCase(async () => null);

    await expect(useCase.execute()).resolves.toEqual({ status: 'empty' });
  });

  it('reports an empty view for an empty snapshot', async () => {
    const { useCase } = createUseCase(async () => []);

    await expect(useCase.execute({ query: 'alice' })).resolves.toEqual({ status: 'empty' });
  });

  it('turns a corrupt snapshot into a corrupt view', async () => {
    const { useCase } = createUseCase(async () => {
      throw new CorruptSnapshotError('combined_data.json');
    });

    await expect(useCase.execute()).resolves.toEqual({
      status: 'corrupt',
      message: 'No se pudo leer el snapshot combined_data.json. Es posible que esté corrupto.',
    });
  });

  it('propagates unexpected read errors', async () => {
    const { useCase } = createUseCase(async () => {
      throw new Error('EACCES');
    });

    await expect(useCase.execute()).rejects.toThrow('EACCES');
  });

  it('returns every record when there is no query', async () => {
    const { useCase } = createUseCase(async () => records);

    await expect(useCase.execute({ query: '   ' })).resolves.toEqual({
      status: 'ready',
      records,
      total: 3,
      query: null,
    });
  });

  it('filters case-insensitively across usernames and display name', async () => {
    const { useCase } = createUseCase(async () => records);

    const byGame = await useCase.execute({ query: 'MASON' });
    const byDisplay = await useCase.execute({ query: 'bobby' });
    const byChat = await useCase.execute({ query: 'ALI' });

    expect(byGame).toMatchObject({ status: 'ready', total: 3, query: 'MASON', records: [records[2]] });
    expect(byDisplay).toMatchObject({ records: [records[1]] });
    expect(byChat).toMatchObject({ records: [records[0]] });
  });

  it('returns a ready view with no records when nothing matches', async () => {
    const { useCase } = createUseCase(async () => records);

    await expect(useCase.execute({ query: 'zzz' })).resolves.toEqual({
      status: 'ready',
      records: [],
      total: 3,
      query: 'zzz',
    });
  });

  it('rejects overly long queries', async () => {
    const { useCase, snapshots } = createUseCase(async () => records);

    await expect(useCase.execute({ query: 'x'.repeat(101) })).rejects.toBeInstanceOf(ValidationFailedError);
    expect(snapshots.read).not.toHaveBeenCalled();
  });
});
