// ============================================================================
// RUTA: src/domain/repositories/IRosterRepository.ts
// ============================================================================

import type { RosterSource } from '@/domain/entities/RosterEntry';

export interface IRosterRepository {
  load(): Promise<RosterSource>;
}
