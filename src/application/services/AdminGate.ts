// ============================================================================
// RUTA: src/application/services/AdminGate.ts
// ============================================================================

import { createHash, timingSafeEqual } from 'node:crypto';

import { MissingConfigurationError, UnauthorizedActionError } from '@/shared/errors/domain.errors';

const digest = (value: string): Buffer => createHash('sha256').update(value, 'utf8').digest();

export class AdminGate {
  public constructor(private readonly expectedSecret: string | undefined) {}

  public assertAuthorized(candidate: string | undefined, action: string): void {
    if (!this.expectedSecret) {
      throw new MissingConfigurationError('ADMIN_PASSWORD');
    }

    if (!candidate || !timingSafeEqual(digest(candidate), digest(this.expectedSecret))) {
      throw new UnauthorizedActionError(action);
    }
  }
}
