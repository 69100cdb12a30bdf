// ============================================================================
// RUTA: src/domain/gateways/IGameIdentityGateway.ts
// ============================================================================

import type { GameProfile } from '@/domain/entities/GameProfile';
import type { IssueReporter } from '@/domain/entities/RefreshIssue';

export interface IGameIdentityGateway {
  resolveUsernamesToIds(usernames: readonly string[], report?: IssueReporter): Promise<Map<string, number>>;
  fetchProfiles(ids: readonly number[], report?: IssueReporter): Promise<Map<number, GameProfile>>;
}
