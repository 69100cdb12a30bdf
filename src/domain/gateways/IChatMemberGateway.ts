// ============================================================================
// RUTA: src/domain/gateways/IChatMemberGateway.ts
// ============================================================================

import type { ChatMemberMap } from '@/domain/entities/ChatMember';
import type { IssueReporter } from '@/domain/entities/RefreshIssue';

export interface IChatMemberGateway {
  fetchMembers(chatIds: readonly string[], report?: IssueReporter): Promise<ChatMemberMap>;
}
