// ============================================================================
// RUTA: src/domain/entities/ChatMember.ts
// ============================================================================

export const CHAT_MEMBER_NOT_FOUND = 'not_found' as const;

export interface ChatMemberProfile {
  readonly username: string;
  readonly displayName: string | null;
  readonly createdAt: string;
  readonly joinedAt: string | null;
}

export interface ChatMemberMissing {
  readonly error: typeof CHAT_MEMBER_NOT_FOUND;
}

export type ChatMemberLookup = ChatMemberProfile | ChatMemberMissing;

/**
 * Resultado de una pasada de búsquedas por ID de Discord. Un ID ausente del mapa nunca se
 * consultó o falló por transporte; un ID con `error` se consultó y no pertenece al servidor.
 */
export type ChatMemberMap = ReadonlyMap<string, ChatMemberLookup>;

export const isChatMemberMissing = (lookup: ChatMemberLookup): lookup is ChatMemberMissing =>
  'error' in lookup;

export const resolvedChatMember = (lookup: ChatMemberLookup | undefined): ChatMemberProfile | null => {
  if (!lookup || isChatMemberMissing(lookup)) {
    return null;
  }

  return lookup;
};
