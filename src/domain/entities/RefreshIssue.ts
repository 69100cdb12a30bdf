// ============================================================================
// RUTA: src/domain/entities/RefreshIssue.ts
// ============================================================================

export type RefreshIssueSource = 'discord' | 'roblox';

export interface RefreshIssue {
  readonly source: RefreshIssueSource;
  readonly code: string;
  /** ID, usuario o lote afectado. */
  readonly subject: string;
  readonly message: string;
}

export type IssueReporter = (issue: RefreshIssue) => void;

export const ignoreIssue: IssueReporter = () => undefined;
