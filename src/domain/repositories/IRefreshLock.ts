// ============================================================================
// RUTA: src/domain/repositories/IRefreshLock.ts
// ============================================================================

export interface RefreshLockHandle {
  release(): Promise<void>;
}

export interface IRefreshLock {
  /** Lanza `RefreshInProgressError` si otra actualización mantiene el bloqueo. */
  acquire(): Promise<RefreshLockHandle>;
}
