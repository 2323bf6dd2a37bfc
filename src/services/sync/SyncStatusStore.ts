import { SyncStatus } from '../../types/models';

const INITIAL_STATUS: SyncStatus = {
  state: 'idle',
  progress: 0,
  message: '',
  isReady: false
};

/**
 * Owns the sync status. The orchestrator is the only writer and applies
 * whole-record patches; readers get frozen snapshots. Once a run has
 * reported readiness it cannot be withdrawn.
 */
export class SyncStatusStore {
  private status: Readonly<SyncStatus> = Object.freeze({ ...INITIAL_STATUS }); // idle at startup

  snapshot(): Readonly<SyncStatus> {
    return this.status;
  }

  get isSyncing(): boolean {
    return this.status.state === 'syncing';
  }

  /**
   * Moves to 'syncing' unless a run is already in progress.
   * Returns false when the transition was refused.
   */
  begin(message: string = 'Starting sync...'): boolean {
    if (this.isSyncing) {
      return false;
    }
    this.apply({ state: 'syncing', progress: 0, message });
    return true;
  }

  /**
   * Progress and message update for the running sync
   */
  report(progress: number, message: string): void {
    this.apply({ progress, message });
  }

  markReady(): void {
    if (!this.status.isReady) {
      this.apply({ isReady: true });
    }
  }

  complete(message: string): void {
    this.apply({ state: 'completed', message, isReady: true });
  }

  fail(message: string): void {
    this.apply({ state: 'error', message });
  }

  private apply(patch: Partial<SyncStatus>): void {
    const next: SyncStatus = { ...this.status, ...patch };
    next.isReady = this.status.isReady || next.isReady;
    this.status = Object.freeze(next);
  }
}
