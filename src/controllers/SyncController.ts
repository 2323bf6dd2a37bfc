import { Request, Response } from 'express';
import { SyncOrchestrator } from '../services/sync/SyncOrchestrator';
import { SyncStatusStore } from '../services/sync/SyncStatusStore';
import { MailProvider } from '../services/email/MailProvider';
import { ProviderNotAuthenticatedError, SyncInProgressError } from '../types/errors';
import { SystemStatusResponse } from '../types/models';

/**
 * SyncController exposes the sync state machine over HTTP
 */
export class SyncController {
  constructor(
    private orchestrator: SyncOrchestrator,
    private status: SyncStatusStore,
    private provider: MailProvider
  ) {}

  /**
   * GET /api/system-status
   */
  async getSystemStatus(req: Request, res: Response): Promise<void> {
    const snapshot = this.status.snapshot();
    const body: SystemStatusResponse = {
      is_authenticated: this.provider.isAuthenticated(),
      sync_state: snapshot.state,
      sync_progress: snapshot.progress,
      sync_message: snapshot.message,
      is_ready: snapshot.isReady
    };
    res.json(body);
  }

  /**
   * POST /api/sync - Start a background sync
   */
  async startSync(req: Request, res: Response): Promise<void> {
    try {
      this.orchestrator
        .start()
        .catch(error => {
          console.error('❌ [SYNC] Background sync failed:', error);
        });

      res.status(202).json({
        status: 'started',
        message: 'Sync started in background'
      });
    } catch (error) {
      if (error instanceof SyncInProgressError) {
        res.status(409).json({
          error: 'Sync in progress',
          message: error.message
        });
        return;
      }

      if (error instanceof ProviderNotAuthenticatedError) {
        res.status(401).json({
          error: 'Not authenticated',
          message: error.message
        });
        return;
      }

      console.error('❌ Failed to start sync:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to start sync'
      });
    }
  }
}
