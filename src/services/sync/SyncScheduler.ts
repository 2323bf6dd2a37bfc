import cron, { ScheduledTask } from 'node-cron';
import { SyncInProgressError } from '../../types/errors';
import { SyncOrchestrator } from './SyncOrchestrator';

/**
 * Triggers background syncs on a cron schedule. A tick that lands while a
 * run is in progress is skipped.
 */
export class SyncScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private readonly orchestrator: SyncOrchestrator,
    private readonly expression: string
  ) {
    if (!cron.validate(expression)) {
      throw new Error(`Invalid AUTO_SYNC_CRON expression: ${expression}`);
    }
  }

  start(): void {
    if (this.task) {
      return;
    }

    this.task = cron.schedule(this.expression, () => {
      this.tick();
    });
    console.log(`✅ [AUTO-SYNC] Scheduled syncs with "${this.expression}"`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log('[AUTO-SYNC] Scheduler stopped');
    }
  }

  tick(): void {
    try {
      this.orchestrator.start().catch(error => console.error('❌ [AUTO-SYNC] Sync run failed:', error));
      console.log('[AUTO-SYNC] Sync triggered');
    } catch (error) {
      if (error instanceof SyncInProgressError) {
        console.log('[AUTO-SYNC] Sync already in progress, skipping tick');
        return;
      }
      console.error('❌ [AUTO-SYNC] Failed to trigger sync:', error);
    }
  }
}
