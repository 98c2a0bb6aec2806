import { RefreshTokenStore } from './refresh-token.service';
import { Logger } from '../utils/logger';

/**
 * Periodically deletes expired refresh-token rows. Expiry is already enforced
 * on read; this only keeps the table small.
 */
export class RefreshTokenCleanupScheduler {
  private intervalId: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: RefreshTokenStore,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.intervalId) {
      Logger.warn('Refresh token cleanup is already running');
      return;
    }

    Logger.info('Starting refresh token cleanup', { intervalMinutes: this.intervalMs / 60000 });

    this.intervalId = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        Logger.error('Error in periodic refresh token cleanup', error);
      });
    }, this.intervalMs);
    // Never keep the process alive just for cleanup
    this.intervalId.unref();
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      Logger.info('Refresh token cleanup stopped');
    }
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  async runOnce(): Promise<number> {
    const deleted = await this.store.purgeExpired();
    if (deleted > 0) {
      Logger.info('Deleted expired refresh tokens', { deleted });
    }
    return deleted;
  }
}
