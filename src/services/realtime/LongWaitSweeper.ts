// Periodic long-wait sweep: one long_wait alert per qualifying entry per run,
// broadcast to every realtime listener. Runs independently of any request.

import type { Logger } from '../../logger.js';
import type { NotificationService } from '../notifications/index.js';
import type { QueueManager } from '../queue/index.js';
import type { RealtimeHub } from './RealtimeHub.js';

export interface LongWaitSweeperOptions {
  queue: QueueManager;
  notifications: NotificationService;
  hub: RealtimeHub;
  intervalMs: number;
  logger: Logger;
}

export interface SweepReport {
  found: number;
  alerted: number;
  failed: number;
}

export class LongWaitSweeper {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(private readonly options: LongWaitSweeperOptions) {}

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch((err: unknown) => this.options.logger.error({ err }, 'Long-wait sweep crashed'));
    }, this.options.intervalMs);
    this.timer.unref();
    this.options.logger.info({ intervalMs: this.options.intervalMs }, 'Long-wait sweeper started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.options.logger.info('Long-wait sweeper stopped');
  }

  /**
   * Returns null when a previous sweep is still in flight.
   */
  async sweep(): Promise<SweepReport | null> {
    if (this.running) {
      this.options.logger.debug('Long-wait sweep already running, skipping');
      return null;
    }
    this.running = true;

    const { queue, notifications, hub, logger } = this.options;
    const report: SweepReport = { found: 0, alerted: 0, failed: 0 };

    try {
      const findings = await queue.findLongWaiting();
      report.found = findings.length;

      for (const finding of findings) {
        const { entry } = finding;
        try {
          const { alert } = await notifications.notifyLongWait(
            { patientId: entry.patientId, patientName: entry.patientName, visitId: entry.visitId },
            finding.waitMinutes,
            finding.overageMinutes,
            entry.severityLevel,
          );
          report.alerted++;

          await hub.broadcast({
            type: 'long_wait_alert',
            data: {
              alertId: alert.id,
              visitId: entry.visitId,
              patientName: entry.patientName,
              severityLevel: entry.severityLevel,
              waitMinutes: finding.waitMinutes,
              overageMinutes: finding.overageMinutes,
            },
          });
        } catch (err) {
          report.failed++;
          logger.warn({ err, visitId: entry.visitId }, 'Long-wait alert failed');
        }
      }

      if (report.found > 0) {
        logger.info(report, 'Long-wait sweep complete');
      }
    } catch (err) {
      logger.error({ err }, 'Long-wait sweep failed');
    } finally {
      this.running = false;
    }

    return report;
  }
}
