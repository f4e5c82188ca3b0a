import type { TriageStore } from '../../db/index.js';
import type { Logger } from '../../logger.js';
import type { Alert, AlertVariant, SeverityLevel } from '../../models/types.js';
import { AppError } from '../../utils/errors.js';
import { Mutex } from '../../utils/mutex.js';
import { ALERT_POLICIES, classifyAlertSeverity, formatAlertMessage, payloadData } from './policy.js';
import type {
  AcknowledgeResult,
  AlertPublisher,
  AlertSubject,
  DeliveryReport,
  DispatchOptions,
  DispatchResult,
  PushMessage,
  PushTransport,
} from './types.js';

export interface NotificationServiceOptions {
  store: TriageStore;
  transport: PushTransport;
  logger: Logger;
  now?: () => Date;
  publisher?: AlertPublisher;
}

export interface AlertListOptions {
  acknowledged?: boolean;
  limit?: number;
}

export class NotificationService {
  private readonly store: TriageStore;
  private readonly transport: PushTransport;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly ackMutex = new Mutex();
  private publisher: AlertPublisher | null;

  constructor(options: NotificationServiceOptions) {
    this.store = options.store;
    this.transport = options.transport;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.publisher = options.publisher ?? null;
  }

  setPublisher(publisher: AlertPublisher | null): void {
    this.publisher = publisher;
  }

  /**
   * Persist an alert record. Throws if the store write fails.
   */
  async createAlert(subject: AlertSubject, variant: AlertVariant, data: Record<string, string> = {}): Promise<Alert> {
    const message = formatAlertMessage(subject, variant);
    const alert: Alert = {
      id: this.store.alerts.newId(),
      severity: classifyAlertSeverity(variant.type, message),
      title: ALERT_POLICIES[variant.type].title,
      message,
      patientId: subject.patientId,
      patientName: subject.patientName,
      visitId: subject.visitId,
      data,
      createdAt: this.now().toISOString(),
      acknowledged: false,
      acknowledgedBy: null,
      acknowledgedAt: null,
      ...variant,
    };

    const saved = await this.store.alerts.insert(alert);
    this.logger.info({ alertId: saved.id, type: saved.type, severity: saved.severity, visitId: subject.visitId }, 'Alert created');
    return saved;
  }

  /**
   * Persist, publish to realtime listeners, then push to doctors.
   * Publication and delivery failures are logged and reported, never thrown.
   */
  async dispatch(subject: AlertSubject, variant: AlertVariant, options: DispatchOptions = {}): Promise<DispatchResult> {
    const alert = await this.createAlert(subject, variant, options.data);
    await this.publish(alert);

    const policy = ALERT_POLICIES[alert.type];
    const delivery = await this.sendToDoctors(
      {
        title: policy.title,
        body: alert.message,
        data: {
          type: alert.type,
          alertId: alert.id,
          patientId: subject.patientId,
          visitId: subject.visitId,
          timestamp: alert.createdAt,
          ...payloadData(variant),
          ...(options.data ?? {}),
        },
        priority: policy.priority,
        sound: policy.sound,
      },
      options.doctorIds,
    );

    return { alert, delivery };
  }

  async notifyLongWait(
    subject: AlertSubject,
    waitMinutes: number,
    overageMinutes: number,
    severityLevel: SeverityLevel,
  ): Promise<DispatchResult> {
    return this.dispatch(subject, { type: 'long_wait', payload: { waitMinutes, overageMinutes, severityLevel } });
  }

  /**
   * Fan out to device tokens of the given doctors, or every registered doctor device.
   */
  async sendToDoctors(message: PushMessage, doctorIds?: string[]): Promise<DeliveryReport> {
    try {
      const devices = await this.store.devices.query({ where: { role: 'doctor' } });
      const tokens = Array.from(
        new Set(
          devices
            .filter(device => !doctorIds || doctorIds.length === 0 || doctorIds.includes(device.userId))
            .map(device => device.token),
        ),
      );

      if (tokens.length === 0) {
        this.logger.debug({ title: message.title }, 'No doctor devices registered');
        return { recipients: 0, successCount: 0, failureCount: 0, skipped: 'no_recipients' };
      }

      const result = await this.transport.sendToMany(tokens, message);
      if (result.failureCount > 0) {
        this.logger.warn(
          { transport: this.transport.name, failed: result.failureCount, recipients: tokens.length },
          'Some push notifications failed',
        );
      }
      return { recipients: tokens.length, ...result };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.logger.error({ err }, 'Push delivery failed');
      return { recipients: 0, successCount: 0, failureCount: 0, error };
    }
  }

  async getActiveAlerts(limit = 50): Promise<Alert[]> {
    return this.listAlerts({ acknowledged: false, limit });
  }

  async listAlerts(options: AlertListOptions = {}): Promise<Alert[]> {
    return this.store.alerts.query({
      where: options.acknowledged === undefined ? undefined : { acknowledged: options.acknowledged },
      orderBy: [{ field: 'createdAt', direction: 'desc' }],
      limit: options.limit,
    });
  }

  /**
   * One-way: a second acknowledgment leaves the record untouched and reports it.
   */
  async acknowledge(alertId: string, doctorId: string): Promise<AcknowledgeResult> {
    return this.ackMutex.runExclusive(async () => {
      const alert = await this.store.alerts.get(alertId);
      if (!alert) {
        throw AppError.notFound(`Alert ${alertId} not found`);
      }
      if (alert.acknowledged) {
        return { alert, alreadyAcknowledged: true };
      }

      const updated = await this.store.alerts.update(alertId, {
        acknowledged: true,
        acknowledgedBy: doctorId,
        acknowledgedAt: this.now().toISOString(),
      });
      if (!updated) {
        throw AppError.notFound(`Alert ${alertId} not found`);
      }

      this.logger.info({ alertId, doctorId }, 'Alert acknowledged');
      return { alert: updated, alreadyAcknowledged: false };
    });
  }

  private async publish(alert: Alert): Promise<void> {
    if (!this.publisher) return;
    try {
      await this.publisher(alert);
    } catch (err) {
      this.logger.warn({ err, alertId: alert.id }, 'Alert publisher failed');
    }
  }
}
