import type { Alert, AlertVariant, ConditionChange, SeverityLevel } from '../../models/types.js';

export type PushPriority = 'high' | 'normal';

export interface AlertPolicy {
  title: string;
  priority: PushPriority;
  sound: string;
}

export interface PushMessage {
  title: string;
  body: string;
  data: Record<string, string>;
  priority: PushPriority;
  sound: string;
}

export interface MulticastResult {
  successCount: number;
  failureCount: number;
}

export interface PushTransport {
  readonly name: string;
  sendToToken(token: string, message: PushMessage): Promise<boolean>;
  sendToMany(tokens: string[], message: PushMessage): Promise<MulticastResult>;
}

export interface DeliveryReport {
  recipients: number;
  successCount: number;
  failureCount: number;
  skipped?: 'no_recipients';
  error?: string;
}

/** Who an alert is about */
export interface AlertSubject {
  patientId: string;
  patientName: string;
  visitId: string;
}

export interface DispatchResult {
  alert: Alert;
  delivery: DeliveryReport;
}

export interface DispatchOptions {
  /** Restrict push delivery to these doctors; defaults to every registered doctor device */
  doctorIds?: string[];
  data?: Record<string, string>;
}

export type AlertPublisher = (alert: Alert) => void | Promise<void>;

export type ClinicalTransition =
  | {
      kind: 'initial';
      level: SeverityLevel;
      score: number;
      vitalAbnormalities: string[];
    }
  | {
      kind: 'reassessment';
      oldLevel: SeverityLevel;
      newLevel: SeverityLevel;
      originalScore: number;
      score: number;
      conditionChange: ConditionChange;
      vitalAbnormalities: string[];
    }
  | {
      kind: 'long_wait';
      severityLevel: SeverityLevel;
      waitMinutes: number;
      overageMinutes: number;
    };

export interface AcknowledgeResult {
  alert: Alert;
  alreadyAcknowledged: boolean;
}

export type { AlertVariant };
