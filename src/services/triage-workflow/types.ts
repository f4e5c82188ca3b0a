import type { QueueEntry, TriageResultRecord, Visit } from '../../models/types.js';
import type { DeliveryReport } from '../notifications/index.js';
import type { SeverityUpdate } from '../queue/index.js';
import type { Reassessment } from '../triage/index.js';

/** A downstream step that failed after scoring succeeded */
export interface WorkflowIssue {
  stage: 'queue' | 'notification';
  message: string;
}

export interface AlertSummary {
  alertId: string;
  type: string;
  severity: string;
  delivery: DeliveryReport;
}

export interface AssessResponse {
  visitId: string;
  visit: Visit;
  triageResult: TriageResultRecord;
  queueEntry: QueueEntry | null;
  alerts: AlertSummary[];
  issues: WorkflowIssue[];
}

export interface FollowUpResponse {
  visitId: string;
  reassessment: Reassessment;
  triageResult: TriageResultRecord;
  severityChanged: boolean;
  queueUpdate: SeverityUpdate | null;
  alerts: AlertSummary[];
  issues: WorkflowIssue[];
}

export interface TriageResultView {
  visit: Visit;
  triageResult: TriageResultRecord | null;
  history: TriageResultRecord[];
}
