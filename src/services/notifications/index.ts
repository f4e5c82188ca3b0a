export { NotificationService } from './NotificationService.js';
export type { AlertListOptions, NotificationServiceOptions } from './NotificationService.js';
export { ALERT_POLICIES, classifyAlertSeverity, evaluateTransitions, formatAlertMessage, payloadData } from './policy.js';
export { DisabledPushTransport, HttpPushTransport } from './transport.js';
export type {
  AcknowledgeResult,
  AlertPolicy,
  AlertPublisher,
  AlertSubject,
  ClinicalTransition,
  DeliveryReport,
  DispatchOptions,
  DispatchResult,
  MulticastResult,
  PushMessage,
  PushTransport,
} from './types.js';
