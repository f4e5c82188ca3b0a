// Alert policy: fixed type → title/priority/sound mapping, severity classification,
// message text, and the pure trigger rules deciding which alerts a transition raises.

import type { AlertSeverity, AlertType, AlertVariant } from '../../models/types.js';
import type { AlertPolicy, AlertSubject, ClinicalTransition } from './types.js';

export const ALERT_POLICIES: Record<AlertType, AlertPolicy> = {
  severity_change: { title: 'Patient Severity Changed', priority: 'high', sound: 'emergency_alert.mp3' },
  new_critical: { title: 'New Critical Patient', priority: 'high', sound: 'emergency_alert.mp3' },
  vital_deterioration: { title: 'Patient Vitals Deteriorating', priority: 'high', sound: 'warning.mp3' },
  long_wait: { title: 'Patient Waiting Too Long', priority: 'normal', sound: 'default' },
  follow_up_worsening: { title: 'Follow-up Shows Worsening', priority: 'high', sound: 'warning.mp3' },
};

const MAX_ABNORMALITIES_IN_MESSAGE = 3;

export function classifyAlertSeverity(type: AlertType, message: string): AlertSeverity {
  if (type.includes('critical') || message.toLowerCase().includes('emergency')) {
    return 'critical';
  }
  return ALERT_POLICIES[type].priority === 'high' ? 'high' : 'medium';
}

export function formatAlertMessage(subject: AlertSubject, variant: AlertVariant): string {
  const name = subject.patientName;

  switch (variant.type) {
    case 'new_critical':
      return `${name} is now CRITICAL (Score: ${variant.payload.score}). Immediate attention required!`;
    case 'severity_change':
      return (
        `${name}'s severity changed from ${variant.payload.oldLevel.toUpperCase()} ` +
        `to ${variant.payload.newLevel.toUpperCase()} (Score: ${variant.payload.score})`
      );
    case 'vital_deterioration':
      return `${name}'s vital signs abnormal: ${variant.payload.abnormalities
        .slice(0, MAX_ABNORMALITIES_IN_MESSAGE)
        .join(', ')}`;
    case 'long_wait':
      return `${name} (${variant.payload.severityLevel.toUpperCase()}) has been waiting for ${variant.payload.waitMinutes} minutes`;
    case 'follow_up_worsening':
      return (
        `${name}'s condition worsened on follow-up. ` +
        `Severity increased by ${variant.payload.scoreChange} points (now ${variant.payload.newScore})`
      );
  }
}

/** Flatten a typed payload into push-safe string data */
export function payloadData(variant: AlertVariant): Record<string, string> {
  const data: Record<string, string> = {};
  for (const [key, value] of Object.entries<unknown>(variant.payload)) {
    if (value === null || value === undefined) continue;
    data[key] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return data;
}

/**
 * Decide which alerts a clinical transition raises. Fires exactly:
 * - new_critical when a visit becomes critical (initially or from a lower level)
 * - severity_change when the level changes to a non-critical level
 * - vital_deterioration when the run found vital abnormalities
 * - follow_up_worsening when a follow-up reports a worsened condition
 * - long_wait for a sweep finding
 */
export function evaluateTransitions(transition: ClinicalTransition): AlertVariant[] {
  if (transition.kind === 'long_wait') {
    return [
      {
        type: 'long_wait',
        payload: {
          waitMinutes: transition.waitMinutes,
          overageMinutes: transition.overageMinutes,
          severityLevel: transition.severityLevel,
        },
      },
    ];
  }

  const alerts: AlertVariant[] = [];

  switch (transition.kind) {
    case 'initial':
      if (transition.level === 'critical') {
        alerts.push({
          type: 'new_critical',
          payload: { oldLevel: null, newLevel: 'critical', score: transition.score },
        });
      }
      break;

    case 'reassessment':
      if (transition.newLevel !== transition.oldLevel) {
        if (transition.newLevel === 'critical') {
          alerts.push({
            type: 'new_critical',
            payload: { oldLevel: transition.oldLevel, newLevel: 'critical', score: transition.score },
          });
        } else {
          alerts.push({
            type: 'severity_change',
            payload: { oldLevel: transition.oldLevel, newLevel: transition.newLevel, score: transition.score },
          });
        }
      }
      if (transition.conditionChange === 'worsened') {
        alerts.push({
          type: 'follow_up_worsening',
          payload: {
            originalScore: transition.originalScore,
            newScore: transition.score,
            scoreChange: transition.score - transition.originalScore,
          },
        });
      }
      break;
  }

  if (transition.vitalAbnormalities.length > 0) {
    alerts.push({ type: 'vital_deterioration', payload: { abnormalities: [...transition.vitalAbnormalities] } });
  }

  return alerts;
}
