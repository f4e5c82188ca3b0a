import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createClock, RecordingTransport, silentLogger, type TestClock } from '../../../__tests__/fixtures.js';
import { createInMemoryStore, type TriageStore } from '../../../db/index.js';
import type { AlertVariant, CallerRole } from '../../../models/types.js';
import {
  classifyAlertSeverity,
  DisabledPushTransport,
  evaluateTransitions,
  formatAlertMessage,
  HttpPushTransport,
  NotificationService,
  type AlertSubject,
  type PushMessage,
} from '../index.js';

const subject: AlertSubject = { patientId: 'p-1', patientName: 'Ada Moreau', visitId: 'v-1' };

function newCritical(score: number): AlertVariant {
  return { type: 'new_critical', payload: { oldLevel: null, newLevel: 'critical', score } };
}

const message: PushMessage = {
  title: 'Test',
  body: 'Body',
  data: {},
  priority: 'high',
  sound: 'default',
};

async function registerDevice(store: TriageStore, userId: string, token: string, role: CallerRole = 'doctor') {
  await store.devices.insert({
    id: store.devices.newId(),
    userId,
    role,
    token,
    registeredAt: '2026-03-01T08:00:00.000Z',
  });
}

describe('alert policy', () => {
  it('classifies severity by type and message', () => {
    expect(classifyAlertSeverity('new_critical', 'anything')).toBe('critical');
    expect(classifyAlertSeverity('severity_change', 'possible EMERGENCY')).toBe('critical');
    expect(classifyAlertSeverity('vital_deterioration', 'vitals abnormal')).toBe('high');
    expect(classifyAlertSeverity('long_wait', 'waiting')).toBe('medium');
  });

  it('formats messages per alert type', () => {
    expect(
      formatAlertMessage(subject, {
        type: 'long_wait',
        payload: { waitMinutes: 10, overageMinutes: 5, severityLevel: 'critical' },
      }),
    ).toBe('Ada Moreau (CRITICAL) has been waiting for 10 minutes');
    expect(
      formatAlertMessage(subject, {
        type: 'severity_change',
        payload: { oldLevel: 'critical', newLevel: 'moderate', score: 55 },
      }),
    ).toBe("Ada Moreau's severity changed from CRITICAL to MODERATE (Score: 55)");
    expect(
      formatAlertMessage(subject, {
        type: 'vital_deterioration',
        payload: { abnormalities: ['a', 'b', 'c', 'd'] },
      }),
    ).toBe("Ada Moreau's vital signs abnormal: a, b, c");
  });
});

describe('evaluateTransitions', () => {
  it('raises new_critical and vital_deterioration on a critical intake', () => {
    const alerts = evaluateTransitions({
      kind: 'initial',
      level: 'critical',
      score: 85,
      vitalAbnormalities: ['Critical heart rate: 130'],
    });
    expect(alerts).toEqual([
      { type: 'new_critical', payload: { oldLevel: null, newLevel: 'critical', score: 85 } },
      { type: 'vital_deterioration', payload: { abnormalities: ['Critical heart rate: 130'] } },
    ]);
  });

  it('raises nothing for a quiet intake', () => {
    expect(evaluateTransitions({ kind: 'initial', level: 'normal', score: 18, vitalAbnormalities: [] })).toEqual([]);
  });

  it('raises new_critical and follow_up_worsening when a follow-up escalates', () => {
    const alerts = evaluateTransitions({
      kind: 'reassessment',
      oldLevel: 'moderate',
      newLevel: 'critical',
      originalScore: 60,
      score: 80,
      conditionChange: 'worsened',
      vitalAbnormalities: [],
    });
    expect(alerts.map(a => a.type)).toEqual(['new_critical', 'follow_up_worsening']);
    expect(alerts[1]).toEqual({
      type: 'follow_up_worsening',
      payload: { originalScore: 60, newScore: 80, scoreChange: 20 },
    });
  });

  it('raises severity_change for a non-critical level change', () => {
    const alerts = evaluateTransitions({
      kind: 'reassessment',
      oldLevel: 'critical',
      newLevel: 'moderate',
      originalScore: 75,
      score: 60,
      conditionChange: 'improved',
      vitalAbnormalities: [],
    });
    expect(alerts).toEqual([
      { type: 'severity_change', payload: { oldLevel: 'critical', newLevel: 'moderate', score: 60 } },
    ]);
  });

  it('raises nothing when the level and condition hold', () => {
    const alerts = evaluateTransitions({
      kind: 'reassessment',
      oldLevel: 'moderate',
      newLevel: 'moderate',
      originalScore: 50,
      score: 50,
      conditionChange: 'same',
      vitalAbnormalities: [],
    });
    expect(alerts).toEqual([]);
  });
});

describe('NotificationService', () => {
  let store: TriageStore;
  let clock: TestClock;
  let transport: RecordingTransport;
  let service: NotificationService;

  beforeEach(() => {
    store = createInMemoryStore();
    clock = createClock();
    transport = new RecordingTransport();
    service = new NotificationService({ store, transport, logger: silentLogger, now: clock.now });
  });

  it('persists, publishes and pushes to every doctor device', async () => {
    await registerDevice(store, 'doc-1', 'token-a');
    await registerDevice(store, 'doc-2', 'token-b');
    await registerDevice(store, 'doc-2', 'token-b');
    await registerDevice(store, 'patient-1', 'token-p', 'patient');
    const published: string[] = [];
    service.setPublisher(alert => {
      published.push(alert.id);
    });

    const { alert, delivery } = await service.dispatch(subject, newCritical(85));

    expect(alert).toMatchObject({
      type: 'new_critical',
      severity: 'critical',
      title: 'New Critical Patient',
      message: 'Ada Moreau is now CRITICAL (Score: 85). Immediate attention required!',
      acknowledged: false,
      createdAt: '2026-03-01T09:00:00.000Z',
    });
    expect(await store.alerts.get(alert.id)).not.toBeNull();
    expect(published).toEqual([alert.id]);
    expect(delivery).toEqual({ recipients: 2, successCount: 2, failureCount: 0 });

    const [sent] = transport.sent;
    expect(sent?.tokens).toEqual(['token-a', 'token-b']);
    expect(sent?.message.data).toEqual({
      type: 'new_critical',
      alertId: alert.id,
      patientId: 'p-1',
      visitId: 'v-1',
      timestamp: '2026-03-01T09:00:00.000Z',
      newLevel: 'critical',
      score: '85',
    });
    expect(sent?.message.sound).toBe('emergency_alert.mp3');
  });

  it('restricts delivery to the given doctors', async () => {
    await registerDevice(store, 'doc-1', 'token-a');
    await registerDevice(store, 'doc-2', 'token-b');

    const { delivery } = await service.dispatch(
      subject,
      { type: 'vital_deterioration', payload: { abnormalities: ['Abnormal temperature: 38.2'] } },
      { doctorIds: ['doc-2'] },
    );
    expect(delivery.recipients).toBe(1);
    expect(transport.sent[0]?.tokens).toEqual(['token-b']);
  });

  it('skips delivery when no doctor device is registered', async () => {
    const { alert, delivery } = await service.notifyLongWait(subject, 12, 7, 'critical');
    expect(alert.type).toBe('long_wait');
    expect(delivery).toEqual({ recipients: 0, successCount: 0, failureCount: 0, skipped: 'no_recipients' });
  });

  it('keeps the alert when the transport fails', async () => {
    await registerDevice(store, 'doc-1', 'token-a');
    transport.failWith = new Error('gateway down');

    const { alert, delivery } = await service.dispatch(subject, {
      type: 'follow_up_worsening',
      payload: { originalScore: 40, newScore: 60, scoreChange: 20 },
    });
    expect(delivery.error).toBe('gateway down');
    expect(await store.alerts.get(alert.id)).toMatchObject({ type: 'follow_up_worsening' });
  });

  it('keeps dispatching when the publisher throws', async () => {
    service.setPublisher(() => {
      throw new Error('hub closed');
    });
    const { alert } = await service.dispatch(subject, {
      type: 'severity_change',
      payload: { oldLevel: 'critical', newLevel: 'moderate', score: 55 },
    });
    expect(alert.type).toBe('severity_change');
  });

  it('dispatches a change to critical as new_critical', async () => {
    const [variant] = evaluateTransitions({
      kind: 'reassessment',
      oldLevel: 'normal',
      newLevel: 'critical',
      originalScore: 60,
      score: 80,
      conditionChange: 'same',
      vitalAbnormalities: [],
    });
    if (!variant) throw new Error('expected an alert');

    const { alert } = await service.dispatch(subject, variant);
    expect(alert).toMatchObject({
      type: 'new_critical',
      message: 'Ada Moreau is now CRITICAL (Score: 80). Immediate attention required!',
    });
  });

  it('acknowledges once and reports repeats', async () => {
    const { alert } = await service.dispatch(subject, newCritical(90));
    clock.advanceMinutes(3);

    const first = await service.acknowledge(alert.id, 'doc-1');
    expect(first.alreadyAcknowledged).toBe(false);
    expect(first.alert).toMatchObject({
      acknowledged: true,
      acknowledgedBy: 'doc-1',
      acknowledgedAt: '2026-03-01T09:03:00.000Z',
    });

    const second = await service.acknowledge(alert.id, 'doc-2');
    expect(second.alreadyAcknowledged).toBe(true);
    expect(second.alert.acknowledgedBy).toBe('doc-1');
  });

  it('lets exactly one concurrent acknowledgment win', async () => {
    const { alert } = await service.dispatch(subject, newCritical(90));
    const results = await Promise.all([
      service.acknowledge(alert.id, 'doc-1'),
      service.acknowledge(alert.id, 'doc-2'),
    ]);
    expect(results.filter(r => !r.alreadyAcknowledged)).toHaveLength(1);
  });

  it('rejects an unknown alert', async () => {
    await expect(service.acknowledge('missing', 'doc-1')).rejects.toMatchObject({ statusCode: 404 });
  });

  it('lists active alerts newest first', async () => {
    const first = await service.dispatch(subject, newCritical(90));
    clock.advanceMinutes(1);
    const second = await service.notifyLongWait(subject, 65, 5, 'normal');
    clock.advanceMinutes(1);
    const third = await service.dispatch(subject, {
      type: 'vital_deterioration',
      payload: { abnormalities: ['Critical heart rate: 130'] },
    });
    await service.acknowledge(second.alert.id, 'doc-1');

    const active = await service.getActiveAlerts();
    expect(active.map(a => a.id)).toEqual([third.alert.id, first.alert.id]);

    const all = await service.listAlerts();
    expect(all).toHaveLength(3);
  });
});

describe('push transports', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('counts every token as failed when push is disabled', async () => {
    const transport = new DisabledPushTransport(silentLogger);
    expect(await transport.sendToMany(['a', 'b'], message)).toEqual({ successCount: 0, failureCount: 2 });
  });

  it('posts to the gateway and returns its counts', async () => {
    const fetchMock = vi.fn(
      async () => new Response(JSON.stringify({ successCount: 1, failureCount: 1 }), { status: 200 }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const transport = new HttpPushTransport({ url: 'http://push.test/send', apiKey: 'test-secret' }, silentLogger);
    expect(await transport.sendToMany(['a', 'b'], message)).toEqual({ successCount: 1, failureCount: 1 });
    expect(fetchMock).toHaveBeenCalledWith(
      'http://push.test/send',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      }),
    );
  });

  it('fails every token when the gateway errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('unavailable', { status: 503 })),
    );
    const transport = new HttpPushTransport({ url: 'http://push.test/send' }, silentLogger);
    expect(await transport.sendToMany(['a', 'b', 'c'], message)).toEqual({ successCount: 0, failureCount: 3 });
    expect(await transport.sendToToken('a', message)).toBe(false);
  });
});
