import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createClock,
  enqueueInput,
  insertPatient,
  insertVisit,
  silentLogger,
  type TestClock,
} from '../../../__tests__/fixtures.js';
import { createInMemoryStore, type TriageStore } from '../../../db/index.js';
import { computeWaitTime, QueueManager } from '../index.js';

describe('QueueManager', () => {
  let store: TriageStore;
  let clock: TestClock;
  let queue: QueueManager;

  beforeEach(() => {
    store = createInMemoryStore();
    clock = createClock('2026-03-01T09:00:00.000Z');
    queue = new QueueManager({ store, logger: silentLogger, now: clock.now });
  });

  it('orders by priority, then check-in time', async () => {
    await queue.enqueue(enqueueInput('v-normal', 'normal'));
    clock.advanceMinutes(1);
    await queue.enqueue(enqueueInput('v-moderate', 'moderate'));
    clock.advanceMinutes(1);
    await queue.enqueue(enqueueInput('v-critical-1', 'critical'));
    clock.advanceMinutes(1);
    await queue.enqueue(enqueueInput('v-critical-2', 'critical'));

    const stats = await queue.getStatistics();
    expect(stats.queue.map(e => e.visitId)).toEqual(['v-critical-1', 'v-critical-2', 'v-moderate', 'v-normal']);
    expect(stats.queue.map(e => e.queuePosition)).toEqual([1, 2, 3, 4]);
  });

  it('estimates waits from level base plus entries ahead', async () => {
    await queue.enqueue(enqueueInput('v1', 'normal'));
    await queue.enqueue(enqueueInput('v2', 'moderate'));
    await queue.enqueue(enqueueInput('v3', 'critical'));

    const stats = await queue.getStatistics();
    expect(stats.queue.map(e => e.estimatedWaitTime)).toEqual([0, 25, 50]);
    expect(stats).toMatchObject({
      totalPatients: 3,
      criticalCount: 1,
      moderateCount: 1,
      normalCount: 1,
      averageWaitTime: 25,
    });
    expect(await queue.estimateWaitTime('normal')).toBe(50);
  });

  it('computes the wait for an empty queue', () => {
    expect(computeWaitTime('critical', [])).toBe(0);
    expect(computeWaitTime('moderate', [])).toBe(15);
    expect(computeWaitTime('normal', [])).toBe(30);
  });

  it('assigns distinct positions 1..N under concurrent enqueues', async () => {
    const visitIds = Array.from({ length: 10 }, (_, i) => `v${i}`);
    await Promise.all(
      visitIds.map((id, i) => queue.enqueue(enqueueInput(id, i % 3 === 0 ? 'critical' : i % 3 === 1 ? 'moderate' : 'normal'))),
    );

    const stored = await store.queue.query();
    const positions = stored.map(e => e.queuePosition).sort((a, b) => a - b);
    expect(positions).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it('keeps a total order when mutations interleave', async () => {
    const patient = await insertPatient(store);
    const [a, b, c, d] = await Promise.all([1, 2, 3, 4].map(() => insertVisit(store, patient.id)));
    if (!a || !b || !c || !d) throw new Error('visits not created');

    await queue.enqueue(enqueueInput(a.id, 'normal', { checkedInAt: '2026-03-01T09:00:00.000Z' }));
    await queue.enqueue(enqueueInput(b.id, 'moderate', { checkedInAt: '2026-03-01T09:01:00.000Z' }));
    await queue.enqueue(enqueueInput(c.id, 'normal', { checkedInAt: '2026-03-01T09:02:00.000Z' }));
    await queue.enqueue(enqueueInput(d.id, 'critical', { checkedInAt: '2026-03-01T09:03:00.000Z' }));

    await Promise.all([
      queue.enqueue(enqueueInput('v-e', 'moderate', { checkedInAt: '2026-03-01T09:04:00.000Z' })),
      queue.updateSeverity(a.id, 90, 'critical'),
      queue.callPatient(d.id, 'doc-1'),
      queue.enqueue(enqueueInput('v-f', 'normal', { checkedInAt: '2026-03-01T09:05:00.000Z' })),
      queue.completeVisit(b.id),
    ]);

    const waiting = await store.queue.query({
      where: { status: 'waiting' },
      orderBy: [{ field: 'queuePosition', direction: 'asc' }],
    });
    expect(waiting.map(e => e.visitId)).toEqual([a.id, 'v-e', c.id, 'v-f']);
    expect(waiting.map(e => e.queuePosition)).toEqual([1, 2, 3, 4]);
    expect(waiting.map(e => e.estimatedWaitTime)).toEqual([0, 25, 50, 50]);

    expect(await queue.getEntryByVisit(b.id)).toBeNull();
    expect(await queue.getEntryByVisit(d.id)).toMatchObject({ status: 'in_progress', queuePosition: 0 });
  });

  it('writes nothing when requeued twice in a row', async () => {
    await queue.enqueue(enqueueInput('v1', 'normal'));
    await queue.enqueue(enqueueInput('v2', 'critical'));

    const first = await queue.requeue();
    const update = vi.spyOn(store.queue, 'update');
    const second = await queue.requeue();

    expect(update).not.toHaveBeenCalled();
    expect(second.entries).toEqual(first.entries);
  });

  it('reorders when severity changes', async () => {
    await queue.enqueue(enqueueInput('v1', 'moderate'));
    await queue.enqueue(enqueueInput('v2', 'normal'));

    const update = await queue.updateSeverity('v2', 90, 'critical');
    expect(update).toMatchObject({
      oldLevel: 'normal',
      newLevel: 'critical',
      levelChanged: true,
      priorityChanged: true,
    });
    expect(update.entry.queuePosition).toBe(1);
    expect(update.entry.priority).toBe(1);
    expect(update.entry.severityScore).toBe(90);
  });

  it('rejects a severity update for a visit that is not queued', async () => {
    await expect(queue.updateSeverity('missing', 80, 'critical')).rejects.toMatchObject({ statusCode: 404 });
  });

  it('calls a patient and removes them from the waiting order', async () => {
    const patient = await insertPatient(store);
    const visit = await insertVisit(store, patient.id);
    await queue.enqueue(enqueueInput(visit.id, 'normal'));
    await queue.enqueue(enqueueInput('other', 'normal'));

    const entry = await queue.callPatient(visit.id, 'doc-1');
    expect(entry).toMatchObject({
      status: 'in_progress',
      assignedDoctorId: 'doc-1',
      queuePosition: 0,
      calledAt: '2026-03-01T09:00:00.000Z',
    });

    const storedVisit = await store.visits.get(visit.id);
    expect(storedVisit?.status).toBe('in_progress');
    expect(storedVisit?.assignedDoctorId).toBe('doc-1');

    const stats = await queue.getStatistics();
    expect(stats.queue.map(e => e.visitId)).toEqual(['other']);
    expect(stats.queue[0]?.queuePosition).toBe(1);

    await expect(queue.callPatient(visit.id, 'doc-2')).rejects.toMatchObject({ statusCode: 409 });
  });

  it('completes a visit and drops its entry', async () => {
    const patient = await insertPatient(store);
    const visit = await insertVisit(store, patient.id);
    await queue.enqueue(enqueueInput(visit.id, 'moderate'));
    clock.advanceMinutes(20);

    const completed = await queue.completeVisit(visit.id);
    expect(completed.status).toBe('completed');
    expect(completed.completedAt).toBe('2026-03-01T09:20:00.000Z');
    expect(await queue.getEntryByVisit(visit.id)).toBeNull();

    await expect(queue.completeVisit(visit.id)).rejects.toMatchObject({ statusCode: 409 });
    await expect(queue.completeVisit('missing')).rejects.toMatchObject({ statusCode: 404 });
  });

  it('finds entries waiting past their level threshold', async () => {
    await queue.enqueue(enqueueInput('v-critical', 'critical'));
    await queue.enqueue(enqueueInput('v-normal', 'normal'));
    clock.advanceMinutes(10);

    const findings = await queue.findLongWaiting();
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({ waitMinutes: 10, overageMinutes: 5, thresholdMinutes: 5 });
    expect(findings[0]?.entry.visitId).toBe('v-critical');
  });

  it('does not flag an entry exactly at the threshold', async () => {
    await queue.enqueue(enqueueInput('v-critical', 'critical'));
    clock.advanceMinutes(5);
    expect(await queue.findLongWaiting()).toEqual([]);
  });

  it('notifies the change listener and survives its failures', async () => {
    const listener = vi.fn(async () => {
      throw new Error('listener down');
    });
    queue.setChangeListener(listener);

    const entry = await queue.enqueue(enqueueInput('v1', 'normal'));
    expect(entry.queuePosition).toBe(1);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(queue.getSnapshot().entries.map(e => e.visitId)).toEqual(['v1']);
  });
});
