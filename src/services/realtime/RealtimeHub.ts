import { randomUUID } from 'crypto';
import type { Logger } from '../../logger.js';
import { AppError } from '../../utils/errors.js';

export type RealtimeChannel = 'queue' | 'alerts';

export interface RealtimeEvent {
  type: string;
  data: unknown;
}

export interface RealtimeListener {
  send(event: RealtimeEvent): void | Promise<void>;
}

/** Produces the full current view of a channel */
export type SnapshotSource = Record<RealtimeChannel, () => Promise<unknown>>;

export interface BroadcastReport {
  delivered: number;
  failed: number;
}

interface Connection {
  id: string;
  channel: RealtimeChannel;
  listener: RealtimeListener;
  connectedAt: string;
}

export interface RealtimeHubOptions {
  snapshots: SnapshotSource;
  logger: Logger;
}

export class RealtimeHub {
  private readonly connections = new Map<string, Connection>();
  private readonly snapshots: SnapshotSource;
  private readonly logger: Logger;

  constructor(options: RealtimeHubOptions) {
    this.snapshots = options.snapshots;
    this.logger = options.logger;
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Register a listener and send it the channel's current snapshot.
   * Aborting `closed` disconnects it, including while the snapshot is loading.
   */
  async connect(channel: RealtimeChannel, listener: RealtimeListener, closed?: AbortSignal): Promise<string> {
    const id = randomUUID();
    this.connections.set(id, { id, channel, listener, connectedAt: new Date().toISOString() });
    this.logger.debug({ connectionId: id, channel, connections: this.connections.size }, 'Realtime listener connected');

    if (closed) {
      if (closed.aborted) {
        this.disconnect(id);
        return id;
      }
      closed.addEventListener('abort', () => this.disconnect(id), { once: true });
    }

    await this.sendSnapshot(id, 'snapshot');
    return id;
  }

  disconnect(id: string): boolean {
    const removed = this.connections.delete(id);
    if (removed) {
      this.logger.debug({ connectionId: id, connections: this.connections.size }, 'Realtime listener disconnected');
    }
    return removed;
  }

  /** Explicit pull: resend the current snapshot to one connection */
  async refresh(id: string): Promise<void> {
    if (!this.connections.has(id)) {
      throw AppError.notFound(`Connection ${id} not found`);
    }
    await this.sendSnapshot(id, 'refresh');
  }

  /**
   * Best-effort fan-out. A failing listener is dropped and counted;
   * other listeners are unaffected.
   */
  async broadcast(event: RealtimeEvent, channel?: RealtimeChannel): Promise<BroadcastReport> {
    const targets = Array.from(this.connections.values()).filter(c => !channel || c.channel === channel);

    const results = await Promise.allSettled(targets.map(async c => c.listener.send(event)));

    let failed = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') return;
      failed++;
      const target = targets[index];
      if (target) {
        this.logger.warn({ err: result.reason, connectionId: target.id, event: event.type }, 'Realtime delivery failed');
        this.connections.delete(target.id);
      }
    });

    return { delivered: targets.length - failed, failed };
  }

  private async sendSnapshot(id: string, type: 'snapshot' | 'refresh'): Promise<void> {
    const pending = this.connections.get(id);
    if (!pending) return;

    const data = await this.snapshots[pending.channel]();
    // The listener may have gone away while the snapshot was built
    const connection = this.connections.get(id);
    if (!connection) return;

    try {
      await connection.listener.send({ type, data: { channel: connection.channel, connectionId: id, data } });
    } catch (err) {
      this.logger.warn({ err, connectionId: id }, 'Snapshot delivery failed');
      this.connections.delete(id);
    }
  }
}
