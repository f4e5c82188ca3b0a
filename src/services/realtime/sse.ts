// Server-sent events listener over a raw Node response

import type { RealtimeEvent, RealtimeListener } from './RealtimeHub.js';

export const SSE_HEARTBEAT_MS = 30_000;

/** The slice of http.ServerResponse the listener writes to */
export interface SseResponse {
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  end(): unknown;
  once(event: 'close', listener: () => void): unknown;
}

export function formatSseEvent(event: RealtimeEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event.data)}\n\n`;
}

export class SseListener implements RealtimeListener {
  private heartbeat: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly res: SseResponse,
    private readonly heartbeatMs: number = SSE_HEARTBEAT_MS,
  ) {}

  open(): void {
    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.flushHeaders();

    // Comment lines keep proxies from timing out an idle stream
    this.heartbeat = setInterval(() => {
      if (this.res.writableEnded || this.res.destroyed) {
        this.stopHeartbeat();
        return;
      }
      this.res.write(': keep-alive\n\n');
    }, this.heartbeatMs);
    this.heartbeat.unref();
    this.res.once('close', () => this.stopHeartbeat());
  }

  get isHeartbeatActive(): boolean {
    return this.heartbeat !== null;
  }

  send(event: RealtimeEvent): void {
    if (this.res.writableEnded || this.res.destroyed) {
      throw new Error('SSE stream closed');
    }
    this.res.write(formatSseEvent(event));
  }

  close(): void {
    this.stopHeartbeat();
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }
}
