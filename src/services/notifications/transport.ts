// Push notification transports

import { z } from 'zod';
import type { Logger } from '../../logger.js';
import type { MulticastResult, PushMessage, PushTransport } from './types.js';

const GatewayResponseSchema = z.object({
  successCount: z.number().int().min(0),
  failureCount: z.number().int().min(0),
});

export interface HttpPushTransportConfig {
  url: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * Posts multicast messages to an HTTP push gateway.
 * Any transport-level failure counts every token as failed.
 */
export class HttpPushTransport implements PushTransport {
  readonly name = 'http';

  constructor(
    private readonly config: HttpPushTransportConfig,
    private readonly logger: Logger,
  ) {}

  async sendToToken(token: string, message: PushMessage): Promise<boolean> {
    const result = await this.sendToMany([token], message);
    return result.successCount === 1;
  }

  async sendToMany(tokens: string[], message: PushMessage): Promise<MulticastResult> {
    if (tokens.length === 0) {
      return { successCount: 0, failureCount: 0 };
    }

    try {
      const response = await fetch(this.config.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
        },
        body: JSON.stringify({
          tokens,
          notification: { title: message.title, body: message.body },
          data: message.data,
          priority: message.priority,
          sound: message.sound,
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs ?? 10000),
      });

      if (!response.ok) {
        const body = await response.text();
        this.logger.warn({ status: response.status, body: body.slice(0, 200) }, 'Push gateway rejected request');
        return { successCount: 0, failureCount: tokens.length };
      }

      const parsed = GatewayResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.warn('Push gateway returned an unexpected response');
        return { successCount: 0, failureCount: tokens.length };
      }
      return parsed.data;
    } catch (err) {
      this.logger.warn({ err, recipients: tokens.length }, 'Push gateway request failed');
      return { successCount: 0, failureCount: tokens.length };
    }
  }
}

/** Used when no gateway is configured */
export class DisabledPushTransport implements PushTransport {
  readonly name = 'disabled';

  constructor(private readonly logger: Logger) {}

  async sendToToken(token: string, message: PushMessage): Promise<boolean> {
    const result = await this.sendToMany([token], message);
    return result.successCount > 0;
  }

  async sendToMany(tokens: string[], message: PushMessage): Promise<MulticastResult> {
    this.logger.debug({ title: message.title, recipients: tokens.length }, 'Push disabled, notification not sent');
    return { successCount: 0, failureCount: tokens.length };
  }
}
