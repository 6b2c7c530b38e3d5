/**
 * Expo Push Transport
 * Delivers notifications through Expo's push service
 */

import { z } from 'zod';
import {
  circuitBreakers,
  maskToken,
  serializeError,
  type CircuitBreakerConfig,
  type CircuitBreakerRegistry,
} from '@lastcup/platform-core';
import type { IPushTransport } from '../../domains/notifications/ports/IPushTransport';
import { PushTransportError } from '../../domains/notifications/errors';
import { getLogger } from '../../config/logging';

const logger = getLogger('expo-push-transport');

export const DEFAULT_EXPO_PUSH_URL = 'https://exp.host/--/api/v2/push/send';
const CIRCUIT_NAME = 'expo-push-api';

const CIRCUIT_CONFIG: CircuitBreakerConfig = {
  timeout: 20000,
  errorThresholdPercentage: 50,
  resetTimeout: 60000,
  volumeThreshold: 5,
};

export interface ExpoPushMessage {
  to: string;
  title: string;
  body: string;
  sound: 'default' | null;
  priority: 'default' | 'normal' | 'high';
  channelId?: string;
}

const expoPushTicketSchema = z.object({
  status: z.enum(['ok', 'error']),
  id: z.string().optional(),
  message: z.string().optional(),
  details: z.object({ error: z.string().optional() }).passthrough().optional(),
});

const expoPushResponseSchema = z.object({
  data: z.array(expoPushTicketSchema),
});

export type ExpoPushTicket = z.infer<typeof expoPushTicketSchema>;

export interface ExpoPushTransportOptions {
  endpoint?: string;
  accessToken?: string;
  requestTimeoutMs?: number;
  circuitBreakerRegistry?: CircuitBreakerRegistry;
}

export class ExpoPushTransport implements IPushTransport {
  private readonly maxBatchSize = 100;
  private readonly endpoint: string;
  private readonly accessToken?: string;
  private readonly requestTimeoutMs: number;
  private readonly breakers: CircuitBreakerRegistry;

  constructor(options: ExpoPushTransportOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_EXPO_PUSH_URL;
    this.accessToken = options.accessToken;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 15000;
    this.breakers = options.circuitBreakerRegistry ?? circuitBreakers;
    if (!this.breakers.isConfigured(CIRCUIT_NAME)) {
      this.breakers.configure(CIRCUIT_NAME, CIRCUIT_CONFIG);
    }
  }

  async sendToTokens(tokens: readonly string[], title: string, body: string): Promise<void> {
    if (tokens.length === 0) return;

    const messages: ExpoPushMessage[] = tokens.map(to => ({
      to,
      title,
      body,
      sound: 'default',
      priority: 'high',
      channelId: 'default',
    }));

    const tickets: ExpoPushTicket[] = [];
    for (let i = 0; i < messages.length; i += this.maxBatchSize) {
      tickets.push(...(await this.sendBatch(messages.slice(i, i + this.maxBatchSize))));
    }

    const failed = tickets
      .map((ticket, index) => ({ ticket, token: tokens[index] }))
      .filter(({ ticket }) => ticket.status === 'error');

    if (failed.length === 0) return;

    const failures = failed.map(({ ticket, token }) => ({
      recipient: maskToken(token),
      error: ticket.details?.error ?? ticket.message ?? 'unknown',
    }));

    if (failed.length === tickets.length) {
      throw new PushTransportError('Every push ticket was rejected', { tokenCount: tokens.length, failures });
    }

    logger.warn('Some push tickets were rejected', {
      tokenCount: tokens.length,
      rejectedCount: failed.length,
      failures,
    });
  }

  private async sendBatch(messages: ExpoPushMessage[]): Promise<ExpoPushTicket[]> {
    logger.debug('Sending push batch', {
      count: messages.length,
      recipients: messages.map(m => maskToken(m.to)),
    });

    try {
      const tickets = await this.breakers.execute(CIRCUIT_NAME, () => this.post(messages));

      logger.debug('Push batch sent', {
        total: tickets.length,
        success: tickets.filter(t => t.status === 'ok').length,
        errors: tickets.filter(t => t.status === 'error').length,
      });

      return tickets;
    } catch (error) {
      if (error instanceof PushTransportError) throw error;
      throw new PushTransportError(
        error instanceof Error ? error.message : String(error),
        { tokenCount: messages.length, circuitOpen: this.breakers.isOpen(CIRCUIT_NAME), error: serializeError(error) },
        error instanceof Error ? error : undefined
      );
    }
  }

  private async post(messages: ExpoPushMessage[]): Promise<ExpoPushTicket[]> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Accept-Encoding': 'gzip, deflate',
      'Content-Type': 'application/json',
    };
    if (this.accessToken) {
      headers.Authorization = `Bearer ${this.accessToken}`;
    }

    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify(messages),
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new PushTransportError(`Expo API error: ${response.status}`, {
        status: response.status,
        tokenCount: messages.length,
        response: errorText.substring(0, 500),
      });
    }

    const parsed = expoPushResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PushTransportError('Malformed Expo API response', { tokenCount: messages.length });
    }
    if (parsed.data.data.length !== messages.length) {
      throw new PushTransportError('Expo API returned a ticket count that does not match the batch', {
        tokenCount: messages.length,
        ticketCount: parsed.data.data.length,
      });
    }
    return parsed.data.data;
  }
}
