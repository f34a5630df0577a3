/**
 * Webhook notification channel.
 *
 * Delivers notification messages to an HTTP endpoint via POST. Includes an
 * HMAC signature for payload verification when a signing secret is
 * configured. Retries network errors and 5xx responses with exponential
 * backoff; 4xx responses fail immediately.
 */

import { createHmac } from 'crypto';
import { NotificationChannel, NotificationMessage } from '../adapters/interfaces';

/** Body posted to the webhook endpoint. */
export interface WebhookPayload extends NotificationMessage {
  channel: string;
}

/** Webhook delivery function type (injectable for testing). */
export type WebhookDeliveryFn = (
  url: string,
  payload: WebhookPayload,
  signingSecret?: string,
) => Promise<{ statusCode: number }>;

export interface WebhookChannelOptions {
  url: string;
  signingSecret?: string;
  deliveryFn?: WebhookDeliveryFn;
}

/**
 * Validate that a webhook URL is safe to send HTTP requests to.
 * Returns an error message if the URL is unsafe, or null if safe.
 */
export function validateWebhookUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid webhook URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Webhook URL must use http or https protocol, got: ${parsed.protocol}`;
  }

  const hostname = parsed.hostname.toLowerCase();

  if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]') {
    return `Webhook URL must not point to localhost: ${hostname}`;
  }

  if (hostname === '169.254.169.254' || hostname === 'metadata.google.internal') {
    return `Webhook URL must not point to cloud metadata endpoints: ${hostname}`;
  }

  const ipv4Match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (ipv4Match) {
    const a = Number(ipv4Match[1]);
    const b = Number(ipv4Match[2]);
    if (a === 10) return `Webhook URL must not point to private IP range: ${hostname}`;
    if (a === 172 && b >= 16 && b <= 31) return `Webhook URL must not point to private IP range: ${hostname}`;
    if (a === 192 && b === 168) return `Webhook URL must not point to private IP range: ${hostname}`;
    if (a === 169 && b === 254) return `Webhook URL must not point to link-local range: ${hostname}`;
    if (a === 0) return `Webhook URL must not point to unspecified address: ${hostname}`;
  }

  return null;
}

const WEBHOOK_MAX_RETRIES = 3;
const WEBHOOK_BACKOFF_BASE_MS = 1000;

function webhookSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** HTTP webhook delivery using native fetch with HMAC signing and retry. */
const httpDelivery: WebhookDeliveryFn = async (
  url: string,
  payload: WebhookPayload,
  signingSecret?: string,
) => {
  const body = JSON.stringify(payload);
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': 'rollout-engine-webhook/0.1.0',
    'X-Rollout-Message-Id': payload.id,
    'X-Rollout-Event': payload.event,
  };

  if (signingSecret) {
    headers['X-Rollout-Signature'] = `sha256=${signPayload(body, signingSecret)}`;
  }

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= WEBHOOK_MAX_RETRIES; attempt++) {
    if (attempt > 0) {
      await webhookSleep(WEBHOOK_BACKOFF_BASE_MS * Math.pow(2, attempt - 1));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), 10_000);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
      clearTimeout(timeout);

      if (response.status < 500) {
        return { statusCode: response.status };
      }

      lastError = new Error(`Webhook returned HTTP ${response.status}`);
    } catch (err) {
      clearTimeout(timeout);
      lastError = err instanceof Error ? err : new Error('Unknown webhook error');
    }
  }

  throw lastError ?? new Error('Webhook delivery failed after retries');
};

/** Hex HMAC-SHA256 of a serialized payload. */
export function signPayload(body: string, secret: string): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

/** Notification channel that posts every message to one webhook URL. */
export class WebhookNotificationChannel implements NotificationChannel {
  private deliveryFn: WebhookDeliveryFn;

  constructor(private options: WebhookChannelOptions) {
    this.deliveryFn = options.deliveryFn ?? httpDelivery;
  }

  async send(message: NotificationMessage, channel: string): Promise<void> {
    const urlError = validateWebhookUrl(this.options.url);
    if (urlError) {
      throw new Error(urlError);
    }

    const payload: WebhookPayload = { ...message, channel };
    const response = await this.deliveryFn(this.options.url, payload, this.options.signingSecret);
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new Error(`Webhook returned HTTP ${response.statusCode}`);
    }
  }
}
