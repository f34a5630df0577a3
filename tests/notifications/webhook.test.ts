/**
 * Tests for the webhook channel: SSRF guard, payload signing and delivery.
 */

import { createHmac } from 'crypto';
import { NotificationMessage } from '../../src/adapters/interfaces';
import {
  WebhookNotificationChannel,
  signPayload,
  validateWebhookUrl,
} from '../../src/notifications/webhook';
import type { WebhookDeliveryFn, WebhookPayload } from '../../src/notifications/webhook';

const message: NotificationMessage = {
  id: 'exe_1:execution.failed',
  event: 'execution.failed',
  executionId: 'exe_1',
  service: 'checkout',
  artifactId: 'checkout:2.0.0',
  status: 'FAILED',
  text: '[checkout] execution exe_1 for artifact checkout:2.0.0: FAILED',
  auditRef: '/api/v1/executions/exe_1/audit',
  urgent: false,
  timestamp: '2026-01-01T00:00:00.000Z',
};

describe('validateWebhookUrl', () => {
  it('rejects localhost', () => {
    expect(validateWebhookUrl('http://localhost:3000/hook')).toBe('Webhook URL must not point to localhost: localhost');
    expect(validateWebhookUrl('http://127.0.0.1:8080/hook')).not.toBeNull();
    expect(validateWebhookUrl('http://[::1]/hook')).not.toBeNull();
  });

  it('rejects cloud metadata endpoints', () => {
    expect(validateWebhookUrl('http://169.254.169.254/latest/meta-data')).toBe(
      'Webhook URL must not point to cloud metadata endpoints: 169.254.169.254',
    );
    expect(validateWebhookUrl('http://metadata.google.internal/computeMetadata')).not.toBeNull();
  });

  it('rejects private and reserved ranges', () => {
    expect(validateWebhookUrl('http://10.1.2.3/hook')).toBe('Webhook URL must not point to private IP range: 10.1.2.3');
    expect(validateWebhookUrl('http://172.16.0.1/hook')).not.toBeNull();
    expect(validateWebhookUrl('http://172.31.255.255/hook')).not.toBeNull();
    expect(validateWebhookUrl('http://192.168.1.1/hook')).not.toBeNull();
    expect(validateWebhookUrl('http://169.254.1.1/hook')).toBe('Webhook URL must not point to link-local range: 169.254.1.1');
    expect(validateWebhookUrl('http://0.0.0.0/hook')).not.toBeNull();
  });

  it('rejects other protocols and malformed URLs', () => {
    expect(validateWebhookUrl('ftp://hooks.example.com/deploys')).toBe(
      'Webhook URL must use http or https protocol, got: ftp:',
    );
    expect(validateWebhookUrl('not-a-url')).toBe('Invalid webhook URL: not-a-url');
  });

  it('allows public hosts', () => {
    expect(validateWebhookUrl('https://hooks.example.com/deploys')).toBeNull();
    expect(validateWebhookUrl('http://172.32.0.1/hook')).toBeNull();
    expect(validateWebhookUrl('http://8.8.8.8/hook')).toBeNull();
  });
});

describe('signPayload', () => {
  it('is the hex HMAC-SHA256 of the body', () => {
    const body = JSON.stringify({ id: 'exe_1:execution.failed' });
    expect(signPayload(body, 'test-secret')).toBe(createHmac('sha256', 'test-secret').update(body).digest('hex'));
    expect(signPayload(body, 'test-secret')).toMatch(/^[0-9a-f]{64}$/);
    expect(signPayload(body, 'other-secret')).not.toBe(signPayload(body, 'test-secret'));
  });
});

describe('WebhookNotificationChannel', () => {
  it('posts the message with its channel and the signing secret', async () => {
    const calls: Array<{ url: string; payload: WebhookPayload; secret?: string }> = [];
    const deliveryFn: WebhookDeliveryFn = async (url, payload, secret) => {
      calls.push({ url, payload, secret });
      return { statusCode: 204 };
    };
    const channel = new WebhookNotificationChannel({
      url: 'https://hooks.example.com/deploys',
      signingSecret: 'test-secret',
      deliveryFn,
    });

    await channel.send(message, '#checkout-deploys');

    expect(calls).toEqual([
      {
        url: 'https://hooks.example.com/deploys',
        payload: { ...message, channel: '#checkout-deploys' },
        secret: 'test-secret',
      },
    ]);
  });

  it('throws on a non-2xx response', async () => {
    const channel = new WebhookNotificationChannel({
      url: 'https://hooks.example.com/deploys',
      deliveryFn: async () => ({ statusCode: 410 }),
    });
    await expect(channel.send(message, '#checkout-deploys')).rejects.toThrow('Webhook returned HTTP 410');
  });

  it('refuses an unsafe URL before delivering', async () => {
    const deliveryFn = jest.fn<ReturnType<WebhookDeliveryFn>, Parameters<WebhookDeliveryFn>>();
    const channel = new WebhookNotificationChannel({ url: 'http://10.0.0.5/hook', deliveryFn });

    await expect(channel.send(message, '#checkout-deploys')).rejects.toThrow(
      'Webhook URL must not point to private IP range: 10.0.0.5',
    );
    expect(deliveryFn).not.toHaveBeenCalled();
  });
});
