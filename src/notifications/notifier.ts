/**
 * Notifier.
 *
 * Turns terminal transitions and judgment gates into human-readable
 * messages and delivers them through the notification channel. Delivery is
 * retried with backoff; a failure is logged and reported to the caller but
 * never thrown into the pipeline. Message IDs are stable per execution and
 * event so receivers can de-duplicate at-least-once redelivery.
 */

import { NotificationChannel, NotificationMessage } from '../adapters/interfaces';
import { AuditLedger } from '../audit/audit-ledger';
import { Clock, isoNow, systemClock } from '../clock';
import { PipelineExecution } from '../domain/execution';
import { NotificationEvent, NotificationSettings } from '../domain/pipeline';
import { Logger, logger as rootLogger } from '../logger';

export interface NotifierOptions {
  maxAttempts: number;
  backoffMs: number;
  /** Receives every urgent message regardless of definition settings. */
  urgentChannel: string;
  clock?: Clock;
}

export class Notifier {
  private clock: Clock;
  private log: Logger;

  constructor(
    private channel: NotificationChannel,
    private ledger: AuditLedger,
    private options: NotifierOptions,
    log: Logger = rootLogger,
  ) {
    this.clock = options.clock ?? systemClock;
    this.log = log.child({ component: 'notifier' });
  }

  buildMessage(
    event: NotificationEvent,
    execution: PipelineExecution,
    extra?: { text?: string; urgent?: boolean },
  ): NotificationMessage {
    const summary = `[${execution.service}] execution ${execution.id} for artifact ${execution.artifact.id}: ${execution.status}`;
    return {
      id: `${execution.id}:${event}`,
      event,
      executionId: execution.id,
      service: execution.service,
      artifactId: execution.artifact.id,
      status: execution.status,
      text: extra?.text ? `${summary}. ${extra.text}` : summary,
      auditRef: this.ledger.reference(execution.id),
      urgent: extra?.urgent ?? false,
      timestamp: isoNow(this.clock),
    };
  }

  /**
   * Notify the definition's channel about an event. Urgent messages also
   * go to the urgent channel and ignore the event filter.
   * Returns false when any required delivery failed.
   */
  async notify(
    settings: NotificationSettings,
    event: NotificationEvent,
    execution: PipelineExecution,
    extra?: { text?: string; urgent?: boolean },
  ): Promise<boolean> {
    const urgent = extra?.urgent ?? false;
    if (!urgent && settings.events && !settings.events.includes(event)) {
      return true;
    }

    const message = this.buildMessage(event, execution, extra);
    const channels = urgent ? [settings.channel, this.options.urgentChannel] : [settings.channel];
    let delivered = true;
    for (const target of new Set(channels)) {
      if (!(await this.deliver(message, target))) delivered = false;
    }
    return delivered;
  }

  /** Send one message to one channel with retries. Never throws. */
  async deliver(message: NotificationMessage, channel: string): Promise<boolean> {
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        await this.channel.send(message, channel);
        return true;
      } catch (err) {
        this.log.warn('Notification delivery failed', {
          channel,
          messageId: message.id,
          attempt,
          maxAttempts: this.options.maxAttempts,
          error: err instanceof Error ? err.message : String(err),
        });
        if (attempt < this.options.maxAttempts) {
          await this.clock.sleep(this.options.backoffMs * Math.pow(2, attempt - 1));
        }
      }
    }
    if (message.urgent) {
      this.log.error('Urgent notification could not be delivered', {
        channel,
        messageId: message.id,
        executionId: message.executionId,
      });
    }
    return false;
  }
}
