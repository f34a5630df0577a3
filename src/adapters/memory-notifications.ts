/**
 * In-process notification channel that keeps delivered messages.
 */

import { NotificationChannel, NotificationMessage } from './interfaces';

export class MemoryNotificationChannel implements NotificationChannel {
  readonly delivered: Array<{ channel: string; message: NotificationMessage }> = [];
  private failures = 0;

  failNext(count: number): void {
    this.failures = count;
  }

  async send(message: NotificationMessage, channel: string): Promise<void> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error(`channel ${channel} unavailable`);
    }
    this.delivered.push({ channel, message: { ...message } });
  }
}
