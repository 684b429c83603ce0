import axios, { AxiosInstance } from 'axios';
import type { Logger } from '../logger';

export interface NotificationEmitter {
  notify(eventType: string, data: Record<string, unknown>, log?: Logger): Promise<boolean>;
}

export interface NotificationServiceOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Best-effort publisher to the notification service.
 * Resolves true if delivered, false otherwise; never rejects.
 */
export class NotificationService implements NotificationEmitter {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: NotificationServiceOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
    });
    this.logger = options.logger;
  }

  async notify(eventType: string, data: Record<string, unknown>, log: Logger = this.logger): Promise<boolean> {
    try {
      await this.http.post('/notifications', { event_type: eventType, data });
      log.debug({ eventType }, 'notification_sent');
      return true;
    } catch (error) {
      const reason = axios.isAxiosError(error)
        ? error.response
          ? `status ${error.response.status}`
          : error.code ?? error.message
        : String(error);

      log.warn({ eventType, reason }, 'notification_failed');
      return false;
    }
  }
}
