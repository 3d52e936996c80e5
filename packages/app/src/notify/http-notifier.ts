/**
 * Outbound price-breach notification.
 *
 * One GET to `<baseUrl><code>` with a short timeout and no retry. Any HTTP
 * status counts as delivered; only transport failures are errors.
 */

import axios, { type AxiosInstance } from 'axios';
import { NotificationError, errorMessage } from '@yieldwatch/contracts';
import type { Logger } from '@yieldwatch/logger';

export const DEFAULT_NOTIFY_TIMEOUT_MS = 10_000;

const BODY_PREVIEW_LENGTH = 100;

export interface NotifyReceipt {
  url: string;
  status: number;
}

export interface Notifier {
  /**
   * @throws {NotificationError} When the request does not complete
   */
  notify(code: string): Promise<NotifyReceipt>;
}

export interface HttpNotifierOptions {
  /** Base URL ending in the query parameter that takes the code, e.g. `...?num=` */
  baseUrl: string;
  logger: Logger;

  /** @default 10000 */
  timeoutMs?: number;

  httpClient?: AxiosInstance;
}

export class HttpNotifier implements Notifier {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: HttpNotifierOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_NOTIFY_TIMEOUT_MS;
    this.http = options.httpClient ?? axios.create();
    this.logger = options.logger.child({ component: 'notifier' });
  }

  urlFor(code: string): string {
    return `${this.baseUrl}${encodeURIComponent(code)}`;
  }

  async notify(code: string): Promise<NotifyReceipt> {
    const url = this.urlFor(code);
    try {
      const response = await this.http.get<unknown>(url, {
        timeout: this.timeoutMs,
        responseType: 'text',
        validateStatus: () => true,
      });
      this.logger.info('Notification sent', {
        code,
        status: response.status,
        body: typeof response.data === 'string' ? response.data.slice(0, BODY_PREVIEW_LENGTH) : undefined,
      });
      return { url, status: response.status };
    } catch (error) {
      throw new NotificationError(`Notification failed for ${code}: ${errorMessage(error)}`, { code, url });
    }
  }
}
