/**
 * WebhookNotifier
 *
 * Renders cleanup results into a Slack-style attachment and posts it to the
 * configured incoming webhook.
 */

import axios, { type AxiosInstance } from 'axios';
import type { ServiceCleanupResult } from '../services/cleanup-executor';
import { formatSize } from '../utils/format-size';
import { logger } from '../config/logger';

export interface NotificationAttachment {
  title: string;
  title_link?: string;
  text: string;
  color: string;
}

export interface NotificationPayload {
  attachments: NotificationAttachment[];
}

export interface NotifierOptions {
  webhookUrl: string;
  project: string;
  titleLink?: string;
}

export type WebhookHttpClient = Pick<AxiosInstance, 'post'>;

const OK = ':white_check_mark:';
const FAILED = ':x:';
const COLOR_OK = '#2EB67D';
const COLOR_FAILED = '#E01E5A';

function hasFailures(result: ServiceCleanupResult): boolean {
  return result.fetchError !== undefined || result.deleteFailures > 0;
}

export function buildNotification(
  results: readonly ServiceCleanupResult[],
  project: string,
  titleLink?: string
): NotificationPayload {
  const statusLines = results.map((result) => `${result.message} - ${hasFailures(result) ? FAILED : OK}`);

  const reportTexts = results
    .filter((result) => result.summary.length > 0)
    .map((result) => {
      const body = result.summary.map((entry) => `${entry.name}: ${formatSize(entry.totalBytes)}`).join('\n');
      return `Summary for ${result.service} (pre-cleanup):\n${body}\n`;
    });

  const details = results.flatMap((result) =>
    result.deletes.map((deleted) =>
      deleted.success
        ? `${OK} - ${deleted.name} (${result.service}) - size: ${deleted.sizeBytes} bytes`
        : `${FAILED} - ${deleted.name} (${result.service})`
    )
  );

  const reportsText = reportTexts.length > 0 ? `\n\n${reportTexts.join('\n')}` : '';
  const detailsText =
    details.length > 0
      ? `\n\nDetails:\n\n${details.join('\n')}`
      : '\n\nNot found any old indices by pre-defined rules.';

  const attachment: NotificationAttachment = {
    title: `${project} - Opensearch index cleanup`,
    text: `${statusLines.join('\n')}${reportsText}${detailsText}`,
    color: results.some(hasFailures) ? COLOR_FAILED : COLOR_OK,
  };
  if (titleLink) {
    attachment.title_link = titleLink;
  }

  return { attachments: [attachment] };
}

export class WebhookNotifier {
  private readonly http: WebhookHttpClient;

  constructor(
    private options: NotifierOptions,
    http?: WebhookHttpClient
  ) {
    this.http = http ?? axios.create({ timeout: 10000 });
  }

  get enabled(): boolean {
    return this.options.webhookUrl !== '';
  }

  /**
   * Returns false when the webhook answers with a non-2xx status.
   * Transport errors propagate.
   */
  async send(results: readonly ServiceCleanupResult[]): Promise<boolean> {
    const payload = buildNotification(results, this.options.project, this.options.titleLink);

    const response = await this.http.post(this.options.webhookUrl, payload, {
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true,
    });

    if (response.status < 200 || response.status >= 300) {
      logger.warn('WebhookNotifier: Notification response is not successful', {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
      });
      return false;
    }

    logger.info('WebhookNotifier: Notification sent', { status: response.status });
    return true;
  }
}
