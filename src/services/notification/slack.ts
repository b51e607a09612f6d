/**
 * Slack Notification Provider
 * Posts the sync summary to Slack via an incoming webhook
 */

import type { SlackSettings } from '../../config/pipeline-config.js';
import type { NotificationContext, NotificationResult, Notifier, SlackConfig, SlackMessage } from './types.js';
import { generateSlackMessage } from './templates.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Slack notification error class
 */
export class SlackNotificationError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'SlackNotificationError';
  }
}

export class SlackNotifier implements Notifier {
  private readonly logger: Logger;
  private readonly config: SlackConfig;

  constructor(config: SlackConfig) {
    this.logger = createModuleLogger('services:notification:slack');
    this.config = config;
  }

  /**
   * Post and throw on failure
   */
  async notify(text: string, context?: NotificationContext): Promise<void> {
    const result = await this.send(text, context);
    if (result.status === 'failed') {
      throw new SlackNotificationError(result.error ?? 'Slack notification failed', result.response?.statusCode);
    }
  }

  /**
   * Post and report the delivery outcome
   */
  async send(text: string, context?: NotificationContext): Promise<NotificationResult> {
    const timestamp = new Date();

    try {
      const payload = this.buildPayload(generateSlackMessage(text, context));

      this.logger.debug('Sending Slack notification', { riskLevel: context?.riskLevel });
      const response = await this.executeWebhook(payload);
      this.logger.info('Slack notification sent successfully');

      return {
        channel: 'slack',
        status: 'sent',
        timestamp,
        response: {
          statusCode: response.status,
          body: await response.text(),
        },
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to send Slack notification', { error: errorMessage });

      return {
        channel: 'slack',
        status: 'failed',
        timestamp,
        error: errorMessage,
        response: error instanceof SlackNotificationError && error.statusCode !== undefined
          ? { statusCode: error.statusCode, body: '' }
          : undefined,
      };
    }
  }

  /**
   * Build the Slack webhook payload
   */
  private buildPayload(message: SlackMessage): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      text: message.text,
    };

    if (message.blocks.length > 0) {
      payload.blocks = message.blocks;
    }

    if (message.attachments && message.attachments.length > 0) {
      payload.attachments = message.attachments;
    }

    // Override channel if specified
    if (this.config.channel) {
      payload.channel = this.config.channel;
    }

    if (this.config.username) {
      payload.username = this.config.username;
    }

    if (this.config.iconUrl) {
      payload.icon_url = this.config.iconUrl;
    } else if (this.config.iconEmoji) {
      payload.icon_emoji = this.config.iconEmoji;
    }

    return payload;
  }

  private async executeWebhook(payload: Record<string, unknown>): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs ?? 30000);

    try {
      const response = await fetch(this.config.webhookUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => 'Unable to read response body');
        throw new SlackNotificationError(
          `Slack webhook returned ${response.status}: ${response.statusText}. Body: ${body}`,
          response.status
        );
      }

      return response;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  validate(): boolean {
    if (!this.config.webhookUrl) {
      this.logger.error('Slack webhook URL is not configured');
      return false;
    }

    try {
      new URL(this.config.webhookUrl);
    } catch {
      this.logger.error('Slack webhook URL is invalid');
      return false;
    }

    return true;
  }
}

/**
 * Slack notifier from pipeline settings, or null when Slack is not configured
 */
export function createSlackNotifier(settings: SlackSettings | undefined): SlackNotifier | null {
  if (!settings) {
    return null;
  }
  return new SlackNotifier({ ...settings });
}
