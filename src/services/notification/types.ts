/**
 * Notification Types
 */

import type { BuildInfo } from '../../config/pipeline-config.js';
import type { ResultRecord, RiskLevel, RunSummary } from '../../types/index.js';

export type NotificationChannel = 'slack';

export type NotificationDeliveryStatus = 'sent' | 'failed';

/**
 * Slack incoming-webhook configuration
 */
export interface SlackConfig {
  webhookUrl: string;
  channel?: string;
  username?: string;
  iconEmoji?: string;
  iconUrl?: string;

  /**
   * Request timeout, 30s when unset
   */
  timeoutMs?: number;
}

/**
 * Run data a notification may render next to the narrative text
 */
export interface NotificationContext {
  summary: RunSummary;
  riskLevel: RiskLevel;
  build: BuildInfo;
  failing: readonly ResultRecord[];
  runUrl?: string;
  unsynced?: number;
}

export interface NotificationResult {
  channel: NotificationChannel;
  status: NotificationDeliveryStatus;
  timestamp: Date;
  error?: string;
  response?: {
    statusCode: number;
    body: string;
  };
}

export interface SlackMessage {
  text: string;
  blocks: Array<Record<string, unknown>>;
  attachments?: Array<Record<string, unknown>>;
}

/**
 * Fire-and-forget notification sink; callers treat a rejection as a warning
 */
export interface Notifier {
  notify(text: string, context?: NotificationContext): Promise<void>;
}
