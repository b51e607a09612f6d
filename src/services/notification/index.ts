export { SlackNotifier, SlackNotificationError, createSlackNotifier } from './slack.js';
export { generateSlackMessage, formatDuration, toMrkdwn } from './templates.js';
export type {
  Notifier,
  NotificationContext,
  NotificationResult,
  SlackConfig,
  SlackMessage,
} from './types.js';
