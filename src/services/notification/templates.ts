/**
 * Notification Templates
 * Slack Block Kit messages for a finished sync
 */

import type { RiskLevel } from '../../types/index.js';
import type { NotificationContext, SlackMessage } from './types.js';

const RISK_COLORS: Record<RiskLevel, string> = {
  LOW: '#36a64f',
  MEDIUM: '#ff9900',
  CRITICAL: '#ff0000',
};

const RISK_EMOJIS: Record<RiskLevel, string> = {
  LOW: '✅',
  MEDIUM: '🟡',
  CRITICAL: '🔴',
};

const MAX_LISTED_FAILURES = 5;

// Slack rejects section text above 3000 characters
const MAX_SECTION_LENGTH = 2900;

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

/**
 * Markdown emphasis from the narrative does not render in mrkdwn
 */
export function toMrkdwn(text: string): string {
  return text.replace(/\*\*(.+?)\*\*/g, '*$1*').replace(/^#{1,6}\s+(.*)$/gm, '*$1*');
}

export function generateSlackMessage(text: string, context?: NotificationContext): SlackMessage {
  if (!context) {
    return {
      text,
      blocks: [{ type: 'section', text: { type: 'mrkdwn', text: truncate(toMrkdwn(text), MAX_SECTION_LENGTH) } }],
    };
  }

  const { summary, riskLevel, build } = context;
  const title = `${RISK_EMOJIS[riskLevel]} ${build.branch} #${build.buildNumber}: ${summary.passRate.toFixed(2)}% passed (${riskLevel})`;

  const blocks: Array<Record<string, unknown>> = [
    {
      type: 'header',
      text: { type: 'plain_text', text: truncate(title, 150), emoji: true },
    },
    {
      type: 'section',
      fields: [
        { type: 'mrkdwn', text: `*Results:*\n✅ ${summary.passed} | ❌ ${summary.failed} | Σ ${summary.total}` },
        { type: 'mrkdwn', text: `*Risk:*\n${riskLevel}` },
        { type: 'mrkdwn', text: `*Duration:*\n${formatDuration(summary.totalDurationMs)}` },
        { type: 'mrkdwn', text: `*Environment:*\n${build.environment}` },
      ],
    },
  ];

  if (context.failing.length > 0) {
    const listed = context.failing
      .slice(0, MAX_LISTED_FAILURES)
      .map((record) => `• *${record.featureName}* / ${record.scenarioName}`);
    const more = context.failing.length - MAX_LISTED_FAILURES;
    if (more > 0) {
      listed.push(`…and ${more} more`);
    }
    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: truncate(`*Failing tests:*\n${listed.join('\n')}`, MAX_SECTION_LENGTH) },
    });
  }

  blocks.push({
    type: 'section',
    text: { type: 'mrkdwn', text: truncate(toMrkdwn(text), MAX_SECTION_LENGTH) },
  });

  const contextItems = [build.actor ? `@${build.actor}` : undefined];
  if (build.prNumber !== undefined) {
    contextItems.push(`PR #${build.prNumber}`);
  }
  if (build.commitSha) {
    contextItems.push(`\`${build.commitSha.slice(0, 7)}\``);
  }
  if (context.runUrl) {
    contextItems.push(`<${context.runUrl}|TestRail run>`);
  }
  if (context.unsynced) {
    contextItems.push(`⚠️ ${context.unsynced} unsynced`);
  }

  const elements = contextItems
    .filter((item): item is string => item !== undefined)
    .map((item) => ({ type: 'mrkdwn', text: item }));
  if (elements.length > 0) {
    blocks.push({ type: 'context', elements });
  }

  return {
    text: title,
    blocks,
    attachments: [{ color: RISK_COLORS[riskLevel], fallback: title }],
  };
}
