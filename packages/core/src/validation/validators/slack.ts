/**
 * Slack webhook validators (local only)
 */

import type { Finding } from '@repo/shared-types';
import { redactSecret } from '@repo/shared-utils';
import { secretValueOf } from '../../redaction/findings.js';
import type { Validator, ValidatorVerdict } from '../types.js';

const SLACK_WEBHOOK_PATTERN =
  /^https:\/\/hooks\.slack\.com\/services\/([A-Z0-9]{9})\/([A-Z0-9]{9})\/([A-Za-z0-9]{24})/;

const TEAM_ID_PATTERN = /^T[A-Z0-9]{8}$/;
const CHANNEL_ID_PATTERN = /^[BC][A-Z0-9]{8}$/;
const WEBHOOK_TOKEN_PATTERN = /^[A-Za-z0-9]{24}$/;

function isSlackWebhookFinding(finding: Finding): boolean {
  return finding.rule.includes('slack') || secretValueOf(finding).includes('hooks.slack.com');
}

/**
 * URL structure only
 */
export const slackWebhookFormatValidator: Validator = {
  name: 'slack_webhook_format',
  rateLimitQps: 10,
  requiresNetwork: false,
  appliesTo: isSlackWebhookFinding,

  async validate(finding: Finding): Promise<ValidatorVerdict> {
    const url = secretValueOf(finding);
    if (!SLACK_WEBHOOK_PATTERN.test(url)) {
      return { state: 'invalid', reason: 'Does not match Slack webhook format' };
    }
    return {
      state: 'valid',
      evidence: `Valid Slack webhook format: ${redactSecret(url)}`,
      reason: 'Matches Slack webhook URL pattern',
    };
  },
};

/**
 * URL structure plus team, channel and token component checks
 */
export const slackWebhookLocalValidator: Validator = {
  name: 'slack_webhook_local',
  rateLimitQps: 10,
  requiresNetwork: false,
  appliesTo: isSlackWebhookFinding,

  async validate(finding: Finding): Promise<ValidatorVerdict> {
    const url = secretValueOf(finding);
    const match = SLACK_WEBHOOK_PATTERN.exec(url);
    if (!match) {
      return { state: 'invalid', reason: 'Does not match Slack webhook URL pattern' };
    }

    const [, teamId = '', channelId = '', token = ''] = match;
    const issues: string[] = [];

    if (!TEAM_ID_PATTERN.test(teamId)) {
      issues.push(`Bad team ID format: ${teamId}`);
    }
    if (!CHANNEL_ID_PATTERN.test(channelId)) {
      issues.push(`Bad channel/bot ID format: ${channelId}`);
    }
    if (!WEBHOOK_TOKEN_PATTERN.test(token)) {
      issues.push(`Bad token format: length=${token.length}`);
    }

    if (issues.length > 0) {
      return { state: 'invalid', reason: `Format check failed: ${issues.join('; ')}` };
    }

    return {
      state: 'valid',
      evidence: `Slack webhook format and components check out: ${redactSecret(url)}`,
      reason: 'Passed Slack webhook URL pattern and component checks',
    };
  },
};
