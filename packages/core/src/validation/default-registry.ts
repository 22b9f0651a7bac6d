/**
 * Built-in validator set
 */

import { ValidatorRegistry } from './registry.js';
import type { Clock } from './token-bucket.js';
import {
  slackWebhookFormatValidator,
  slackWebhookLocalValidator,
  createGitHubPatValidator,
  awsAccessKeyValidator,
  gcpServiceAccountKeyValidator,
  azureSasValidator,
} from './validators/index.js';

export interface DefaultRegistryOptions {
  githubApiUrl?: string;
  clock?: Clock;
}

/**
 * Build the registry once at process start and pass it to the pipeline
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ValidatorRegistry {
  return new ValidatorRegistry({ clock: options.clock })
    .register(slackWebhookFormatValidator)
    .register(slackWebhookLocalValidator)
    .register(createGitHubPatValidator({ apiUrl: options.githubApiUrl }))
    .register(awsAccessKeyValidator)
    .register(gcpServiceAccountKeyValidator)
    .register(azureSasValidator);
}
