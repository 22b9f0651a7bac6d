export { slackWebhookFormatValidator, slackWebhookLocalValidator } from './slack.js';
export {
  createGitHubPatValidator,
  GITHUB_TOKEN_PREFIXES,
  DEFAULT_GITHUB_API_URL,
  type GitHubValidatorOptions,
} from './github.js';
export { awsAccessKeyValidator } from './aws.js';
export { gcpServiceAccountKeyValidator } from './gcp.js';
export { azureSasValidator, parseSasUrl } from './azure.js';
