export { logger, Logger } from './logger.js';
export type { LogLevel, LogMeta } from './logger.js';
export { ErrorHandler, PigeonError } from './error-handler.js';
export type { ErrorCode } from './error-handler.js';
export { ConfigManager, loadConfig, REQUIRED_SECRETS } from './config.js';
export type { Env, OpenAIConfig, MastodonConfig, SecretName } from './config.js';
export { inspectWorkflow, hasErrors } from './workflow.js';
export type { WorkflowIssue, WorkflowReport, WorkflowStepSummary } from './workflow.js';
export { retry, sleep, timeout } from './async-utils.js';
export type { RetryOptions } from './async-utils.js';
