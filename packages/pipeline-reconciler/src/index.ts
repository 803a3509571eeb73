// Reconciler
export { PipelineReconciler } from './reconciler.js';
export { PipelineFingerprint } from './fingerprint.js';

// Control-plane client
export {
  ElasticTranscoderPipelineClient,
  createPipelineClient,
  loadTranscoderSdk,
  toPipelineRecord,
} from './pipeline-client.js';
export type { PipelineClient, TranscoderClientOptions, TranscoderSdk } from './pipeline-client.js';

// Notifications
export {
  EMPTY_NOTIFICATIONS,
  normalizeNotifications,
  parseNotifications,
  resolveNotificationEvent,
  notificationsEqual,
  notificationsFromRemote,
  notificationsToRemote,
} from './notifications.js';
export type { NotificationParseResult } from './notifications.js';

// Desired state
export {
  parseDesiredState,
  loadDesiredStateFile,
  loadDesiredStateFromString,
  resolveEnvRef,
} from './desired-state.js';
export type { DesiredStateResult } from './desired-state.js';

// Configuration and logging
export { buildRuntimeConfig, resolveRegion } from './config.js';
export type { RuntimeConfig, RuntimeConfigOverrides } from './config.js';
export { createLogger, createSilentLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';

// Errors
export {
  InitializationError,
  DesiredStateError,
  PipelineApiError,
  ReconcileError,
  formatIssues,
} from './errors.js';
export type { InitializationErrorCode, PipelineOperation } from './errors.js';

// Constants and types
export {
  NOTIFICATION_EVENTS,
  LIFECYCLE_STATES,
  RECONCILE_ACTIONS,
  COMPARED_FIELDS,
  OUTPUT_FORMATS,
} from './constants.js';
export type {
  NotificationEvent,
  NotificationTopics,
  LifecycleState,
  ReconcileAction,
  ComparedField,
  OutputFormat,
  PresentPipelineState,
  AbsentPipelineState,
  DesiredPipelineState,
  PipelineRecord,
  CreatePipelineInput,
  UpdatePipelineInput,
  ReconcilePlan,
  ReconcileResult,
  ValidationIssue,
} from './types.js';
