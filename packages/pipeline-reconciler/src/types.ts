/**
 * Pipeline Reconciler Types
 *
 * Desired state, remote pipeline records and reconcile results.
 */

import type {
  NOTIFICATION_EVENTS,
  LIFECYCLE_STATES,
  RECONCILE_ACTIONS,
  COMPARED_FIELDS,
  OUTPUT_FORMATS,
} from './constants.js';

/** One of the four job-status event kinds */
export type NotificationEvent = (typeof NOTIFICATION_EVENTS)[number];

/** Target lifecycle state */
export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

/** Action chosen by the reconciler */
export type ReconcileAction = (typeof RECONCILE_ACTIONS)[number];

/** A field that takes part in change detection */
export type ComparedField = (typeof COMPARED_FIELDS)[number];

/** CLI output format */
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Topic identifier per event kind. Always complete: an event kind with
 * no topic maps to the empty string.
 */
export type NotificationTopics = Readonly<Record<NotificationEvent, string>>;

/**
 * Desired state for a pipeline that should exist.
 */
export interface PresentPipelineState {
  state: 'present';
  /** Lookup key. Assumed unique, not enforced remotely. */
  name: string;
  /** Bucket holding the source media */
  inputBucket: string;
  /** Bucket receiving transcoded output. Only used on create. */
  outputBucket: string;
  /** IAM role ARN the service assumes */
  role: string;
  notifications: NotificationTopics;
}

/**
 * Desired state for a pipeline that should not exist.
 */
export interface AbsentPipelineState {
  state: 'absent';
  name: string;
}

export type DesiredPipelineState = PresentPipelineState | AbsentPipelineState;

/**
 * A pipeline as reported by the remote control plane.
 */
export interface PipelineRecord {
  /** Identifier assigned by the service, immutable */
  id: string;
  arn?: string;
  name: string;
  /** Service-reported status, e.g. "Active" or "Paused" */
  status?: string;
  role: string;
  inputBucket: string;
  outputBucket: string;
  notifications: NotificationTopics;
}

/** Input for creating a pipeline */
export interface CreatePipelineInput {
  name: string;
  inputBucket: string;
  outputBucket: string;
  role: string;
  notifications: NotificationTopics;
}

/**
 * Input for updating a pipeline in place.
 * The output bucket is write-once and therefore absent here.
 */
export interface UpdatePipelineInput {
  id: string;
  name: string;
  inputBucket: string;
  role: string;
  notifications: NotificationTopics;
}

/** What the reconciler would do, computed without mutating anything */
export interface ReconcilePlan {
  action: ReconcileAction;
  name: string;
  /** The matching remote pipeline, when one exists */
  existing?: PipelineRecord;
  /** Fields that differ from the desired state (update only) */
  differingFields: ComparedField[];
}

/** Outcome of a convergence run */
export interface ReconcileResult {
  changed: boolean;
  action: ReconcileAction;
  name: string;
  /** Absent when nothing existed and nothing was created */
  id?: string;
}

/** A single problem found while validating input */
export interface ValidationIssue {
  field: string;
  message: string;
}
