/**
 * Pipeline Reconciler Constants
 *
 * Fixed vocabularies shared by the boundary parser, the reconciler and the CLI.
 */

/** Job-status event kinds a pipeline can publish to a notification topic */
export const NOTIFICATION_EVENTS = ['Progressing', 'Completed', 'Warning', 'Error'] as const;

/** Target lifecycle states for a pipeline */
export const LIFECYCLE_STATES = ['present', 'absent'] as const;

/** Actions the reconciler can take against the remote pipeline */
export const RECONCILE_ACTIONS = ['create', 'update', 'delete', 'none'] as const;

/** Fields compared when deciding whether an existing pipeline needs an update */
export const COMPARED_FIELDS = ['name', 'role', 'inputBucket', 'notifications'] as const;

/** Output formats understood by the CLI */
export const OUTPUT_FORMATS = ['json', 'text'] as const;

/** npm package that provides the Elastic Transcoder control-plane client */
export const TRANSCODER_SDK_PACKAGE = '@aws-sdk/client-elastic-transcoder';
