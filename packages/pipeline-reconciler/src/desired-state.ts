/**
 * Desired-state loader.
 *
 * Validates a raw desired-state object (from CLI flags or a YAML document)
 * into a typed {@link DesiredPipelineState}. String values of the form
 * `$ENV_VAR` are resolved from the environment.
 *
 * YAML shape:
 *
 * ```yaml
 * name: production
 * state: present
 * input-bucket: media-in
 * output-bucket: media-out
 * role: $TRANSCODER_ROLE_ARN
 * notifications:
 *   progressing: ''
 *   completed: arn:aws:sns:us-west-2:000000000000:transcoder-events
 *   warning: arn:aws:sns:us-west-2:000000000000:transcoder-events
 *   error: arn:aws:sns:us-west-2:000000000000:transcoder-events
 * ```
 *
 * @module desired-state
 */

import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { LIFECYCLE_STATES, NOTIFICATION_EVENTS } from './constants.js';
import { errorMessage } from './errors.js';
import { parseNotifications } from './notifications.js';
import type {
  DesiredPipelineState,
  LifecycleState,
  NotificationEvent,
  NotificationTopics,
  ValidationIssue,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Result of loading a desired state */
export type DesiredStateResult =
  | { success: true; desired: DesiredPipelineState }
  | { success: false; errors: ValidationIssue[] };

type DesiredField = 'name' | 'state' | 'inputBucket' | 'outputBucket' | 'role' | 'notifications';

/** Accepted spellings per field; the first one is used in messages */
const FIELD_KEYS: Record<DesiredField, readonly string[]> = {
  name: ['name'],
  state: ['state'],
  inputBucket: ['input-bucket', 'inputBucket', 'input_bucket'],
  outputBucket: ['output-bucket', 'outputBucket', 'output_bucket'],
  role: ['role'],
  notifications: ['notifications'],
};

const KNOWN_KEYS = new Set(Object.values(FIELD_KEYS).flat());

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Resolve a value that may be an environment variable reference.
 * `$NAME` looks up NAME; anything else is returned as is.
 * Returns undefined when the referenced variable is not set.
 */
export function resolveEnvRef(value: string): string | undefined {
  if (value.startsWith('$') && value.length > 1) {
    return process.env[value.slice(1)];
  }
  return value;
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLifecycleState(value: string): value is LifecycleState {
  return LIFECYCLE_STATES.some((state) => state === value);
}

/** First non-null value among the field's accepted keys */
function pick(raw: Record<string, unknown>, field: DesiredField): { key: string; value: unknown } | undefined {
  for (const key of FIELD_KEYS[field]) {
    const value = raw[key];
    if (value !== undefined && value !== null) {
      return { key, value };
    }
  }
  return undefined;
}

function readString(
  raw: Record<string, unknown>,
  field: DesiredField,
  required: boolean,
  errors: ValidationIssue[],
): string | undefined {
  const found = pick(raw, field);
  const label = FIELD_KEYS[field][0] ?? field;

  if (!found) {
    if (required) {
      errors.push({ field: label, message: `Required field '${label}' is missing` });
    }
    return undefined;
  }

  if (typeof found.value !== 'string') {
    errors.push({ field: found.key, message: 'Must be a string' });
    return undefined;
  }

  const resolved = resolveEnvRef(found.value);
  if (resolved === undefined) {
    errors.push({ field: found.key, message: `Environment variable "${found.value.slice(1)}" is not set` });
    return undefined;
  }

  if (required && resolved.trim() === '') {
    errors.push({ field: found.key, message: `Required field '${label}' is empty` });
    return undefined;
  }

  return resolved;
}

function readNotifications(raw: Record<string, unknown>, errors: ValidationIssue[]): NotificationTopics {
  const found = pick(raw, 'notifications');
  const result = parseNotifications(found?.value, 'notifications');
  if (!result.success) {
    errors.push(...result.errors);
    return emptyTopics();
  }

  const topics = { ...result.topics };
  for (const event of NOTIFICATION_EVENTS) {
    const resolved = resolveEnvRef(topics[event]);
    if (resolved === undefined) {
      errors.push({
        field: `notifications.${event}`,
        message: `Environment variable "${topics[event].slice(1)}" is not set`,
      });
    } else {
      topics[event] = resolved;
    }
  }
  return topics;
}

function emptyTopics(): Record<NotificationEvent, string> {
  return { Progressing: '', Completed: '', Warning: '', Error: '' };
}

// ---------------------------------------------------------------------------
// Transform raw object to typed desired state
// ---------------------------------------------------------------------------

/**
 * Validate a raw desired-state object.
 *
 * `state` defaults to "present". `name` is always required; `input-bucket`,
 * `output-bucket` and `role` are required when the state is "present".
 */
export function parseDesiredState(raw: unknown): DesiredStateResult {
  if (!isRecord(raw)) {
    return { success: false, errors: [{ field: 'desired', message: 'Desired state must be a mapping' }] };
  }

  const errors: ValidationIssue[] = [];

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      errors.push({ field: key, message: `Unknown field '${key}'` });
    }
  }

  const stateValue = readString(raw, 'state', false, errors) ?? 'present';
  if (!isLifecycleState(stateValue)) {
    errors.push({
      field: 'state',
      message: `Invalid state "${stateValue}". Must be one of: ${LIFECYCLE_STATES.join(', ')}`,
    });
    return { success: false, errors };
  }

  const name = readString(raw, 'name', true, errors);

  if (stateValue === 'absent') {
    if (name === undefined || errors.length > 0) {
      return { success: false, errors };
    }
    return { success: true, desired: { state: 'absent', name } };
  }

  const inputBucket = readString(raw, 'inputBucket', true, errors);
  const outputBucket = readString(raw, 'outputBucket', true, errors);
  const role = readString(raw, 'role', true, errors);
  const notifications = readNotifications(raw, errors);

  if (
    name === undefined ||
    inputBucket === undefined ||
    outputBucket === undefined ||
    role === undefined ||
    errors.length > 0
  ) {
    return { success: false, errors };
  }

  return {
    success: true,
    desired: { state: 'present', name, inputBucket, outputBucket, role, notifications },
  };
}

// ---------------------------------------------------------------------------
// YAML loading
// ---------------------------------------------------------------------------

/** Parse a YAML document into a raw mapping, without validating its fields */
export function readDesiredStateDocument(
  yamlContent: string,
): { success: true; raw: Record<string, unknown> } | { success: false; errors: ValidationIssue[] } {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: `Failed to parse YAML: ${errorMessage(err)}` }],
    };
  }

  if (!isRecord(parsed)) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: 'YAML content is empty or not a mapping' }],
    };
  }

  return { success: true, raw: parsed };
}

/** Read a desired-state YAML file into a raw mapping */
export function readDesiredStateFile(
  filePath: string,
): { success: true; raw: Record<string, unknown> } | { success: false; errors: ValidationIssue[] } {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      success: false,
      errors: [{ field: 'file', message: `Failed to read desired state file: ${errorMessage(err)}` }],
    };
  }
  return readDesiredStateDocument(content);
}

/** Load and validate a desired state from YAML text */
export function loadDesiredStateFromString(yamlContent: string): DesiredStateResult {
  const document = readDesiredStateDocument(yamlContent);
  return document.success ? parseDesiredState(document.raw) : document;
}

/** Load and validate a desired state from a YAML file */
export function loadDesiredStateFile(filePath: string): DesiredStateResult {
  const document = readDesiredStateFile(filePath);
  return document.success ? parseDesiredState(document.raw) : document;
}
