/**
 * Notification topic mapping.
 *
 * The control plane only accepts the event kinds with their first letter
 * capitalized ("Warning", not "warning"). Keys are resolved against the
 * fixed event list case-insensitively at the boundary, so everything past
 * the parser works with a complete {@link NotificationTopics} record.
 *
 * @module notifications
 */

import type { Notifications } from '@aws-sdk/client-elastic-transcoder';
import { NOTIFICATION_EVENTS } from './constants.js';
import { DesiredStateError } from './errors.js';
import type { NotificationEvent, NotificationTopics, ValidationIssue } from './types.js';

/** Topics with every event kind unset */
export const EMPTY_NOTIFICATIONS: NotificationTopics = Object.freeze({
  Progressing: '',
  Completed: '',
  Warning: '',
  Error: '',
});

/** Result of parsing a raw notifications mapping */
export type NotificationParseResult =
  | { success: true; topics: NotificationTopics }
  | { success: false; errors: ValidationIssue[] };

/**
 * Resolve a key to its event kind, ignoring case.
 * Returns undefined for anything outside the four known kinds.
 */
export function resolveNotificationEvent(key: string): NotificationEvent | undefined {
  const lowered = key.trim().toLowerCase();
  return NOTIFICATION_EVENTS.find((event) => event.toLowerCase() === lowered);
}

/**
 * Validate a raw notifications mapping.
 *
 * null/undefined means no topics at all. Missing event kinds default to
 * the empty string, as do null values.
 */
export function parseNotifications(raw: unknown, field = 'notifications'): NotificationParseResult {
  if (raw === undefined || raw === null) {
    return { success: true, topics: EMPTY_NOTIFICATIONS };
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    return {
      success: false,
      errors: [{ field, message: `Must be a mapping of ${NOTIFICATION_EVENTS.join(', ')} to topic ARNs` }],
    };
  }

  const errors: ValidationIssue[] = [];
  const topics: Record<NotificationEvent, string> = { ...EMPTY_NOTIFICATIONS };
  const seen = new Map<NotificationEvent, string>();

  for (const [key, rawValue] of Object.entries(raw)) {
    const value: unknown = rawValue;
    const event = resolveNotificationEvent(key);
    if (!event) {
      errors.push({
        field: `${field}.${key}`,
        message: `Unknown event kind "${key}". Must be one of: ${NOTIFICATION_EVENTS.join(', ')}`,
      });
      continue;
    }

    const previous = seen.get(event);
    if (previous !== undefined) {
      errors.push({
        field: `${field}.${key}`,
        message: `Duplicates "${previous}" (event kinds are case-insensitive)`,
      });
      continue;
    }
    seen.set(event, key);

    if (value === null || value === undefined) {
      topics[event] = '';
    } else if (typeof value === 'string') {
      topics[event] = value;
    } else {
      errors.push({ field: `${field}.${key}`, message: 'Topic must be a string' });
    }
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, topics: Object.freeze(topics) };
}

/**
 * Canonicalize a notifications mapping. Idempotent, and case-insensitive
 * on the four event kinds.
 *
 * @throws DesiredStateError when a key is unknown or a topic is not a string
 */
export function normalizeNotifications(
  input: Readonly<Record<string, string | null | undefined>> | null | undefined,
): NotificationTopics {
  const result = parseNotifications(input);
  if (!result.success) {
    throw new DesiredStateError(result.errors);
  }
  return result.topics;
}

/** Canonical topics from the SDK's Notifications shape */
export function notificationsFromRemote(notifications: Notifications | undefined): NotificationTopics {
  return Object.freeze({
    Progressing: notifications?.Progressing ?? '',
    Completed: notifications?.Completed ?? '',
    Warning: notifications?.Warning ?? '',
    Error: notifications?.Error ?? '',
  });
}

/** SDK request shape for a set of topics */
export function notificationsToRemote(topics: NotificationTopics): Notifications {
  return {
    Progressing: topics.Progressing,
    Completed: topics.Completed,
    Warning: topics.Warning,
    Error: topics.Error,
  };
}

export function notificationsEqual(a: NotificationTopics, b: NotificationTopics): boolean {
  return NOTIFICATION_EVENTS.every((event) => a[event] === b[event]);
}

/**
 * Parse a `event=topic` CLI pair. The topic may be empty ("warning=").
 * Returns undefined when there is no "=".
 */
export function parseNotificationPair(pair: string): { key: string; topic: string } | undefined {
  const eqIndex = pair.indexOf('=');
  if (eqIndex === -1) {
    return undefined;
  }
  return { key: pair.slice(0, eqIndex).trim(), topic: pair.slice(eqIndex + 1).trim() };
}
