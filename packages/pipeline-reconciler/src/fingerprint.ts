import { COMPARED_FIELDS } from './constants.js';
import { notificationsEqual } from './notifications.js';
import type {
  ComparedField,
  NotificationTopics,
  PipelineRecord,
  PresentPipelineState,
} from './types.js';

/**
 * The part of a pipeline that change detection looks at.
 *
 * The output bucket is write-once and is not part of it.
 */
export class PipelineFingerprint {
  private constructor(
    readonly name: string,
    readonly role: string,
    readonly inputBucket: string,
    readonly notifications: NotificationTopics,
  ) {}

  static fromDesired(desired: PresentPipelineState): PipelineFingerprint {
    return new PipelineFingerprint(desired.name, desired.role, desired.inputBucket, desired.notifications);
  }

  static fromRecord(record: PipelineRecord): PipelineFingerprint {
    return new PipelineFingerprint(record.name, record.role, record.inputBucket, record.notifications);
  }

  equals(other: PipelineFingerprint): boolean {
    return this.differingFields(other).length === 0;
  }

  /** Compared fields whose values differ, in a fixed order */
  differingFields(other: PipelineFingerprint): ComparedField[] {
    return COMPARED_FIELDS.filter((field) => !this.fieldEquals(other, field));
  }

  private fieldEquals(other: PipelineFingerprint, field: ComparedField): boolean {
    switch (field) {
      case 'notifications':
        return notificationsEqual(this.notifications, other.notifications);
      case 'name':
      case 'role':
      case 'inputBucket':
        return this[field] === other[field];
    }
  }
}
