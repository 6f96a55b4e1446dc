import { RawMap } from '../types';

export interface PermissionRationaleFields {
  title?: string;
  message?: string;
  positiveAction?: string;
  negativeAction?: string;
}

/**
 * Dialog text shown before requesting background location permission
 */
export class PermissionRationale {
  readonly title?: string;
  readonly message?: string;
  readonly positiveAction?: string;
  readonly negativeAction?: string;

  constructor(fields: PermissionRationaleFields = {}) {
    this.title = fields.title;
    this.message = fields.message;
    this.positiveAction = fields.positiveAction;
    this.negativeAction = fields.negativeAction;
  }

  static fromMap(map: RawMap): PermissionRationale {
    return new PermissionRationale({
      title: optionalString(map['title']),
      message: optionalString(map['message']),
      positiveAction: optionalString(map['positiveAction']),
      negativeAction: optionalString(map['negativeAction']),
    });
  }

  toMap(): Record<keyof PermissionRationaleFields, string | null> {
    return {
      title: this.title ?? null,
      message: this.message ?? null,
      positiveAction: this.positiveAction ?? null,
      negativeAction: this.negativeAction ?? null,
    };
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
