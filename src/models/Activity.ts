import { SENTINELS } from '../config/sentinels';
import { ActivityJSON } from '../types';
import { toMap, toOptionalInteger } from '../utils/coercion';

/**
 * Device motion activity when a location was recorded.
 *
 * type: still | walking | on_foot | running | on_bicycle | in_vehicle | unknown
 */
export class Activity implements ActivityJSON {
  readonly type: string;
  /** Percent */
  readonly confidence: number;

  constructor(raw: unknown) {
    const a = toMap(raw);

    const type = a['type'];
    this.type =
      typeof type === 'string' && type.length > 0
        ? type
        : SENTINELS.ACTIVITY_TYPE_UNKNOWN;

    this.confidence =
      toOptionalInteger(a['confidence']) ?? SENTINELS.ACTIVITY_CONFIDENCE;
  }

  toJSON(): ActivityJSON {
    return { type: this.type, confidence: this.confidence };
  }
}
