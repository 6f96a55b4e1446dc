import { SENTINELS } from '../config/sentinels';
import { BatteryJSON } from '../types';
import { mapBool, mapFloat, toMap } from '../utils/coercion';

/**
 * Device battery state when a location was recorded
 */
export class Battery implements BatteryJSON {
  readonly isCharging: boolean;
  /** 0.0 = empty, 1.0 = full */
  readonly level: number;

  constructor(raw: unknown) {
    const b = toMap(raw);
    // Synthetic payloads and older native versions may omit both.
    this.isCharging = mapBool(b, 'is_charging', false);
    this.level = mapFloat(b, 'level', SENTINELS.BATTERY_LEVEL_UNKNOWN);
  }

  toJSON(): BatteryJSON {
    return { isCharging: this.isCharging, level: this.level };
  }
}
