import { GeofenceEventJSON, RawMap } from '../types';
import { isRawMap, toMap, toStringOrEmpty } from '../utils/coercion';

/**
 * Geofence boundary transition attached to a location recorded because of it
 */
export class GeofenceEvent implements GeofenceEventJSON {
  readonly identifier: string;
  /** ENTER | EXIT | DWELL */
  readonly action: string;
  readonly timestamp: string;
  readonly extras?: RawMap;

  constructor(raw: unknown) {
    const g = toMap(raw);

    this.identifier = toStringOrEmpty(g['identifier']);
    this.action = toStringOrEmpty(g['action']);
    this.timestamp = toStringOrEmpty(g['timestamp']);

    const extras = g['extras'];
    if (isRawMap(extras)) {
      this.extras = { ...extras };
    }
  }

  toJSON(): GeofenceEventJSON {
    const json: GeofenceEventJSON = {
      identifier: this.identifier,
      action: this.action,
      timestamp: this.timestamp,
    };
    if (this.extras) {
      json.extras = this.extras;
    }
    return json;
  }

  toString(): string {
    return `[GeofenceEvent ${this.action} ${this.identifier}]`;
  }
}
