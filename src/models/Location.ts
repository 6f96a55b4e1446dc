import { SENTINELS } from '../config/sentinels';
import { LocationJSON, RawMap } from '../types';
import {
  isRawMap,
  mapBool,
  mapFloat,
  toMap,
  toStringOrEmpty,
} from '../utils/coercion';
import { Activity } from './Activity';
import { Battery } from './Battery';
import { Coords } from './Coords';
import { GeofenceEvent } from './GeofenceEvent';

/**
 * Location sample delivered by the platform for location, motion-change and
 * current-position events.
 *
 * Built from whatever the platform sent; every field resolves to either the
 * parsed value or its sentinel. The original payload is kept untouched and
 * returned by {@link Location.toMap}.
 */
export class Location {
  private readonly raw: unknown;

  /** ISO-8601 (UTC), e.g. 2018-01-01T12:00:01.123Z */
  readonly timestamp: string;
  /** Device time when the location was received, ISO-8601 */
  readonly recordedAt: string;
  /**
   * Milliseconds relative to device time when received.
   * timestamp + age = device time when recorded.
   */
  readonly age: number;
  /** motionchange | heartbeat | providerchange | geofence */
  readonly event: string;
  /** Android only: provided by a mock location app */
  readonly mock: boolean;
  /**
   * One of several samples taken before settling on a final location.
   * Ignore these when uploading locations manually.
   */
  readonly sample: boolean;
  /** Meters travelled */
  readonly odometer: number;
  readonly isMoving: boolean;
  readonly uuid: string;
  readonly coords: Coords;
  readonly battery: Battery;
  readonly activity: Activity;
  /** Present only when recorded because of a geofence transition */
  readonly geofence?: GeofenceEvent;
  readonly extras?: RawMap;

  constructor(raw: unknown) {
    const p = toMap(raw);

    this.raw = raw;

    this.coords = new Coords(p['coords']);
    this.battery = new Battery(p['battery']);
    this.activity = new Activity(p['activity']);

    this.timestamp = toStringOrEmpty(p['timestamp']);

    const recordedAt = p['recorded_at'];
    this.recordedAt = typeof recordedAt === 'string' ? recordedAt : this.timestamp;

    this.age = mapFloat(p, 'age', SENTINELS.AGE);
    this.isMoving = mapBool(p, 'is_moving', false);
    this.uuid = toStringOrEmpty(p['uuid']);
    this.odometer = mapFloat(p, 'odometer', SENTINELS.ODOMETER);
    this.sample = mapBool(p, 'sample', false);
    this.event = toStringOrEmpty(p['event']);
    this.mock = mapBool(p, 'mock', false);

    const geofence = p['geofence'];
    if (geofence !== null && geofence !== undefined) {
      this.geofence = new GeofenceEvent(geofence);
    }

    const extras = p['extras'];
    if (isRawMap(extras)) {
      this.extras = { ...extras };
    }
  }

  /**
   * Original payload as received, by reference
   */
  toMap(): unknown {
    return this.raw;
  }

  toJSON(): LocationJSON {
    const json: LocationJSON = {
      uuid: this.uuid,
      timestamp: this.timestamp,
      recordedAt: this.recordedAt,
      age: this.age,
      event: this.event,
      mock: this.mock,
      sample: this.sample,
      odometer: this.odometer,
      isMoving: this.isMoving,
      coords: this.coords.toJSON(),
      battery: this.battery.toJSON(),
      activity: this.activity.toJSON(),
    };
    if (this.geofence) {
      json.geofence = this.geofence.toJSON();
    }
    if (this.extras) {
      json.extras = this.extras;
    }
    return json;
  }

  toString(): string {
    return `[Location ${this.coords.toString()}, event: ${this.event}, isMoving: ${this.isMoving}, timestamp: ${this.timestamp}]`;
  }
}
