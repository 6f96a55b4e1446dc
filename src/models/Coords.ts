import { SENTINELS } from '../config/sentinels';
import { CoordsJSON } from '../types';
import { mapFloat, mapInt, toMap } from '../utils/coercion';

/**
 * Location coordinates (latitude, longitude, accuracy, speed, heading, ...)
 *
 * Parses real locations normally but also tolerates synthetic payloads, e.g.
 * when location services are disabled or permission is missing.
 */
export class Coords implements CoordsJSON {
  readonly latitude: number;
  readonly longitude: number;
  /** Meters */
  readonly accuracy: number;
  /**
   * iOS: meters above sea level.
   * Android: meters above the WGS84 reference ellipsoid.
   */
  readonly altitude: number;
  /** Meters above the WGS84 reference ellipsoid */
  readonly ellipsoidalAltitude: number;
  /** Degrees. Only present when the location came from GPS */
  readonly heading: number;
  readonly headingAccuracy: number;
  /** Meters per second. Only present when the location came from GPS */
  readonly speed: number;
  readonly speedAccuracy: number;
  /** Negative means `altitude` is invalid */
  readonly altitudeAccuracy: number;
  /** iOS only, requires indoor-tracking hardware */
  readonly floor: number | null;

  constructor(raw: unknown) {
    const c = toMap(raw);

    this.latitude = mapFloat(c, 'latitude', SENTINELS.COORDINATE);
    this.longitude = mapFloat(c, 'longitude', SENTINELS.COORDINATE);
    this.accuracy = mapFloat(c, 'accuracy', SENTINELS.COORDINATE);
    this.altitude = mapFloat(c, 'altitude', SENTINELS.COORDINATE);

    // Only reported where the platform distinguishes it from altitude.
    this.ellipsoidalAltitude = mapFloat(c, 'ellipsoidal_altitude', this.altitude);

    this.heading = mapFloat(c, 'heading', SENTINELS.UNAVAILABLE);
    this.headingAccuracy = mapFloat(c, 'heading_accuracy', SENTINELS.UNAVAILABLE);
    this.speed = mapFloat(c, 'speed', SENTINELS.UNAVAILABLE);
    this.speedAccuracy = mapFloat(c, 'speed_accuracy', SENTINELS.UNAVAILABLE);
    this.altitudeAccuracy = mapFloat(c, 'altitude_accuracy', SENTINELS.UNAVAILABLE);

    this.floor = mapInt(c, 'floor');
  }

  toJSON(): CoordsJSON {
    return {
      latitude: this.latitude,
      longitude: this.longitude,
      accuracy: this.accuracy,
      altitude: this.altitude,
      ellipsoidalAltitude: this.ellipsoidalAltitude,
      heading: this.heading,
      headingAccuracy: this.headingAccuracy,
      speed: this.speed,
      speedAccuracy: this.speedAccuracy,
      altitudeAccuracy: this.altitudeAccuracy,
      floor: this.floor,
    };
  }

  toString(): string {
    return `coords: ${this.latitude},${this.longitude}, acy: ${this.accuracy}, spd: ${this.speed}`;
  }
}
