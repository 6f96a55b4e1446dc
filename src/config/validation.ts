export interface QualityConstraints {
  minLatitude: number;
  maxLatitude: number;
  minLongitude: number;
  maxLongitude: number;
  minBatteryLevel: number; // -1 is the "unknown" sentinel
  maxBatteryLevel: number;
  maxConfidence: number; // percent
}

export const DEFAULT_CONSTRAINTS: QualityConstraints = {
  minLatitude: -90,
  maxLatitude: 90,
  minLongitude: -180,
  maxLongitude: 180,
  minBatteryLevel: -1,
  maxBatteryLevel: 1,
  maxConfidence: 100,
};
