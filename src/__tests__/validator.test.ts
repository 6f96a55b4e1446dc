import { Coords, Location } from '../models';
import { isSyntheticLocation, validateCoords, validateLocation } from '../utils/validator';

describe('Validator', () => {
  describe('validateCoords', () => {
    it('should accept coordinates within bounds', () => {
      const result = validateCoords(new Coords({ latitude: 45.5, longitude: -73.6, accuracy: 5 }));
      expect(result.isValid).toBe(true);
      expect(result.issues).toEqual([]);
    });

    it('should reject out-of-range latitude and longitude', () => {
      const result = validateCoords(new Coords({ latitude: 91, longitude: -181 }));
      expect(result.isValid).toBe(false);
      expect(result.issues).toEqual([
        { reason: 'latitude_range', message: 'Latitude out of range: 91 (expected -90..90)' },
        { reason: 'longitude_range', message: 'Longitude out of range: -181 (expected -180..180)' },
      ]);
    });

    it('should reject negative accuracy', () => {
      const result = validateCoords(new Coords({ accuracy: -3 }));
      expect(result.issues).toEqual([
        { reason: 'negative_accuracy', message: 'Accuracy cannot be negative: -3' },
      ]);
    });
  });

  describe('validateLocation', () => {
    it('should accept a synthetic payload', () => {
      const result = validateLocation(new Location({}));
      expect(result.isValid).toBe(true);
    });

    it('should report battery, confidence and timestamp problems', () => {
      const location = new Location({
        timestamp: 'not-a-date',
        battery: { level: 1.5 },
        activity: { type: 'still', confidence: 150 },
      });
      const result = validateLocation(location);

      expect(result.isValid).toBe(false);
      expect(result.issues.map((issue) => issue.reason)).toEqual([
        'battery_level_range',
        'confidence_range',
        'invalid_timestamp',
      ]);
      expect(result.issues.map((issue) => issue.message)).toEqual([
        'Battery level out of range: 1.5 (expected -1..1)',
        'Activity confidence out of range: 150 (expected 0..100)',
        'Invalid timestamp format: not-a-date',
      ]);
    });
  });

  describe('isSyntheticLocation', () => {
    it('should detect the placeholder payload', () => {
      expect(isSyntheticLocation(new Location({ timestamp: '2024-01-01T00:00:00Z' }))).toBe(true);
    });

    it('should not flag real locations', () => {
      const location = new Location({
        uuid: 'u1',
        coords: { latitude: 45.5, longitude: -73.6, accuracy: 5 },
      });
      expect(isSyntheticLocation(location)).toBe(false);
    });
  });
});
