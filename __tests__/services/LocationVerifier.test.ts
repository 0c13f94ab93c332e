// __tests__/services/LocationVerifier.test.ts
import { LocationVerifier } from '@/services/location/LocationVerifier';
import { ErrorCode } from '@/types/attendance/error';
import { OFFICE, northOfOffice } from '../helpers/engine';

describe('LocationVerifier', () => {
  const verifier = new LocationVerifier({ ...OFFICE, radiusMeters: 100 });

  describe('verify', () => {
    it.each([0, 1, 100, 5000])(
      'should return distance 0 at the office itself for radius %d',
      (radius) => {
        const result = verifier.verify(
          OFFICE.latitude,
          OFFICE.longitude,
          OFFICE.latitude,
          OFFICE.longitude,
          radius,
        );
        expect(result).toEqual({
          success: true,
          data: { distanceMeters: 0, withinRadius: true },
        });
      },
    );

    it('should accept a point 80m away within a 100m radius', () => {
      const point = northOfOffice(80);
      const result = verifier.verify(
        point.latitude,
        point.longitude,
        OFFICE.latitude,
        OFFICE.longitude,
        100,
      );

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.distanceMeters).toBeGreaterThan(79);
      expect(result.data.distanceMeters).toBeLessThan(81);
      expect(result.data.withinRadius).toBe(true);
    });

    it('should reject a point 220m away', () => {
      const point = northOfOffice(220);
      const result = verifier.verify(
        point.latitude,
        point.longitude,
        OFFICE.latitude,
        OFFICE.longitude,
        100,
      );
      expect(result.success && result.data.withinRadius).toBe(false);
    });

    it('should fail with INVALID_COORDINATE for an out of range latitude', () => {
      const result = verifier.verify(91, 0, OFFICE.latitude, OFFICE.longitude, 100);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.INVALID_COORDINATE);
    });

    it('should fail with INVALID_COORDINATE for a bad office point', () => {
      const result = verifier.verify(0, 0, 0, 181, 100);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.INVALID_COORDINATE);
    });

    it('should fail with INVALID_COORDINATE for a negative radius', () => {
      const result = verifier.verify(0, 0, 0, 0, -1);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.INVALID_COORDINATE);
    });
  });

  describe('verifyAgainstOffice', () => {
    it('should use the configured office', () => {
      const result = verifier.verifyAgainstOffice(OFFICE.latitude, OFFICE.longitude);
      expect(result.success && result.data.withinRadius).toBe(true);
    });

    it('should fail when no office is configured', () => {
      const result = new LocationVerifier().verifyAgainstOffice(0, 0);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.VALIDATION_ERROR);
    });
  });
});
