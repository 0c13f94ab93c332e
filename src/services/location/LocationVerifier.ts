// services/location/LocationVerifier.ts
import { ErrorCode, Result, fail, ok } from '../../types/attendance/error';
import { geodesicDistance, isValidCoordinates } from '../../utils/locationUtils';

export interface LocationVerification {
  distanceMeters: number;
  withinRadius: boolean;
}

export interface OfficeLocation {
  latitude: number;
  longitude: number;
  radiusMeters: number;
}

export class LocationVerifier {
  constructor(private readonly office?: OfficeLocation) {}

  verify(
    lat: number,
    lon: number,
    officeLat: number,
    officeLon: number,
    radiusMeters: number,
  ): Result<LocationVerification> {
    if (!isValidCoordinates(lat, lon)) {
      return fail(
        ErrorCode.INVALID_COORDINATE,
        `Invalid coordinates: ${lat}, ${lon}`,
        { lat, lon },
      );
    }
    if (!isValidCoordinates(officeLat, officeLon)) {
      return fail(
        ErrorCode.INVALID_COORDINATE,
        `Invalid office coordinates: ${officeLat}, ${officeLon}`,
        { officeLat, officeLon },
      );
    }
    if (!Number.isFinite(radiusMeters) || radiusMeters < 0) {
      return fail(ErrorCode.INVALID_COORDINATE, 'Radius must be >= 0', {
        radiusMeters,
      });
    }

    const distanceMeters = geodesicDistance(
      { latitude: officeLat, longitude: officeLon },
      { latitude: lat, longitude: lon },
    );

    return ok({ distanceMeters, withinRadius: distanceMeters <= radiusMeters });
  }

  verifyAgainstOffice(lat: number, lon: number): Result<LocationVerification> {
    if (!this.office) {
      return fail(ErrorCode.VALIDATION_ERROR, 'No office location configured');
    }
    return this.verify(
      lat,
      lon,
      this.office.latitude,
      this.office.longitude,
      this.office.radiusMeters,
    );
  }
}
