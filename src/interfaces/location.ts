import { InvalidLocationError } from '../errors';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export type CityLocation = Readonly<{
  kind: 'city';
  name: string;
}>;

export type CoordinatesLocation = Readonly<{
  kind: 'coordinates';
  latitude: number;
  longitude: number;
}>;

export type Location = CityLocation | CoordinatesLocation;

export function isValidLatitude(value: number): boolean {
  return Number.isFinite(value) && value >= -90 && value <= 90;
}

export function isValidLongitude(value: number): boolean {
  return Number.isFinite(value) && value >= -180 && value <= 180;
}

export function cityLocation(name: string): CityLocation {
  if (name.length === 0) {
    throw new InvalidLocationError('City name must not be empty');
  }
  return Object.freeze({ kind: 'city', name });
}

export function coordinatesLocation(latitude: number, longitude: number): CoordinatesLocation {
  if (!isValidLatitude(latitude) || !isValidLongitude(longitude)) {
    throw new InvalidLocationError(`Coordinates out of range: ${latitude}, ${longitude}`);
  }
  return Object.freeze({ kind: 'coordinates', latitude, longitude });
}

/**
 * Two-decimal rendering with exact halves rounded to even and the sign
 * of negative zero kept. `toFixed` rounds halves away from zero.
 */
export function formatDegrees(value: number): string {
  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  const magnitude = Math.abs(value);

  // The only doubles sitting exactly between two hundredths are odd multiples of 1/8
  const eighths = magnitude * 8;
  if (Number.isInteger(eighths) && eighths % 2 === 1) {
    const lower = Math.floor(magnitude * 100);
    const hundredths = lower % 2 === 0 ? lower : lower + 1;
    const fraction = String(hundredths % 100).padStart(2, '0');
    return `${sign}${Math.floor(hundredths / 100)}.${fraction}`;
  }

  return `${sign}${magnitude.toFixed(2)}`;
}

export function formatCoordinates(latitude: number, longitude: number): string {
  return `${formatDegrees(latitude)}, ${formatDegrees(longitude)}`;
}

/**
 * Display string used in logs and error messages,
 * e.g. `city Paris` or `coordinates 48.86, 2.35`.
 */
export function describeLocation(location: Location): string {
  switch (location.kind) {
    case 'city':
      return `city ${location.name}`;
    case 'coordinates':
      return `coordinates ${formatCoordinates(location.latitude, location.longitude)}`;
  }
}
