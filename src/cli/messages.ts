import { ConfigError, MissingApiKeyError, WeatherSchemaError } from '../errors';
import { ResolutionResult } from '../interfaces/acquisition';
import { formatCoordinates, Location } from '../interfaces/location';
import { LocationInfo } from '../interfaces/locationInfo';
import { classifyHttpError } from '../modules/httpClient';

export type Writer = (line: string) => void;

type UnresolvedReason = Extract<ResolutionResult, { status: 'unresolved' }>['reason'];

function writeAll(write: Writer, lines: readonly string[]): void {
  for (const line of lines) write(line);
}

export function reportResolutionFailure(reason: UnresolvedReason, write: Writer): void {
  if (reason === 'current_unavailable') {
    write('Error: Could not determine current location. Try specifying a city with --city instead.');
    return;
  }

  writeAll(write, [
    'Error: Could not determine location.',
    'Either:',
    "1. Use --city 'City Name' to specify a city",
    '2. Configure a default city in config.yaml:',
    '   defaults:',
    "     city: 'Your City'",
  ]);
}

export function reportMissingApiKey(write: Writer): void {
  writeAll(write, [
    'Error: OpenWeather API key not found.',
    'Please set it in one of these ways:',
    '1. Environment variable: export OPENWEATHER_API_KEY=your_key',
    '2. Config file (config.yaml):',
    '   api:',
    '     openweather:',
    '       key: your_api_key_here',
    '',
    'Get your free API key from: https://openweathermap.org/api',
  ]);
}

function notFoundMessage(location: Location | undefined): string {
  if (location?.kind === 'coordinates') {
    return `Error: No weather data found for coordinates ${formatCoordinates(location.latitude, location.longitude)}.`;
  }
  return `Error: City '${location?.name ?? ''}' not found.`;
}

function networkTarget(location: Location | undefined): string {
  if (location?.kind === 'coordinates') {
    return `coordinates ${formatCoordinates(location.latitude, location.longitude)}`;
  }
  return location?.name ?? 'the requested location';
}

/**
 * Maps anything thrown while loading config or fetching weather
 * to the line(s) shown to the user.
 */
export function reportError(err: unknown, location: Location | undefined, write: Writer): void {
  if (
    err instanceof ConfigError ||
    err instanceof MissingApiKeyError ||
    err instanceof WeatherSchemaError
  ) {
    write(`Error: ${err.message}`);
    return;
  }

  const failure = classifyHttpError(err);

  switch (failure.kind) {
    case 'status':
      if (failure.status === 404) {
        write(notFoundMessage(location));
      } else if (failure.status === 401) {
        write('Error: Invalid API key.');
      } else {
        write(`Error: API request failed with status ${failure.status}`);
      }
      return;
    case 'network':
      write(`Error: Network request failed for ${networkTarget(location)} - ${failure.message}`);
      return;
    case 'unknown':
      write(`Unexpected error: ${failure.message}`);
      return;
  }
}

export function formatLocationInfo(info: LocationInfo | null): string {
  if (!info) {
    return 'Location details unavailable.';
  }
  return `Detected location: ${info.city}, ${info.region}, ${info.country} (${info.timezone})`;
}
