export { Config } from './config';
export * from './errors';
export * from './interfaces/acquisition';
export * from './interfaces/location';
export type { LocationInfo, LocationInfoSource } from './interfaces/locationInfo';
export type { OpenWeatherResponse, WeatherProvider } from './interfaces/weather';
export { getLogger, setupLogging } from './logger';
export { createHttpClient, classifyHttpError } from './modules/httpClient';
export type { HttpClient, HttpFailure } from './modules/httpClient';
export { IpGeolocationClient } from './modules/ipGeolocation';
export { LocationAcquirer, createLocationAcquirer } from './modules/locationAcquirer';
export { LocationResolver } from './modules/locationResolver';
export {
  NativeCoordinateProvider,
  createNativeProvider,
  selectNativeBackend,
} from './modules/nativeLocation';
export type { NativeLocationBackend, NativePlatform } from './modules/nativeLocation';
export { WeatherService } from './modules/weather';
export { formatWeatherWithArt, getWeatherArt } from './modules/weatherArt';
