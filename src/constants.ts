export const OPENWEATHER_BASE_URL = 'https://api.openweathermap.org/data/2.5/weather';
export const IPAPI_BASE_URL = 'https://ipapi.co/json/';

export const OPENWEATHER_API_KEY_ENV = 'OPENWEATHER_API_KEY';
export const OPENWEATHER_CONFIG_KEY = 'api.openweather.key';
export const DEFAULT_CITY_CONFIG_KEY = 'defaults.city';

export const CONFIG_FILE_NAME = 'config.yaml';
export const DEBUG_LOG_FILE_NAME = 'weather_debug.log';

export const API_TIMEOUT_MS = 10_000;
export const USER_AGENT = 'weather-cli/1.0';

// Native positioning waits, each attempted once
export const PERMISSION_WAIT_MS = 2_000;
export const FIX_WAIT_MS = 1_000;

export const GPSD_HOST = '127.0.0.1';
export const GPSD_PORT = 2947;
export const GPSD_TIMEOUT_MS = 3_000;

export const HELPER_PROCESS_TIMEOUT_MS = 5_000;

export const APP_NAME = 'weather';
export const APP_VERSION = '0.1.0';
