import { Location } from '../interfaces/location';
import { OpenWeatherResponse, WeatherProvider } from '../interfaces/weather';
import { OpenWeatherResponseSchema } from '../schemas/weather.schema';
import { MissingApiKeyError, WeatherSchemaError } from '../errors';
import { OPENWEATHER_BASE_URL } from '../constants';
import { getLogger, Logger } from '../logger';
import { withTimer } from '../utils/time';
import { createHttpClient, HttpClient } from './httpClient';
import { formatWeatherWithArt } from './weatherArt';

export function toTitleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

export class WeatherService implements WeatherProvider {
  private readonly logger: Logger;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly http: HttpClient = createHttpClient(),
    private readonly baseUrl: string = OPENWEATHER_BASE_URL
  ) {
    this.logger = getLogger('WeatherService');
  }

  // Transport and HTTP status errors propagate; the CLI turns them into messages
  async getWeather(location: Location): Promise<OpenWeatherResponse> {
    if (!this.apiKey) {
      throw new MissingApiKeyError();
    }

    const params: Record<string, string> =
      location.kind === 'coordinates'
        ? { lat: String(location.latitude), lon: String(location.longitude) }
        : { q: location.name };

    const response = await withTimer(
      this.logger,
      `API request to ${this.baseUrl}`,
      () => this.http.get<unknown>(this.baseUrl, {
        params: { ...params, appid: this.apiKey, units: 'metric' },
      })
    );

    const parsed = OpenWeatherResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new WeatherSchemaError(parsed.error.issues);
    }

    return parsed.data;
  }

  formatWeatherOutput(data: OpenWeatherResponse): string {
    const { name, sys, main, weather } = data;
    const [condition] = weather;
    const place = sys.country ? `${name}, ${sys.country}` : name;

    const text = [
      `Weather in ${place}:`,
      `Temperature: ${main.temp}°C (feels like ${main.feels_like}°C)`,
      `Humidity: ${main.humidity}%`,
      `Conditions: ${toTitleCase(condition.description)}`,
    ].join('\n');

    return formatWeatherWithArt(condition.icon, text);
  }
}
