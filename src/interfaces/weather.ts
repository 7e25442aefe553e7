import { z } from 'zod';
import { ConditionSchema, MainSchema, OpenWeatherResponseSchema } from '../schemas/weather.schema';
import { Location } from './location';

export type OpenWeatherResponse = z.infer<typeof OpenWeatherResponseSchema>;
export type Condition = z.infer<typeof ConditionSchema>;
export type MainReadings = z.infer<typeof MainSchema>;

export interface WeatherProvider {
  getWeather(location: Location): Promise<OpenWeatherResponse>;
  formatWeatherOutput(data: OpenWeatherResponse): string;
}
