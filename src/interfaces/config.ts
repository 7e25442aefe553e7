import { z } from 'zod';
import { ConfigSchema } from '../schemas/config.schema';

export type ConfigData = z.infer<typeof ConfigSchema>;

export type ApiService = 'openweather';

export interface DefaultCitySource {
  defaultCity(): string | undefined;
}
