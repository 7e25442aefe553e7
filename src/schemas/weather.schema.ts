import { z } from 'zod';

export const ConditionSchema = z.object({
  id: z.number().optional(),
  main: z.string().optional(),
  description: z.string(),
  icon: z.string(),
});

export const MainSchema = z.object({
  temp: z.number(),
  feels_like: z.number(),
  humidity: z.number(),
  temp_min: z.number().optional(),
  temp_max: z.number().optional(),
  pressure: z.number().optional(),
});

export const OpenWeatherResponseSchema = z.object({
  name: z.string(),
  coord: z
    .object({
      lat: z.number(),
      lon: z.number(),
    })
    .optional(),
  sys: z.object({
    country: z.string().optional(),
  }),
  main: MainSchema,
  weather: z.array(ConditionSchema).min(1),
});
