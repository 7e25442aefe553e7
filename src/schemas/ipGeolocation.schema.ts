import { z } from 'zod';

const coordinateField = z.union([z.number(), z.string().trim().min(1)]).nullish();
const textField = z.string().nullish();

export const IpGeolocationPayloadSchema = z.object({
  error: z.boolean().optional(),
  reason: z.string().optional(),

  latitude: coordinateField,
  longitude: coordinateField,

  city: textField,
  region: textField,
  country_name: textField,
  country: textField,
  timezone: textField,
});

export const IpCoordinatesSchema = z.object({
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
});

export type IpGeolocationPayload = z.infer<typeof IpGeolocationPayloadSchema>;
