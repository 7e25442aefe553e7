import { z } from 'zod';

export const TpvSchema = z.object({
  class: z.literal('TPV'),
  mode: z.number(),
  lat: z.number().optional(),
  lon: z.number().optional(),
});

export const PollSchema = z.object({
  class: z.literal('POLL'),
  tpv: z.array(z.unknown()).default([]),
});

export const GpsdMessageSchema = z.object({
  class: z.string(),
}).passthrough();

export type Tpv = z.infer<typeof TpvSchema>;
