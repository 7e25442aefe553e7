import { z } from 'zod';

// A section whose keys are all commented out parses to null
export const ConfigSchema = z
  .object({
    api: z
      .object({
        openweather: z
          .object({
            key: z.string().nullish(),
          })
          .passthrough()
          .nullish(),
      })
      .passthrough()
      .nullish(),
    defaults: z
      .object({
        city: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();
