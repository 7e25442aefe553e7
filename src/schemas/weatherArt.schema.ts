import { z } from 'zod';

export const ArtPatternSchema = z.array(z.string()).length(5);

export const WeatherArtSchema = z.object({
  patterns: z.record(ArtPatternSchema),
  icons: z.record(z.string()),
});
