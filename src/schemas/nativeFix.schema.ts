import { z } from 'zod';

// A fix of exactly 0 on either axis is what drivers report before they have a position
const nonZero = (value: number) => value !== 0;

export const NativeFixSchema = z.object({
  latitude: z.number().finite().min(-90).max(90).refine(nonZero),
  longitude: z.number().finite().min(-180).max(180).refine(nonZero),
});

export const RawFixSchema = z.record(z.unknown());

export type NativeFix = z.infer<typeof NativeFixSchema>;
export type RawFix = z.infer<typeof RawFixSchema>;
