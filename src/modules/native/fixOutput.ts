import { RawFix, RawFixSchema } from '../../schemas/nativeFix.schema';

/**
 * Helper processes print either a JSON object with `latitude`/`longitude`
 * or nothing / `null` when the OS has no fix yet.
 */
export function parseFixOutput(stdout: string): RawFix | null {
  const text = stdout.trim();
  if (text === '' || text === 'null') {
    return null;
  }

  const parsed = RawFixSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Unexpected location output: ${text}`);
  }
  return parsed.data;
}
