import artData from '../data/weatherArt.json';
import { WeatherArtSchema } from '../schemas/weatherArt.schema';

const art = WeatherArtSchema.parse(artData);

const DEFAULT_PATTERN = 'default';

export function getWeatherArt(icon: string): string[] {
  const name = Object.hasOwn(art.icons, icon) ? art.icons[icon] : DEFAULT_PATTERN;
  const pattern = Object.hasOwn(art.patterns, name) ? art.patterns[name] : art.patterns[DEFAULT_PATTERN];
  return [...(pattern ?? [])];
}

// Width in code points, so the degree sign and accented city names count once
function textWidth(line: string): number {
  return Array.from(line).length;
}

/**
 * Puts the report text on the left and the art on the right:
 * `{text padded to the widest line} │ {art line}`.
 */
export function formatWeatherWithArt(icon: string, weatherText: string): string {
  const artLines = getWeatherArt(icon);
  const textLines = weatherText.trim().split('\n');
  const rows = Math.max(artLines.length, textLines.length);
  const width = Math.max(0, ...textLines.map(textWidth));

  const combined: string[] = [];
  for (let i = 0; i < rows; i++) {
    const text = textLines[i] ?? '';
    const padded = text + ' '.repeat(width - textWidth(text));
    combined.push(`${padded} │ ${artLines[i] ?? ''}`);
  }

  return combined.join('\n');
}
