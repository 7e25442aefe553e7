/**
 * YAML-backed configuration.
 *
 * Looks for `config.yaml` in the working directory unless a path is given.
 * A missing file is not an error: every value is optional and the CLI
 * falls back to automatic location and the environment for the API key.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import YAML from 'yaml';
import { ConfigSchema } from '../schemas/config.schema';
import { ApiService, ConfigData, DefaultCitySource } from '../interfaces/config';
import { ConfigError } from '../errors';
import {
  CONFIG_FILE_NAME,
  DEFAULT_CITY_CONFIG_KEY,
  OPENWEATHER_API_KEY_ENV,
  OPENWEATHER_CONFIG_KEY,
} from '../constants';

const API_KEY_SOURCES: Record<ApiService, { env: string; configKey: string }> = {
  openweather: { env: OPENWEATHER_API_KEY_ENV, configKey: OPENWEATHER_CONFIG_KEY },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function loadYamlFile(filePath: string): unknown {
  try {
    const content = readFileSync(filePath, 'utf-8');
    return YAML.parse(content);
  } catch (err) {
    throw new ConfigError(filePath, err instanceof Error ? err.message : String(err));
  }
}

export class Config implements DefaultCitySource {
  constructor(
    public readonly configPath: string,
    private readonly data: ConfigData = {},
    private readonly fileFound = false
  ) {}

  static load(configPath: string = join(process.cwd(), CONFIG_FILE_NAME)): Config {
    if (!existsSync(configPath)) {
      return new Config(configPath);
    }

    // An empty document parses to null
    const raw = loadYamlFile(configPath) ?? {};
    const parsed = ConfigSchema.safeParse(raw);

    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(configPath, detail);
    }

    return new Config(configPath, parsed.data, true);
  }

  /**
   * Looks up a value by dotted key, e.g. `api.openweather.key`.
   */
  get(key: string): unknown {
    let value: unknown = this.data;

    for (const part of key.split('.')) {
      if (!isRecord(value) || !(part in value)) {
        return undefined;
      }
      value = value[part];
    }

    return value;
  }

  // Environment first, then the file
  apiKey(service: ApiService = 'openweather'): string | undefined {
    const { env, configKey } = API_KEY_SOURCES[service];

    const fromEnv = process.env[env];
    if (fromEnv) {
      return fromEnv;
    }

    const fromFile = this.get(configKey);
    return typeof fromFile === 'string' && fromFile.length > 0 ? fromFile : undefined;
  }

  defaultCity(): string | undefined {
    const city = this.get(DEFAULT_CITY_CONFIG_KEY);
    return typeof city === 'string' && city.length > 0 ? city : undefined;
  }

  hasConfigFile(): boolean {
    return this.fileFound;
  }
}
