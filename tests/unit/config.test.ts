import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Config } from '@/config';
import { ConfigError } from '@/errors';

describe('Config (unit)', () => {
  let dir: string;
  const savedKey = process.env.OPENWEATHER_API_KEY;

  const writeConfig = (content: string): string => {
    const file = join(dir, 'config.yaml');
    writeFileSync(file, content, 'utf-8');
    return file;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'weather-config-'));
    delete process.env.OPENWEATHER_API_KEY;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    if (savedKey === undefined) {
      delete process.env.OPENWEATHER_API_KEY;
    } else {
      process.env.OPENWEATHER_API_KEY = savedKey;
    }
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - values are read from YAML
   * - dotted keys walk nested maps
   */
  it('reads the default city and API key from the file', () => {
    const config = Config.load(
      writeConfig('api:\n  openweather:\n    key: test-key\ndefaults:\n  city: Berlin\n')
    );

    expect(config.hasConfigFile()).toBe(true);
    expect(config.defaultCity()).toBe('Berlin');
    expect(config.apiKey('openweather')).toBe('test-key');
    expect(config.get('api.openweather.key')).toBe('test-key');
  });

  it('returns undefined for unknown keys', () => {
    const config = Config.load(writeConfig('defaults:\n  city: Berlin\n'));

    expect(config.get('defaults.country')).toBeUndefined();
    expect(config.get('defaults.city.name')).toBeUndefined();
    expect(config.get('nothing')).toBeUndefined();
  });

  it('keeps keys it does not know about', () => {
    const config = Config.load(writeConfig('display:\n  units: metric\n'));

    expect(config.get('display.units')).toBe('metric');
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - missing file means empty configuration
   * - empty document is not an error
   */
  it('treats a missing file as empty configuration', () => {
    const config = Config.load(join(dir, 'missing.yaml'));

    expect(config.hasConfigFile()).toBe(false);
    expect(config.defaultCity()).toBeUndefined();
    expect(config.apiKey()).toBeUndefined();
    expect(config.configPath).toBe(join(dir, 'missing.yaml'));
  });

  it('treats an empty file as empty configuration', () => {
    const config = Config.load(writeConfig(''));

    expect(config.hasConfigFile()).toBe(true);
    expect(config.defaultCity()).toBeUndefined();
  });

  it('treats sections with every key commented out as empty', () => {
    const config = Config.load(
      writeConfig('api:\n  openweather:\n    # key: test-key\ndefaults:\n  # city: London\n')
    );

    expect(config.get('defaults')).toBeNull();
    expect(config.get('api.openweather')).toBeNull();
    expect(config.defaultCity()).toBeUndefined();
    expect(config.apiKey()).toBeUndefined();
  });

  it('treats a key without a value as absent', () => {
    const config = Config.load(writeConfig('defaults:\n  city:\n'));

    expect(config.get('defaults.city')).toBeNull();
    expect(config.defaultCity()).toBeUndefined();
  });

  it('ignores an empty default city', () => {
    const config = Config.load(writeConfig("defaults:\n  city: ''\n"));

    expect(config.defaultCity()).toBeUndefined();
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - the environment variable wins over the file
   */
  it('prefers OPENWEATHER_API_KEY over the file', () => {
    process.env.OPENWEATHER_API_KEY = 'env-key';
    const config = Config.load(writeConfig('api:\n  openweather:\n    key: file-key\n'));

    expect(config.apiKey('openweather')).toBe('env-key');
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - malformed YAML and wrongly typed values raise ConfigError
   */
  it('throws ConfigError for malformed YAML', () => {
    const file = writeConfig('defaults: [unclosed\n');

    expect(() => Config.load(file)).toThrow(ConfigError);
  });

  it('throws ConfigError when a value has the wrong type', () => {
    const file = writeConfig('defaults:\n  city: 42\n');

    expect(() => Config.load(file)).toThrow(
      `Error loading config from ${file}: defaults.city: Expected string, received number`
    );
  });
});
