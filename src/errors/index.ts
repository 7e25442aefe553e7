export class InvalidLocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidLocationError';
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly configPath: string,
    detail: string
  ) {
    super(`Error loading config from ${configPath}: ${detail}`);
    this.name = 'ConfigError';
  }
}

export class MissingApiKeyError extends Error {
  constructor() {
    super('API key is required. Set OPENWEATHER_API_KEY environment variable.');
    this.name = 'MissingApiKeyError';
  }
}

export class WeatherSchemaError extends Error {
  constructor(public readonly issues: ReadonlyArray<{ path: (string | number)[]; message: string }>) {
    super('Weather API schema mismatch');
    this.name = 'WeatherSchemaError';
  }
}
