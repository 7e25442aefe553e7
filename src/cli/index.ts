import { Command } from 'commander';
import { Config } from '../config';
import { Resolver } from '../interfaces/acquisition';
import { describeLocation, Location } from '../interfaces/location';
import { LocationInfoSource } from '../interfaces/locationInfo';
import { WeatherProvider } from '../interfaces/weather';
import { getLogger, setupLogging } from '../logger';
import { IpGeolocationClient } from '../modules/ipGeolocation';
import { createLocationAcquirer } from '../modules/locationAcquirer';
import { LocationResolver } from '../modules/locationResolver';
import { WeatherService } from '../modules/weather';
import { withTimer } from '../utils/time';
import { APP_NAME, APP_VERSION } from '../constants';
import {
  formatLocationInfo,
  reportError,
  reportMissingApiKey,
  reportResolutionFailure,
  Writer,
} from './messages';

export interface CliOptions {
  city?: string;
  here?: boolean;
  debug?: boolean;
  config?: string;
  details?: boolean;
}

export interface CliDependencies {
  loadConfig(configPath?: string): Config;
  createResolver(config: Config): Resolver;
  createWeatherService(apiKey: string): WeatherProvider;
  locationInfo(): LocationInfoSource;
  write: Writer;
}

export function defaultDependencies(): CliDependencies {
  const ipClient = new IpGeolocationClient();

  return {
    loadConfig: (configPath) => Config.load(configPath),
    createResolver: (config) => new LocationResolver(config, createLocationAcquirer(ipClient)),
    createWeatherService: (apiKey) => new WeatherService(apiKey),
    locationInfo: () => ipClient,
    write: (line) => {
      process.stdout.write(`${line}\n`);
    },
  };
}

/**
 * One invocation: resolve a location, fetch its weather, print the report.
 * Resolves with the process exit code.
 */
export async function runWeather(options: CliOptions, deps: CliDependencies): Promise<number> {
  const logger = getLogger('cli');
  const { write } = deps;
  let location: Location | undefined;

  logger.debug(`Debug mode: ${Boolean(options.debug)}`);

  try {
    const config = await withTimer(logger, 'configuration initialization', async () =>
      deps.loadConfig(options.config)
    );
    const apiKey = config.apiKey('openweather');
    logger.debug(`API key configured: ${apiKey ? 'Yes' : 'No'}`);

    const resolution = await withTimer(logger, 'location resolution', () =>
      deps.createResolver(config).resolve({ here: Boolean(options.here), city: options.city })
    );

    if (resolution.status === 'unresolved') {
      logger.debug({ reason: resolution.reason }, 'Location could not be resolved');
      reportResolutionFailure(resolution.reason, write);
      return 1;
    }

    const resolved = resolution.location;
    location = resolved;
    logger.debug({ source: resolution.source }, `Using ${describeLocation(resolved)}`);

    if (!apiKey) {
      reportMissingApiKey(write);
      return 1;
    }

    const weatherService = deps.createWeatherService(apiKey);

    const output = await withTimer(logger, `weather lookup for ${describeLocation(resolved)}`, async () => {
      const data = await weatherService.getWeather(resolved);
      logger.debug('Weather data retrieved successfully');
      return weatherService.formatWeatherOutput(data);
    });

    write(output);

    if (options.details) {
      write(formatLocationInfo(await deps.locationInfo().detailedInfo()));
    }

    return 0;
  } catch (err) {
    logger.debug({ err }, 'Weather command failed');
    reportError(err, location, write);
    return 1;
  }
}

export function buildProgram(onRun: (options: CliOptions) => Promise<void>): Command {
  return new Command()
    .name(APP_NAME)
    .description('Get weather information for a city or current location.')
    .version(APP_VERSION)
    .option('--city <name>', 'City name to get weather for (uses config default if not provided)')
    .option('--here', 'Use current location (native positioning, then IP geolocation)', false)
    .option('--debug', 'Enable debug mode with verbose logging', false)
    .option('--config <path>', 'Path to an alternative config.yaml')
    .option('--details', 'Show IP-based location details after the report', false)
    .action(async (options: CliOptions) => {
      await onRun(options);
    });
}

export async function main(
  argv: readonly string[] = process.argv,
  deps?: Partial<CliDependencies>
): Promise<number> {
  let exitCode = 0;

  const program = buildProgram(async (options) => {
    setupLogging({ debug: Boolean(options.debug) });
    exitCode = await runWeather(options, { ...defaultDependencies(), ...deps });
  });

  await program.parseAsync([...argv]);
  return exitCode;
}
