import {
  Acquirer,
  ResolutionResult,
  ResolveRequest,
  Resolver,
} from '../interfaces/acquisition';
import { DefaultCitySource } from '../interfaces/config';
import { cityLocation, coordinatesLocation } from '../interfaces/location';
import { getLogger, Logger } from '../logger';

/**
 * Turns the user's intent into one Location.
 *
 * Priority: --here > --city > configured default > automatic location.
 * An explicit --here never falls back to a city.
 */
export class LocationResolver implements Resolver {
  private readonly logger: Logger;

  constructor(
    private readonly config: DefaultCitySource,
    private readonly acquirer: Acquirer
  ) {
    this.logger = getLogger('LocationResolver');
  }

  async resolve({ here, city }: ResolveRequest): Promise<ResolutionResult> {
    if (here) {
      this.logger.debug('Getting current location');
      return this.acquireCurrent('current');
    }

    if (city) {
      this.logger.debug({ city }, 'Using city from command line');
      return { status: 'resolved', location: cityLocation(city), source: 'city' };
    }

    const defaultCity = this.config.defaultCity();
    if (defaultCity) {
      this.logger.debug({ city: defaultCity }, 'Using default city from config');
      return { status: 'resolved', location: cityLocation(defaultCity), source: 'default' };
    }

    this.logger.debug('No default city configured, using current location');
    return this.acquireCurrent('auto');
  }

  private async acquireCurrent(source: 'current' | 'auto'): Promise<ResolutionResult> {
    const result = await this.acquirer.acquire();

    if (result.status === 'found') {
      const { latitude, longitude } = result.coordinates;
      return {
        status: 'resolved',
        location: coordinatesLocation(latitude, longitude),
        source,
      };
    }

    return {
      status: 'unresolved',
      reason: source === 'current' ? 'current_unavailable' : 'auto_unavailable',
    };
  }
}
