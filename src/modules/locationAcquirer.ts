import {
  Acquirer,
  AcquisitionResult,
  CoordinateSource,
} from '../interfaces/acquisition';
import { getLogger, Logger } from '../logger';
import { IpGeolocationClient } from './ipGeolocation';
import { createNativeProvider } from './nativeLocation';

/**
 * Automatic location: native positioning first, IP geolocation only once
 * the native layer has come back empty. The layers never overlap.
 */
export class LocationAcquirer implements Acquirer {
  private readonly logger: Logger;

  constructor(
    private readonly native: CoordinateSource,
    private readonly ip: CoordinateSource
  ) {
    this.logger = getLogger('LocationAcquirer');
  }

  async acquire(): Promise<AcquisitionResult> {
    for (const source of [this.native, this.ip]) {
      this.logger.debug({ source: source.name }, 'Attempting location source');

      const result = await source.locate();

      if (result.status === 'available') {
        this.logger.info(
          { source: source.name, ...result.coordinates },
          'Location acquired'
        );
        return { status: 'found', coordinates: result.coordinates, source: source.name };
      }

      this.logger.debug(
        { source: source.name, reason: result.reason },
        'Location source unavailable'
      );
    }

    this.logger.warn('All location methods failed');
    return { status: 'unavailable' };
  }
}

export function createLocationAcquirer(ipClient: IpGeolocationClient = new IpGeolocationClient()): LocationAcquirer {
  return new LocationAcquirer(createNativeProvider(), ipClient);
}
