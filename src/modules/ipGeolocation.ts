import {
  CoordinateSource,
  ProviderResult,
  unavailable,
} from '../interfaces/acquisition';
import { LocationInfo, LocationInfoSource } from '../interfaces/locationInfo';
import {
  IpCoordinatesSchema,
  IpGeolocationPayload,
  IpGeolocationPayloadSchema,
} from '../schemas/ipGeolocation.schema';
import { IPAPI_BASE_URL, USER_AGENT } from '../constants';
import { getLogger, Logger } from '../logger';
import { withTimer } from '../utils/time';
import { classifyHttpError, createHttpClient, HttpClient } from './httpClient';

const UNKNOWN = 'Unknown';

type FetchOutcome =
  | { ok: true; payload: IpGeolocationPayload }
  | { ok: false; reason: 'network_error' | 'http_status' | 'invalid_payload' };

/**
 * Coordinates from the caller's public IP address.
 *
 * Every failure (transport, status, provider-reported error, missing
 * fields) is reported as `unavailable`; nothing is thrown to the caller.
 */
export class IpGeolocationClient implements CoordinateSource, LocationInfoSource {
  readonly name = 'ip' as const;
  private readonly logger: Logger;

  constructor(
    private readonly http: HttpClient = createHttpClient(),
    private readonly endpoint: string = IPAPI_BASE_URL
  ) {
    this.logger = getLogger('IpGeolocationClient');
  }

  async locate(): Promise<ProviderResult> {
    const outcome = await this.fetchPayload();
    if (!outcome.ok) {
      return unavailable(outcome.reason);
    }

    const { payload } = outcome;

    if (payload.error) {
      this.logger.warn(
        { reason: payload.reason ?? 'Unknown error' },
        'IP location service error'
      );
      return unavailable('provider_error');
    }

    if (payload.latitude == null || payload.longitude == null) {
      this.logger.debug('IP location response has no coordinates');
      return unavailable('missing_coordinates');
    }

    const coordinates = IpCoordinatesSchema.safeParse({
      latitude: payload.latitude,
      longitude: payload.longitude,
    });

    if (!coordinates.success) {
      this.logger.debug(
        { issues: coordinates.error.issues },
        'IP location coordinates are not usable'
      );
      return unavailable('invalid_payload');
    }

    return { status: 'available', coordinates: coordinates.data };
  }

  async detailedInfo(): Promise<LocationInfo | null> {
    const outcome = await this.fetchPayload();
    if (!outcome.ok || outcome.payload.error) {
      return null;
    }

    const { payload } = outcome;

    return {
      city: payload.city ?? UNKNOWN,
      region: payload.region ?? UNKNOWN,
      country: payload.country_name ?? UNKNOWN,
      countryCode: payload.country ?? UNKNOWN,
      timezone: payload.timezone ?? UNKNOWN,
    };
  }

  private async fetchPayload(): Promise<FetchOutcome> {
    let body: unknown;

    try {
      const response = await withTimer(
        this.logger,
        `API request to ${this.endpoint}`,
        () => this.http.get<unknown>(this.endpoint, {
          headers: { 'User-Agent': USER_AGENT },
        })
      );
      body = response.data;
    } catch (err) {
      const failure = classifyHttpError(err);
      this.logger.debug({ failure }, 'IP geolocation request failed');

      return {
        ok: false,
        reason: failure.kind === 'status' ? 'http_status' : 'network_error',
      };
    }

    const parsed = IpGeolocationPayloadSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.debug(
        { issues: parsed.error.issues },
        'IP geolocation payload schema mismatch'
      );
      return { ok: false, reason: 'invalid_payload' };
    }

    return { ok: true, payload: parsed.data };
  }
}
