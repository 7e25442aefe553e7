import { IpGeolocationClient } from '@/modules/ipGeolocation';
import { httpStatusError, mockHttp, networkError } from './helpers';

describe('IpGeolocationClient (unit)', () => {
  let http: ReturnType<typeof mockHttp>;
  let client: IpGeolocationClient;

  beforeEach(() => {
    http = mockHttp();
    client = new IpGeolocationClient(http);
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - single GET to the fixed endpoint with the identifying header
   * - numeric coordinates are returned as-is
   */
  it('returns coordinates from a successful response', async () => {
    http.get.mockResolvedValueOnce({
      data: { latitude: 40.7128, longitude: -74.006, city: 'New York', country: 'US' },
    });

    const result = await client.locate();

    expect(result).toEqual({
      status: 'available',
      coordinates: { latitude: 40.7128, longitude: -74.006 },
    });
    expect(http.get).toHaveBeenCalledTimes(1);
    expect(http.get).toHaveBeenCalledWith('https://ipapi.co/json/', {
      headers: { 'User-Agent': 'weather-cli/1.0' },
    });
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - numeric strings are coerced to numbers
   */
  it('coerces numeric string coordinates', async () => {
    http.get.mockResolvedValueOnce({ data: { latitude: '40.7128', longitude: '-74.0060' } });

    const result = await client.locate();

    expect(result).toEqual({
      status: 'available',
      coordinates: { latitude: 40.7128, longitude: -74.006 },
    });
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - every failure collapses to unavailable, nothing is thrown
   */
  it('reports missing coordinates', async () => {
    http.get.mockResolvedValueOnce({ data: { city: 'New York', country: 'US' } });

    await expect(client.locate()).resolves.toEqual({
      status: 'unavailable',
      reason: 'missing_coordinates',
    });
  });

  it('reports null coordinates as missing', async () => {
    http.get.mockResolvedValueOnce({ data: { latitude: null, longitude: -74.006 } });

    await expect(client.locate()).resolves.toEqual({
      status: 'unavailable',
      reason: 'missing_coordinates',
    });
  });

  it('treats a provider error flag as unavailable', async () => {
    http.get.mockResolvedValueOnce({ data: { error: true, reason: 'RateLimited' } });

    await expect(client.locate()).resolves.toEqual({
      status: 'unavailable',
      reason: 'provider_error',
    });
  });

  it('treats a non-2xx status as unavailable', async () => {
    http.get.mockRejectedValueOnce(httpStatusError(429));

    await expect(client.locate()).resolves.toEqual({
      status: 'unavailable',
      reason: 'http_status',
    });
  });

  it('treats a transport failure as unavailable', async () => {
    http.get.mockRejectedValueOnce(networkError());

    await expect(client.locate()).resolves.toEqual({
      status: 'unavailable',
      reason: 'network_error',
    });
  });

  it('rejects non-numeric and out-of-range coordinates', async () => {
    http.get
      .mockResolvedValueOnce({ data: { latitude: 'north', longitude: '10' } })
      .mockResolvedValueOnce({ data: { latitude: 95, longitude: 10 } });

    await expect(client.locate()).resolves.toEqual({ status: 'unavailable', reason: 'invalid_payload' });
    await expect(client.locate()).resolves.toEqual({ status: 'unavailable', reason: 'invalid_payload' });
  });

  it('rejects a body that is not an object', async () => {
    http.get.mockResolvedValueOnce({ data: '<html>rate limited</html>' });

    await expect(client.locate()).resolves.toEqual({
      status: 'unavailable',
      reason: 'invalid_payload',
    });
  });

  describe('detailedInfo', () => {
    const payload = {
      latitude: 52.52,
      longitude: 13.405,
      city: 'Berlin',
      region: 'Land Berlin',
      country_name: 'Germany',
      country: 'DE',
      timezone: 'Europe/Berlin',
    };

    /**
     * Purpose:
     * Verifies Core behavior:
     * - descriptive fields are mapped
     * - repeated calls yield identical maps
     */
    it('maps descriptive fields and is repeatable', async () => {
      http.get.mockResolvedValue({ data: payload });

      const first = await client.detailedInfo();
      const second = await client.detailedInfo();

      expect(first).toEqual({
        city: 'Berlin',
        region: 'Land Berlin',
        country: 'Germany',
        countryCode: 'DE',
        timezone: 'Europe/Berlin',
      });
      expect(second).toEqual(first);
    });

    it('defaults missing or null fields to "Unknown"', async () => {
      http.get.mockResolvedValue({ data: { latitude: 1, longitude: 2, city: 'Lyon', region: null } });

      const first = await client.detailedInfo();
      const second = await client.detailedInfo();

      expect(first).toEqual({
        city: 'Lyon',
        region: 'Unknown',
        country: 'Unknown',
        countryCode: 'Unknown',
        timezone: 'Unknown',
      });
      expect(second).toEqual(first);
    });

    /**
     * Purpose:
     * Verifies Error handling:
     * - failures give null, never a thrown error
     */
    it('returns null on provider error or transport failure', async () => {
      http.get
        .mockResolvedValueOnce({ data: { error: true, reason: 'Reserved IP Address' } })
        .mockRejectedValueOnce(networkError());

      await expect(client.detailedInfo()).resolves.toBeNull();
      await expect(client.detailedInfo()).resolves.toBeNull();
    });
  });
});
