import { LocationAcquirer } from '@/modules/locationAcquirer';
import { AcquisitionSource, ProviderResult } from '@/interfaces/acquisition';

function fakeSource(name: AcquisitionSource, result: ProviderResult) {
  return { name, locate: jest.fn().mockResolvedValue(result) };
}

describe('LocationAcquirer (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - native fix wins
   * - IP provider is never called
   */
  it('uses the native fix without touching the network', async () => {
    const native = fakeSource('native', {
      status: 'available',
      coordinates: { latitude: 41.9028, longitude: 12.4964 },
    });
    const ip = fakeSource('ip', { status: 'available', coordinates: { latitude: 1, longitude: 2 } });

    const result = await new LocationAcquirer(native, ip).acquire();

    expect(result).toEqual({
      status: 'found',
      coordinates: { latitude: 41.9028, longitude: 12.4964 },
      source: 'native',
    });
    expect(ip.locate).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Verifies Fallback behavior:
   * - native unavailable, IP succeeds with (1.0, 2.0)
   */
  it('falls back to IP geolocation', async () => {
    const native = fakeSource('native', { status: 'unavailable', reason: 'no_fix' });
    const ip = fakeSource('ip', { status: 'available', coordinates: { latitude: 1.0, longitude: 2.0 } });

    const result = await new LocationAcquirer(native, ip).acquire();

    expect(result).toEqual({
      status: 'found',
      coordinates: { latitude: 1.0, longitude: 2.0 },
      source: 'ip',
    });
  });

  it('tries the IP provider only after the native attempt has settled', async () => {
    const order: string[] = [];
    let settleNative: (result: ProviderResult) => void = () => undefined;

    const native = {
      name: 'native' as const,
      locate: jest.fn(
        () =>
          new Promise<ProviderResult>((resolve) => {
            order.push('native:start');
            settleNative = (result) => {
              order.push('native:end');
              resolve(result);
            };
          })
      ),
    };
    const ip = {
      name: 'ip' as const,
      locate: jest.fn(async (): Promise<ProviderResult> => {
        order.push('ip:start');
        return { status: 'unavailable', reason: 'network_error' };
      }),
    };

    const pending = new LocationAcquirer(native, ip).acquire();
    await Promise.resolve();

    expect(ip.locate).not.toHaveBeenCalled();

    settleNative({ status: 'unavailable', reason: 'services_disabled' });
    await pending;

    expect(order).toEqual(['native:start', 'native:end', 'ip:start']);
  });

  /**
   * Purpose:
   * Verifies Absence behavior:
   * - both layers unavailable → unavailable, no exception
   */
  it('reports unavailable when both layers come back empty', async () => {
    const native = fakeSource('native', { status: 'unavailable', reason: 'unsupported_platform' });
    const ip = fakeSource('ip', { status: 'unavailable', reason: 'http_status' });

    await expect(new LocationAcquirer(native, ip).acquire()).resolves.toEqual({
      status: 'unavailable',
    });
    expect(native.locate).toHaveBeenCalledTimes(1);
    expect(ip.locate).toHaveBeenCalledTimes(1);
  });
});
