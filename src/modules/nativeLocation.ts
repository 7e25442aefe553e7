import {
  CoordinateSource,
  ProviderResult,
  unavailable,
} from '../interfaces/acquisition';
import { NativeFixSchema, RawFix } from '../schemas/nativeFix.schema';
import { FIX_WAIT_MS, PERMISSION_WAIT_MS } from '../constants';
import { getLogger, Logger } from '../logger';
import { sleep } from '../utils/time';
import { CoreLocationBackend } from './native/coreLocationBackend';
import { GpsdBackend } from './native/gpsdBackend';
import { WindowsLocationBackend } from './native/windowsLocationBackend';

export type NativePlatform = 'darwin' | 'win32' | 'linux';

/**
 * One operating system's location service.
 *
 * `isAuthorized`/`requestAuthorization` are present only where the OS
 * gates location behind a permission; `requestFix` only where a fresh
 * fix has to be asked for explicitly.
 */
export interface NativeLocationBackend {
  readonly platform: NativePlatform;
  servicesEnabled(): Promise<boolean>;
  isAuthorized?(): Promise<boolean>;
  requestAuthorization?(): Promise<void>;
  currentFix(): Promise<RawFix | null>;
  requestFix?(): Promise<void>;
}

export interface NativeProviderOptions {
  permissionWaitMs?: number;
  fixWaitMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export function selectNativeBackend(
  platform: NodeJS.Platform = process.platform
): NativeLocationBackend | null {
  switch (platform) {
    case 'darwin':
      return new CoreLocationBackend();
    case 'win32':
      return new WindowsLocationBackend();
    case 'linux':
      return new GpsdBackend();
    default:
      return null;
  }
}

export class NativeCoordinateProvider implements CoordinateSource {
  readonly name = 'native' as const;
  private readonly logger: Logger;
  private readonly permissionWaitMs: number;
  private readonly fixWaitMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly backend: NativeLocationBackend | null,
    options: NativeProviderOptions = {}
  ) {
    this.logger = getLogger('NativeCoordinateProvider');
    this.permissionWaitMs = options.permissionWaitMs ?? PERMISSION_WAIT_MS;
    this.fixWaitMs = options.fixWaitMs ?? FIX_WAIT_MS;
    this.sleep = options.sleep ?? sleep;
  }

  async locate(): Promise<ProviderResult> {
    if (!this.backend) {
      this.logger.debug({ platform: process.platform }, 'Native location not supported');
      return unavailable('unsupported_platform');
    }

    try {
      return await this.locateWith(this.backend);
    } catch (err) {
      this.logger.debug(
        { platform: this.backend.platform, err },
        'Native location backend failed'
      );
      return unavailable('backend_error');
    }
  }

  private async locateWith(backend: NativeLocationBackend): Promise<ProviderResult> {
    if (!(await backend.servicesEnabled())) {
      this.logger.debug('Location services are disabled');
      return unavailable('services_disabled');
    }

    if (backend.isAuthorized && !(await backend.isAuthorized())) {
      // One prompt, one bounded wait, one recheck
      await backend.requestAuthorization?.();
      await this.sleep(this.permissionWaitMs);

      if (!(await backend.isAuthorized())) {
        this.logger.debug('Location permission not granted');
        return unavailable('not_authorized');
      }
    }

    let fix = await backend.currentFix();

    if (fix === null) {
      await backend.requestFix?.();
      await this.sleep(this.fixWaitMs);
      fix = await backend.currentFix();
    }

    if (fix === null) {
      this.logger.debug('No native fix available');
      return unavailable('no_fix');
    }

    const parsed = NativeFixSchema.safeParse(fix);
    if (!parsed.success) {
      this.logger.debug({ fix }, 'Native fix rejected');
      return unavailable('invalid_fix');
    }

    return { status: 'available', coordinates: parsed.data };
  }
}

export function createNativeProvider(
  platform: NodeJS.Platform = process.platform,
  options?: NativeProviderOptions
): NativeCoordinateProvider {
  return new NativeCoordinateProvider(selectNativeBackend(platform), options);
}
