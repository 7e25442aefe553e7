import { Coordinates, Location } from './location';

export type UnavailableReason =
  | 'unsupported_platform'
  | 'services_disabled'
  | 'not_authorized'
  | 'no_fix'
  | 'invalid_fix'
  | 'backend_error'
  | 'network_error'
  | 'http_status'
  | 'provider_error'
  | 'missing_coordinates'
  | 'invalid_payload';

export type ProviderResult =
  | {
      status: 'available';
      coordinates: Coordinates;
    }
  | {
      status: 'unavailable';
      reason: UnavailableReason;
    };

export type AcquisitionSource = 'native' | 'ip';

export interface CoordinateSource {
  readonly name: AcquisitionSource;
  locate(): Promise<ProviderResult>;
}

export type AcquisitionResult =
  | {
      status: 'found';
      coordinates: Coordinates;
      source: AcquisitionSource;
    }
  | {
      status: 'unavailable';
    };

export interface Acquirer {
  acquire(): Promise<AcquisitionResult>;
}

export type ResolutionResult =
  | {
      status: 'resolved';
      location: Location;
      source: 'current' | 'city' | 'default' | 'auto';
    }
  | {
      status: 'unresolved';
      reason: 'current_unavailable' | 'auto_unavailable';
    };

export interface ResolveRequest {
  here: boolean;
  city?: string | null;
}

export interface Resolver {
  resolve(request: ResolveRequest): Promise<ResolutionResult>;
}

export function unavailable(reason: UnavailableReason): ProviderResult {
  return { status: 'unavailable', reason };
}
