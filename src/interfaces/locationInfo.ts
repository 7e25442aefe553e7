export interface LocationInfo {
    city: string;
    region: string;
    country: string;
    countryCode: string;
    timezone: string;
}

export interface LocationInfoSource {
    detailedInfo(): Promise<LocationInfo | null>;
}
