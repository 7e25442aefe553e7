import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';

export function httpStatusError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response: AxiosResponse = {
    data: {},
    status,
    statusText: `HTTP ${status}`,
    headers: {},
    config,
  };
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_RESPONSE,
    config,
    undefined,
    response
  );
}

export function networkError(message = 'getaddrinfo ENOTFOUND ipapi.co'): AxiosError {
  return new AxiosError(message, 'ENOTFOUND', { headers: new AxiosHeaders() });
}

export function mockHttp() {
  return { get: jest.fn() };
}
