import axios, { AxiosInstance } from 'axios';
import { API_TIMEOUT_MS, USER_AGENT } from '../constants';

export type HttpClient = Pick<AxiosInstance, 'get'>;

export type HttpFailure =
  | { kind: 'status'; status: number; message: string }
  | { kind: 'network'; code: string | undefined; message: string }
  | { kind: 'unknown'; message: string };

// Default agent without keep-alive, so the process exits once the report is printed
export function createHttpClient(): HttpClient {
  return axios.create({
    timeout: API_TIMEOUT_MS,
    headers: { 'User-Agent': USER_AGENT },
  });
}

/**
 * Separates "the server answered with an error status" from
 * "we never got an answer" (DNS, refused connection, timeout).
 */
export function classifyHttpError(err: unknown): HttpFailure {
  if (axios.isAxiosError(err)) {
    if (err.response) {
      return { kind: 'status', status: err.response.status, message: err.message };
    }
    return { kind: 'network', code: err.code, message: err.message };
  }

  return {
    kind: 'unknown',
    message: err instanceof Error ? err.message : String(err),
  };
}
