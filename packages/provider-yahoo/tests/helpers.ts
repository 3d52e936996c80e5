/**
 * In-process axios client: every request is answered by `respond` and
 * recorded, nothing leaves the process.
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

export type Responder = (config: InternalAxiosRequestConfig) => { status?: number; data: unknown };

export function stubClient(respond: Responder): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status = 200, data } = respond(config);
      const response = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });
  return { client, requests };
}

export function chart(result: Record<string, unknown>): unknown {
  return { chart: { result: [result], error: null } };
}
