import axios, { AxiosInstance } from 'axios';

export interface HttpClientOptions {
  userAgent: string;
  timeoutMs: number;
  baseURL?: string;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      'User-Agent': options.userAgent,
      'Accept-Language': 'en-US,en;q=0.9',
    },
  });
}
