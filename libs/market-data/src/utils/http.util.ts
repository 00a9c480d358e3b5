import axios, { AxiosInstance } from 'axios';

export const createHttpClient = (
  baseURL: string,
  timeoutMs: number,
  headers: Record<string, string> = {},
): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'market-alerts-bot/1.0', Accept: 'application/json', ...headers },
  });
